/**
 * Session state persisted by the checkpoint store.
 *
 * The common fields describe the unit of work in progress (the single query,
 * the current author of a batch, or the link list): accepted count, seen ids,
 * output file and its size at the last flush.
 */

import { z } from 'zod';

export const sessionModeSchema = z.enum(['single', 'batch', 'links']);
export type SessionMode = z.infer<typeof sessionModeSchema>;

export const batchOutcomeSchema = z.object({
  username: z.string(),
  status: z.enum(['success', 'failed']),
  count: z.number().int().nonnegative(),
  outputPath: z.string().optional(),
  error: z.string().optional(),
});
export type BatchOutcome = z.infer<typeof batchOutcomeSchema>;

const commonStateShape = {
  version: z.number().int(),
  timestamp: z.string(),
  count: z.number().int().nonnegative(),
  seenIds: z.array(z.string()),
  outputPath: z.string().min(1),
  /** Data rows persisted at the last flush */
  outputRows: z.number().int().nonnegative(),
  /** Delimited-text length at the last flush */
  outputBytes: z.number().int().nonnegative().optional(),
  /** Opaque next-page token */
  cursor: z.string().optional(),
  /** Date range as resolved when the session started; a resume reuses it as is */
  dateRange: z
    .object({
      since: z.string().optional(),
      until: z.string().optional(),
    })
    .optional(),
  completed: z.boolean().default(false),
  /** Request the session was started with */
  settings: z.record(z.unknown()),
};

export const singleStateSchema = z.object({
  mode: z.literal('single'),
  query: z.string().min(1),
  ...commonStateShape,
});

export const batchStateSchema = z.object({
  mode: z.literal('batch'),
  queries: z.array(z.string()).min(1, 'batch mode requires a non-empty query list'),
  /** Index of the next author to run, or of the author in progress */
  currentIndex: z.number().int().nonnegative(),
  /** True while the author at currentIndex owns the common fields and output file */
  inProgress: z.boolean().default(false),
  results: z.array(batchOutcomeSchema).default([]),
  ...commonStateShape,
});

export const linksStateSchema = z.object({
  mode: z.literal('links'),
  links: z.array(z.string()).min(1, 'links mode requires a non-empty link list'),
  /** Links processed so far */
  currentIndex: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative().default(0),
  skipped: z.number().int().nonnegative().default(0),
  ...commonStateShape,
});

export const sessionStateSchema = z.discriminatedUnion('mode', [singleStateSchema, batchStateSchema, linksStateSchema]);

export type SingleSessionState = z.infer<typeof singleStateSchema>;
export type BatchSessionState = z.infer<typeof batchStateSchema>;
export type LinksSessionState = z.infer<typeof linksStateSchema>;
export type SessionState = z.infer<typeof sessionStateSchema>;
