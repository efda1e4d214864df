/**
 * Configuration types and schemas
 * Per-run settings for the three session modes, validated with zod before
 * any network activity.
 */

import { z } from 'zod';
import { DEFAULT_COOLDOWN } from '../config/constants';
import { env } from '../core/env';

/**
 * Preventive break settings
 */
export const cooldownSettingsSchema = z
  .object({
    enabled: z.boolean().default(DEFAULT_COOLDOWN.enabled),
    /** Accepted records between breaks */
    recordInterval: z.number().int().positive().default(DEFAULT_COOLDOWN.recordInterval),
    minMinutes: z.number().int().nonnegative().default(DEFAULT_COOLDOWN.minMinutes),
    maxMinutes: z.number().int().nonnegative().default(DEFAULT_COOLDOWN.maxMinutes),
  })
  .refine((settings) => settings.minMinutes <= settings.maxMinutes, {
    message: 'minMinutes must not exceed maxMinutes',
    path: ['minMinutes'],
  });

export type CooldownSettings = z.infer<typeof cooldownSettingsSchema>;

export const exportFormatSchema = z.enum(['csv', 'xlsx']);

export const keywordOperatorSchema = z.enum(['AND', 'OR']);

const outputShape = {
  format: exportFormatSchema.default(env.DEFAULT_EXPORT_FORMAT),
  outputDir: z.string().min(1).default(env.OUTPUT_DIR),
  cooldown: cooldownSettingsSchema.default({}),
};

const filterShape = {
  keywords: z.array(z.string()).default([]),
  operator: keywordOperatorSchema.default('OR'),
  since: z.string().optional(),
  until: z.string().optional(),
  /** Stop after this many accepted records (per query) */
  maxRecords: z.number().int().positive().optional(),
  saveInterval: z.number().int().positive().default(env.TIMELINE_SAVE_INTERVAL),
};

/**
 * One query: by author, or by keywords.
 */
export const singleQuerySettingsSchema = z.object({
  username: z.string().optional(),
  ...filterShape,
  ...outputShape,
});

/**
 * Sequential author queries, one output file per author.
 */
export const batchSettingsSchema = z.object({
  usernames: z.array(z.string()).min(1, 'At least one username is required'),
  ...filterShape,
  ...outputShape,
});

/**
 * Direct tweet links, fetched one by one.
 */
export const linksSettingsSchema = z.object({
  links: z.array(z.string()).default([]),
  /** .txt or .xlsx file with one link per line / row */
  linksFile: z.string().optional(),
  saveInterval: z.number().int().positive().default(env.LINKS_SAVE_INTERVAL),
  delaySeconds: z.number().nonnegative().default(env.LINK_REQUEST_DELAY_SECONDS),
  ...outputShape,
});

export type SingleQueryRequest = z.input<typeof singleQuerySettingsSchema>;
export type SingleQuerySettings = z.infer<typeof singleQuerySettingsSchema>;

export type BatchRequest = z.input<typeof batchSettingsSchema>;
export type BatchSettings = z.infer<typeof batchSettingsSchema>;

export type LinksRequest = z.input<typeof linksSettingsSchema>;
export type LinksSettings = z.infer<typeof linksSettingsSchema>;
