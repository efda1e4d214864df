import { z } from 'zod';

const envSchema = z.object({
  // Node Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_DIR: z.string().default('logs'),
  LOG_FILE_ENABLED: z
    .enum(['true', 'false'])
    .default('true')
    .transform((val) => val === 'true'),

  // Output & checkpoint
  OUTPUT_DIR: z.string().default('./data/exports'),
  CHECKPOINT_PATH: z.string().default('./data/scraper_state.json'),
  DEFAULT_EXPORT_FORMAT: z.enum(['csv', 'xlsx']).default('xlsx'),

  // Persistence cadence
  TIMELINE_SAVE_INTERVAL: z
    .string()
    .default('50')
    .transform((val) => parseInt(val, 10)),
  LINKS_SAVE_INTERVAL: z
    .string()
    .default('20')
    .transform((val) => parseInt(val, 10)),

  // Pacing
  LINK_REQUEST_DELAY_SECONDS: z
    .string()
    .default('3')
    .transform((val) => parseInt(val, 10)),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
