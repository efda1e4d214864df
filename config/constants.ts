/**
 * Application Constants
 *
 * This file contains ONLY truly immutable constants:
 * - Retry / backoff policy tables
 * - Empty-page thresholds of the pagination engine
 * - Export column layout and link patterns
 *
 * For values that vary per deployment (output dir, save intervals), see
 * core/env.ts.
 */

// ==================== 重试策略 ====================

/**
 * Progressive delays (seconds) between network retries.
 * Attempts past the end of the table reuse the last entry.
 */
export const NETWORK_RETRY_DELAYS = [30, 60, 120, 300, 600] as const;

/**
 * Attempt budget for one network-failing operation.
 */
export const MAX_NETWORK_ATTEMPTS = 5;

/**
 * From this consecutive network failure onward the caller's
 * network-degradation channel is notified.
 */
export const NETWORK_DEGRADED_AFTER_ATTEMPTS = 3;

/**
 * Single upstream-throttling wait (seconds): 15 minutes.
 */
export const RATE_LIMIT_WAIT_SECONDS = 900;

/**
 * Interval (seconds) between "resuming in mm:ss" notices during long waits.
 */
export const WAIT_PROGRESS_INTERVAL_SECONDS = 30;

/**
 * Pagination glitches (transient "not found" on the next page).
 */
export const PAGINATION_GLITCH_RETRY = {
  maxRetries: 3,
  delaySeconds: 5,
} as const;

// ==================== 空页处理 ====================

export const EMPTY_PAGE_THRESHOLDS = {
  /** Consecutive empty pages with nothing ever accepted → "no matching results" */
  noResults: 3,
  /** Consecutive empty pages after ≥1 accepted record → ask the caller */
  prompt: 5,
  /** Consecutive empty pages that end the run when the prompt went unanswered */
  ceiling: 10,
  /** Emit an empty-page status notice every N consecutive empties */
  noticeEvery: 5,
} as const;

export type EmptyPageThresholds = {
  noResults: number;
  prompt: number;
  ceiling: number;
  noticeEvery: number;
};

// ==================== 冷却（预防性休息） ====================

export const DEFAULT_COOLDOWN = {
  enabled: false,
  recordInterval: 100,
  minMinutes: 5,
  maxMinutes: 10,
} as const;

// ==================== 导出格式 ====================

/**
 * Delimited-text header (11 columns).
 */
export const EXPORT_COLUMNS = [
  'date',
  'username',
  'display_name',
  'text',
  'retweets',
  'likes',
  'replies',
  'quotes',
  'views',
  'tweet_id',
  'tweet_url',
] as const;

/**
 * Spreadsheet mode appends the absolute output path as a 12th column.
 */
export const EXPORT_PATH_COLUMN = 'export_path';

export const SHEET_TITLE_MAX_LENGTH = 31;

export const EXPORT_EXTENSIONS = {
  csv: 'csv',
  xlsx: 'xlsx',
} as const;

// ==================== 链接与查询 ====================

/**
 * Strict shape of a direct tweet link; capture group 1 is the tweet id.
 */
export const TWEET_LINK_PATTERN =
  /^https?:\/\/(?:www\.)?(?:twitter\.com|x\.com)\/\w+\/status\/(\d+)/;

export const TWEET_PERMALINK_BASE = 'https://twitter.com';

/**
 * Author handle used when a payload carries none.
 */
export const UNKNOWN_AUTHOR = 'unknown';

// ==================== 检查点 ====================

export const CHECKPOINT_SCHEMA_VERSION = 2;

export const CHECKPOINT_BACKUP_SUFFIX = '.backup';
