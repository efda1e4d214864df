/**
 * 验证工具模块
 * Input checks that run before any session starts: handles, date ranges, tweet links
 */

import { TWEET_LINK_PATTERN } from '../config/constants';
import { IngestionErrors } from '../core/errors';
import { DateUtils } from './date-utils';

export interface ValidationResult {
  valid: boolean;
  error?: string;
  normalized?: string;
}

/**
 * 验证 Twitter 用户名格式
 */
export function validateTwitterUsername(username: unknown): ValidationResult {
  if (!username) {
    return { valid: false, error: 'Username must not be empty' };
  }

  if (typeof username !== 'string') {
    return { valid: false, error: 'Username must be a string' };
  }

  // 移除可能的 @ 前缀和空格
  const normalized = username.trim().replace(/^@/, '');

  // Twitter 用户名规则：
  // - 长度 1-15 字符
  // - 只能包含字母、数字、下划线
  if (normalized.length === 0) {
    return { valid: false, error: 'Username must not be empty' };
  }

  if (normalized.length > 15) {
    return { valid: false, error: 'Username must be at most 15 characters' };
  }

  if (!/^[a-zA-Z0-9_]+$/.test(normalized)) {
    return { valid: false, error: 'Username may only contain letters, digits and underscores' };
  }

  return { valid: true, normalized };
}

export interface DateRange {
  since?: string;
  until?: string;
  sinceDate?: Date;
  untilDate?: Date;
}

/**
 * `since:2024-01-01_00:00:00_UTC` style values keep only the date part.
 */
export function stripTimeSuffix(value: string): string {
  return value.split('_')[0].trim();
}

/**
 * Validates a `YYYY-MM-DD` range. An end date in the future is clamped to
 * today; an inverted range is rejected.
 */
export function validateDateRange(since?: string, until?: string, today: Date = new Date()): DateRange {
  const range: DateRange = {};

  if (since) {
    const value = stripTimeSuffix(since);
    const date = DateUtils.parseDateKey(value);
    if (!date) {
      throw IngestionErrors.malformedInput(`Invalid start date "${since}", expected YYYY-MM-DD`);
    }
    range.since = value;
    range.sinceDate = date;
  }

  if (until) {
    const value = stripTimeSuffix(until);
    const date = DateUtils.parseDateKey(value);
    if (!date) {
      throw IngestionErrors.malformedInput(`Invalid end date "${until}", expected YYYY-MM-DD`);
    }
    const todayKey = DateUtils.toDateKey(today);
    if (value > todayKey) {
      range.until = todayKey;
      range.untilDate = DateUtils.parseDateKey(todayKey) ?? date;
    } else {
      range.until = value;
      range.untilDate = date;
    }
  }

  if (range.sinceDate && range.untilDate && range.sinceDate.getTime() > range.untilDate.getTime()) {
    throw IngestionErrors.malformedInput(`Start date ${range.since} is after end date ${range.until}`);
  }

  return range;
}

/**
 * Tweet id from a direct status link, or null when the link has another shape.
 */
export function parseTweetLink(link: unknown): string | null {
  if (typeof link !== 'string') return null;
  const match = link.trim().match(TWEET_LINK_PATTERN);
  return match ? match[1] : null;
}
