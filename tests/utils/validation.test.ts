/**
 * Validation 单元测试
 */

import { describe, expect, test } from 'vitest';
import { ErrorCode, IngestionError } from '../../core/errors';
import { parseTweetLink, validateDateRange, validateTwitterUsername } from '../../utils/validation';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('validateTwitterUsername', () => {
  test('strips the @ prefix', () => {
    expect(validateTwitterUsername(' @alice ')).toEqual({ valid: true, normalized: 'alice' });
  });

  test('rejects empty, long, non-string and malformed handles', () => {
    expect(validateTwitterUsername('')).toEqual({ valid: false, error: 'Username must not be empty' });
    expect(validateTwitterUsername('@')).toEqual({ valid: false, error: 'Username must not be empty' });
    expect(validateTwitterUsername('a'.repeat(16))).toEqual({
      valid: false,
      error: 'Username must be at most 15 characters',
    });
    expect(validateTwitterUsername(42)).toEqual({ valid: false, error: 'Username must be a string' });
    expect(validateTwitterUsername('bad-name').valid).toBe(false);
  });
});

describe('validateDateRange', () => {
  const today = new Date(Date.UTC(2024, 5, 1, 12));

  test('accepts an ordered range', () => {
    const range = validateDateRange('2024-01-01', '2024-02-01', today);
    expect(range.since).toBe('2024-01-01');
    expect(range.until).toBe('2024-02-01');
    expect(range.sinceDate?.getTime()).toBe(Date.UTC(2024, 0, 1));
  });

  test('drops a time suffix', () => {
    expect(validateDateRange('2024-01-01_00:00:00_UTC', undefined, today).since).toBe('2024-01-01');
  });

  test('clamps a future end date to today', () => {
    const range = validateDateRange(undefined, '2030-01-01', today);
    expect(range.until).toBe('2024-06-01');
    expect(range.untilDate?.getTime()).toBe(Date.UTC(2024, 5, 1));
  });

  test('rejects inverted ranges and invalid dates', () => {
    const inverted = captureError(() => validateDateRange('2024-03-01', '2024-02-01', today));
    expect(inverted).toBeInstanceOf(IngestionError);
    expect(inverted instanceof IngestionError && inverted.code).toBe(ErrorCode.MALFORMED_INPUT);
    expect(inverted instanceof IngestionError && inverted.message).toBe(
      'Start date 2024-03-01 is after end date 2024-02-01'
    );

    const invalid = captureError(() => validateDateRange('2024-13-01', undefined, today));
    expect(invalid instanceof IngestionError && invalid.message).toBe(
      'Invalid start date "2024-13-01", expected YYYY-MM-DD'
    );
  });
});

describe('parseTweetLink', () => {
  test('extracts the id from both hosts', () => {
    expect(parseTweetLink('https://x.com/alice/status/12345?s=20')).toBe('12345');
    expect(parseTweetLink('https://www.twitter.com/a_b/status/9')).toBe('9');
    expect(parseTweetLink('  http://twitter.com/alice/status/77  ')).toBe('77');
  });

  test('rejects other shapes', () => {
    expect(parseTweetLink('https://twitter.com/alice')).toBeNull();
    expect(parseTweetLink('https://example.com/alice/status/1')).toBeNull();
    expect(parseTweetLink(null)).toBeNull();
  });
});
