/**
 * DateUtils 单元测试
 */

import { describe, expect, test } from 'vitest';
import { DateUtils } from '../../utils/date-utils';

describe('DateUtils', () => {
  describe('parseTimestamp', () => {
    test('parses a bare date as UTC midnight', () => {
      expect(DateUtils.parseTimestamp('2024-01-10')?.getTime()).toBe(Date.UTC(2024, 0, 10));
    });

    test('parses naive date-time values as UTC', () => {
      const parsed = DateUtils.parseTimestamp('2024-01-10 12:30:45');
      expect(parsed?.toISOString()).toBe('2024-01-10T12:30:45.000Z');
    });

    test('parses ISO-8601 with fraction and zone', () => {
      expect(DateUtils.parseTimestamp('2024-01-10T12:30:45.123Z')?.toISOString()).toBe('2024-01-10T12:30:45.123Z');
      const shifted = DateUtils.parseTimestamp('2024-01-10T12:30:45+02:00');
      expect(shifted && DateUtils.formatTimestamp(shifted)).toBe('2024-01-10 10:30:45');
    });

    test('parses the legacy timeline format', () => {
      const parsed = DateUtils.parseTimestamp('Wed Oct 10 20:19:24 +0000 2018');
      expect(parsed && DateUtils.formatTimestamp(parsed)).toBe('2018-10-10 20:19:24');
    });

    test('parses RFC-822 with a numeric offset', () => {
      const parsed = DateUtils.parseTimestamp('Wed, 10 Oct 2018 20:19:24 -0500');
      expect(parsed && DateUtils.formatTimestamp(parsed)).toBe('2018-10-11 01:19:24');
    });

    test('rejects rollovers and unknown shapes', () => {
      expect(DateUtils.parseTimestamp('2024-02-30')).toBeNull();
      expect(DateUtils.parseTimestamp('yesterday')).toBeNull();
      expect(DateUtils.parseTimestamp(12345)).toBeNull();
      expect(DateUtils.parseTimestamp(new Date('invalid'))).toBeNull();
    });
  });

  test('formatTimestamp pads every field', () => {
    expect(DateUtils.formatTimestamp(new Date(Date.UTC(2024, 2, 5, 4, 3, 2)))).toBe('2024-03-05 04:03:02');
  });

  test('toDateKey uses the UTC day', () => {
    expect(DateUtils.toDateKey(new Date(Date.UTC(2024, 11, 31, 23, 59, 59)))).toBe('2024-12-31');
  });

  test('toFileStamp uses local time', () => {
    expect(DateUtils.toFileStamp(new Date(2024, 0, 5, 7, 8, 9))).toBe('20240105_070809');
  });

  test('parseDateKey only accepts strict YYYY-MM-DD', () => {
    expect(DateUtils.parseDateKey('2024-1-5')).toBeNull();
    expect(DateUtils.parseDateKey('2024-01-05 00:00:00')).toBeNull();
    expect(DateUtils.parseDateKey('2024-01-05')?.getTime()).toBe(Date.UTC(2024, 0, 5));
  });
});
