/**
 * 日期工具
 * Timestamp parsing for heterogeneous upstream payloads, and the fixed
 * `YYYY-MM-DD HH:mm:ss` rendering used by every export.
 */

const MONTHS: Record<string, number> = {
  jan: 0,
  feb: 1,
  mar: 2,
  apr: 3,
  may: 4,
  jun: 5,
  jul: 6,
  aug: 7,
  sep: 8,
  oct: 9,
  nov: 10,
  dec: 11,
};

interface DateParts {
  year: number;
  month: number; // 0-based
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
  millisecond?: number;
  /** Minutes east of UTC */
  offsetMinutes?: number;
}

type DateFormat = {
  name: string;
  pattern: RegExp;
  toParts: (match: RegExpMatchArray) => DateParts | null;
};

function int(value: string | undefined): number {
  return value === undefined ? 0 : parseInt(value, 10);
}

function parseOffset(zone: string | undefined): number | null {
  if (!zone || zone === 'Z' || zone === 'GMT' || zone === 'UTC') return 0;
  const match = zone.match(/^([+-])(\d{2}):?(\d{2})$/);
  if (!match) return null;
  const minutes = int(match[2]) * 60 + int(match[3]);
  return match[1] === '-' ? -minutes : minutes;
}

function monthIndex(name: string | undefined): number | null {
  if (!name) return null;
  const index = MONTHS[name.toLowerCase()];
  return index === undefined ? null : index;
}

function withZone(parts: Omit<DateParts, 'offsetMinutes'>, zone: string | undefined): DateParts | null {
  const offsetMinutes = parseOffset(zone);
  return offsetMinutes === null ? null : { ...parts, offsetMinutes };
}

/**
 * Accepted formats, tried in order.
 */
const FORMATS: DateFormat[] = [
  {
    name: 'date',
    pattern: /^(\d{4})-(\d{2})-(\d{2})$/,
    toParts: (m) => ({ year: int(m[1]), month: int(m[2]) - 1, day: int(m[3]) }),
  },
  {
    name: 'datetime',
    pattern: /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/,
    toParts: (m) => ({
      year: int(m[1]),
      month: int(m[2]) - 1,
      day: int(m[3]),
      hour: int(m[4]),
      minute: int(m[5]),
      second: int(m[6]),
    }),
  },
  {
    // ISO-8601 with or without fractional seconds and zone designator
    name: 'iso8601',
    pattern: /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:?\d{2})?$/,
    toParts: (m) =>
      withZone(
        {
          year: int(m[1]),
          month: int(m[2]) - 1,
          day: int(m[3]),
          hour: int(m[4]),
          minute: int(m[5]),
          second: int(m[6]),
          millisecond: m[7] ? int(m[7].slice(0, 3).padEnd(3, '0')) : 0,
        },
        m[8]
      ),
  },
  {
    // Legacy timeline format: "Wed Oct 10 20:19:24 +0000 2018"
    name: 'legacy',
    pattern: /^[A-Za-z]{3} ([A-Za-z]{3}) (\d{1,2}) (\d{2}):(\d{2}):(\d{2}) ([+-]\d{4}) (\d{4})$/,
    toParts: (m) => {
      const month = monthIndex(m[1]);
      if (month === null) return null;
      return withZone(
        { year: int(m[7]), month, day: int(m[2]), hour: int(m[3]), minute: int(m[4]), second: int(m[5]) },
        m[6]
      );
    },
  },
  {
    // RFC-822 / RFC-2822: "Wed, 10 Oct 2018 20:19:24 +0000"
    name: 'rfc822',
    pattern: /^(?:[A-Za-z]{3},\s*)?(\d{1,2}) ([A-Za-z]{3}) (\d{4}) (\d{2}):(\d{2})(?::(\d{2}))? (GMT|UTC|Z|[+-]\d{4})$/,
    toParts: (m) => {
      const month = monthIndex(m[2]);
      if (month === null) return null;
      return withZone(
        { year: int(m[3]), month, day: int(m[1]), hour: int(m[4]), minute: int(m[5]), second: int(m[6]) },
        m[7]
      );
    },
  },
];

function partsToDate(parts: DateParts): Date | null {
  const { year, month, day, hour = 0, minute = 0, second = 0, millisecond = 0, offsetMinutes = 0 } = parts;
  if (month < 0 || month > 11 || hour > 23 || minute > 59 || second > 59) return null;

  const local = new Date(Date.UTC(year, month, day, hour, minute, second, millisecond));
  // Reject rollovers such as 2024-02-31
  if (local.getUTCFullYear() !== year || local.getUTCMonth() !== month || local.getUTCDate() !== day) {
    return null;
  }
  return new Date(local.getTime() - offsetMinutes * 60_000);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export class DateUtils {
  /**
   * Parses a timestamp in one of the known formats. Naive values are taken as UTC.
   */
  static parseTimestamp(value: unknown): Date | null {
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? null : value;
    }
    if (typeof value !== 'string') return null;

    const trimmed = value.trim();
    for (const format of FORMATS) {
      const match = trimmed.match(format.pattern);
      if (!match) continue;
      const parts = format.toParts(match);
      const date = parts ? partsToDate(parts) : null;
      if (date) return date;
    }
    return null;
  }

  /**
   * `YYYY-MM-DD HH:mm:ss` in UTC.
   */
  static formatTimestamp(date: Date): string {
    return (
      `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
      `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
    );
  }

  /**
   * `YYYY-MM-DD` in UTC.
   */
  static toDateKey(date: Date): string {
    return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  }

  /**
   * `YYYYMMDD_HHmmss` in local time, used in file and sheet names.
   */
  static toFileStamp(date: Date): string {
    return (
      `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
      `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
  }

  /**
   * Strict `YYYY-MM-DD` check, calendar-valid.
   */
  static parseDateKey(value: string): Date | null {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
    return DateUtils.parseTimestamp(value);
  }
}
