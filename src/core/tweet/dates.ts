// src/core/tweet/dates.ts
import { DumpError, ErrorCode } from '../errors.js';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// "Wed Oct 10 20:19:24 +0000 2018"
const TWITTER_DATE = /^\w{3} (\w{3}) (\d{2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2}) (\d{4})$/;

const DURATION = /^(\d+)([dhm])$/;
const UNIT_MS: Record<string, number> = {
  d: 24 * 60 * 60 * 1000,
  h: 60 * 60 * 1000,
  m: 60 * 1000,
};

/**
 * Parse the platform's legacy `created_at` format. Falls back to
 * `Date.parse`, then to `now` when the value is unusable.
 */
export function parseTwitterDate(value: unknown, now: () => Date = () => new Date()): Date {
  if (typeof value !== 'string') {
    return now();
  }

  const match = TWITTER_DATE.exec(value.trim());
  if (match) {
    const [, month, day, hours, minutes, seconds, sign, offH, offM, year] = match;
    const monthIndex = MONTHS.indexOf(month);
    if (monthIndex >= 0) {
      const utc = Date.UTC(
        Number(year), monthIndex, Number(day),
        Number(hours), Number(minutes), Number(seconds)
      );
      const offset = (Number(offH) * 60 + Number(offM)) * 60 * 1000;
      return new Date(sign === '+' ? utc - offset : utc + offset);
    }
  }

  const fallback = Date.parse(value);
  return Number.isNaN(fallback) ? now() : new Date(fallback);
}

export function parseDuration(value: string): number {
  const match = DURATION.exec(value.trim());
  if (!match) {
    throw new DumpError(
      ErrorCode.INVALID_ARGUMENT,
      `Invalid duration: ${value}`,
      false,
      'Use a number followed by d, h or m, e.g. 7d, 12h, 30m'
    );
  }
  return Number(match[1]) * UNIT_MS[match[2]];
}

export function cutoffFrom(duration: string, now: Date = new Date()): Date {
  return new Date(now.getTime() - parseDuration(duration));
}
