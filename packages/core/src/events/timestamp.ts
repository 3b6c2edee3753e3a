/**
 * Timestamp parsing and formatting
 * All wall-clock timestamps are read and written as UTC so runs are reproducible
 */

import type { TimestampParseResult } from './types.js';

const ISO_LIKE = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?$/;

// "Feb 17 15:23:00" as written by syslog; no year
const SYSLOG_LIKE = /^([A-Z][a-z]{2})\s+(\d{1,2})\s+(\d{2}):(\d{2}):(\d{2})$/;

// Earlier years come from a corrupted clock
const MIN_YEAR = 1970;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// Embedded date-time inside a message, plus optional fractional seconds
export const EMBEDDED_TIMESTAMP = /(\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}:\d{2})(?:\.\d+)?/;

/**
 * Zero/placeholder timestamps written by components that lost their clock
 */
export function isSentinelTimestamp(text: string): boolean {
  const trimmed = text.trim();
  return trimmed === '' || trimmed === '0' || trimmed.startsWith('0000-00-00');
}

function buildUtc(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millis: number
): Date | null {
  if (year < MIN_YEAR || month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const time = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  // Reject rollovers such as Feb 30
  if (time.getUTCDate() !== day || time.getUTCMonth() !== month - 1) {
    return null;
  }
  return time;
}

/**
 * Parse a log timestamp.
 * Accepts `YYYY-MM-DD HH:MM:SS[.fff]` (or a `T` separator) and the year-less syslog
 * form, which takes `referenceYear`.
 */
export function parseTimestamp(text: string, referenceYear?: number): TimestampParseResult {
  const trimmed = text.trim();
  if (isSentinelTimestamp(trimmed)) {
    return { ok: false };
  }

  const iso = ISO_LIKE.exec(trimmed);
  if (iso) {
    const [, y, mo, d, h, mi, s, frac] = iso;
    // Fraction is truncated to millisecond precision
    const millis = frac ? Number(frac.slice(0, 3).padEnd(3, '0')) : 0;
    const time = buildUtc(Number(y), Number(mo), Number(d), Number(h), Number(mi), Number(s), millis);
    return time ? { ok: true, time } : { ok: false };
  }

  const syslog = SYSLOG_LIKE.exec(trimmed);
  if (syslog) {
    const [, mon, d, h, mi, s] = syslog;
    const month = MONTHS.indexOf(mon ?? '') + 1;
    if (month === 0) {
      return { ok: false };
    }
    const year = referenceYear ?? new Date().getUTCFullYear();
    const time = buildUtc(year, month, Number(d), Number(h), Number(mi), Number(s), 0);
    return time ? { ok: true, time } : { ok: false };
  }

  return { ok: false };
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format as `YYYY-MM-DD HH:MM:SS.mmm` (UTC)
 */
export function formatTimestamp(time: Date): string {
  return (
    `${pad(time.getUTCFullYear(), 4)}-${pad(time.getUTCMonth() + 1)}-${pad(time.getUTCDate())} ` +
    `${pad(time.getUTCHours())}:${pad(time.getUTCMinutes())}:${pad(time.getUTCSeconds())}.` +
    pad(time.getUTCMilliseconds(), 3)
  );
}

/**
 * Hour bucket label `YYYY-MM-DD HH:00` (UTC)
 */
export function formatHourBucket(time: Date): string {
  return `${formatTimestamp(time).slice(0, 13)}:00`;
}

/**
 * Whole seconds since epoch; fractional seconds are ignored for interval maths
 */
export function toEpochSeconds(time: Date): number {
  return Math.floor(time.getTime() / 1000);
}
