/**
 * Calendar date helpers.
 *
 * Dates travel as zero-padded `YYYY-MM-DD` strings, which order correctly
 * under plain string comparison.
 */

import type { DateRange } from './types';

const DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

/**
 * Parse a `YYYY-MM-DD` date (single-digit month and day accepted) and return
 * its zero-padded form, or null when the string is not a real calendar date.
 */
export function parseCalendarDate(value: string): string | null {
  const match = DATE_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return null;

  // Date.UTC rolls 2025-02-30 over into March
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }

  return `${match[1]}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export function isWithinRange(date: string, range: DateRange): boolean {
  return range.start <= date && date <= range.end;
}

export function maxDate(a: string, b: string): string {
  return a >= b ? a : b;
}

export function minDate(a: string, b: string): string {
  return a <= b ? a : b;
}
