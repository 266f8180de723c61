import { maxDate, minDate } from './calendar-date';
import { DEFAULT_WINDOW_BOUNDS, FALLBACK_DATE_RANGE } from './constants';
import type { DateRange, ProductRowBase } from './types';

/**
 * Earliest and latest movement date across all rows, or the fallback range
 * when no row carries a dated movement.
 */
export function observedDateRange(
  rows: readonly ProductRowBase[],
  fallback: DateRange = FALLBACK_DATE_RANGE
): DateRange {
  let start: string | null = null;
  let end: string | null = null;

  for (const row of rows) {
    for (const entry of row.movements) {
      start = start === null ? entry.date : minDate(start, entry.date);
      end = end === null ? entry.date : maxDate(end, entry.date);
    }
  }

  if (start === null || end === null) {
    return { ...fallback };
  }
  return { start, end };
}

/**
 * Window pre-selected for a dashboard: the default bounds clipped to what
 * the data covers. Falls back to the whole observed range if clipping
 * leaves nothing.
 */
export function defaultWindow(
  observed: DateRange,
  bounds: DateRange = DEFAULT_WINDOW_BOUNDS
): DateRange {
  const start = maxDate(observed.start, bounds.start);
  const end = minDate(observed.end, bounds.end);
  if (start > end) {
    return { ...observed };
  }
  return { start, end };
}
