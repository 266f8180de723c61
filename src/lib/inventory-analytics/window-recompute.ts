/**
 * Window Recomputation Engine
 *
 * Restricts each product's movements to an inclusive date range and
 * recomputes the window figures from that subset only. Lifetime totals and
 * segments are carried over unchanged.
 *
 * @module lib/inventory-analytics/window-recompute
 */

import type { Logger } from '@aws-lambda-powertools/logger';

import { isWithinRange } from './calendar-date';
import { aggregateMovements, revenueFor } from './lifetime-aggregator';
import type { DateRange, ProductRow } from './types';

export interface WindowFailure {
  productId: string;
  error: string;
}

export interface WindowResult {
  rows: ProductRow[];
  /** Rows that kept their pre-filter values */
  failures: WindowFailure[];
}

export function recomputeRow(row: ProductRow, range: DateRange): ProductRow {
  const movements = row.movements.filter((entry) => isWithinRange(entry.date, range));
  const totals = aggregateMovements(movements);

  return {
    ...row,
    movements,
    quantitySold: totals.sold,
    stockRemaining: totals.stockIncreased,
    revenue: revenueFor(row.price, totals.sold),
    stockRevenue: revenueFor(row.price, totals.stockIncreased),
  };
}

/**
 * Apply a date window to every row. An inverted range (start after end)
 * matches nothing, so every row comes back with zeroed window figures.
 */
export function recomputeWindow(
  rows: readonly ProductRow[],
  range: DateRange,
  logger?: Logger,
  recompute: (row: ProductRow, range: DateRange) => ProductRow = recomputeRow
): WindowResult {
  const failures: WindowFailure[] = [];

  const result = rows.map((row) => {
    try {
      return recompute(row, range);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      failures.push({ productId: row.id, error: message });
      return row;
    }
  });

  if (failures.length > 0) {
    logger?.warn('Window recomputation fell back to pre-filter values', {
      failedRows: failures.length,
      totalRows: rows.length,
      range,
      firstError: failures[0].error,
    });
  }

  return { rows: result, failures };
}
