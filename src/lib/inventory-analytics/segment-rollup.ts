/**
 * Segment Rollup
 *
 * Groups products by tier and reports per-tier totals with percentage
 * shares. Always returns exactly one row per known tier, in display order.
 */

import { KNOWN_SEGMENTS } from './types';
import type {
  DisplayMode,
  KnownSegment,
  ModeMetrics,
  ProductRowBase,
  Segment,
  SegmentSummary,
} from './types';

export function metricsFor(row: ProductRowBase, mode: DisplayMode): ModeMetrics {
  if (mode === 'sales') {
    return { mode, quantitySold: row.quantitySold, revenue: row.revenue };
  }
  return { mode, stockRemaining: row.stockRemaining, stockRevenue: row.stockRevenue };
}

/**
 * Quantity / value pair of whichever metric set is active
 */
export function metricPair(metrics: ModeMetrics): { quantity: number; value: number } {
  switch (metrics.mode) {
    case 'sales':
      return { quantity: metrics.quantitySold, value: metrics.revenue };
    case 'inventory':
      return { quantity: metrics.stockRemaining, value: metrics.stockRevenue };
  }
}

function isKnownSegment(segment: Segment): segment is KnownSegment {
  return segment !== 'undefined';
}

/**
 * Shares of `total` in percent, each rounded to one decimal on its own, so
 * the sum may drift from 100 by a tenth.
 */
export function percentShares(values: readonly number[], total: number): number[] {
  if (total <= 0) return values.map(() => 0);
  return values.map((v) => Math.round((v / total) * 1000) / 10);
}

export function rollupSegments(
  rows: readonly (ProductRowBase & { segment: Segment })[],
  mode: DisplayMode
): SegmentSummary[] {
  const sums = new Map<KnownSegment, { quantity: number; value: number }>(
    KNOWN_SEGMENTS.map((segment) => [segment, { quantity: 0, value: 0 }])
  );

  for (const row of rows) {
    if (!isKnownSegment(row.segment)) continue;
    const bucket = sums.get(row.segment);
    if (!bucket) continue;
    const { quantity, value } = metricPair(metricsFor(row, mode));
    bucket.quantity += quantity;
    bucket.value += value;
  }

  const buckets = KNOWN_SEGMENTS.map((segment) => ({
    segment,
    quantity: sums.get(segment)?.quantity ?? 0,
    value: sums.get(segment)?.value ?? 0,
  }));

  const totalValue = buckets.reduce((acc, b) => acc + b.value, 0);
  const totalQuantity = buckets.reduce((acc, b) => acc + b.quantity, 0);
  const revenuePct = percentShares(buckets.map((b) => b.value), totalValue);
  const quantityPct = percentShares(buckets.map((b) => b.quantity), totalQuantity);

  return buckets.map((bucket, index) => ({
    segment: bucket.segment,
    quantitySold: bucket.quantity,
    revenue: bucket.value,
    revenuePct: revenuePct[index],
    quantityPct: quantityPct[index],
  }));
}
