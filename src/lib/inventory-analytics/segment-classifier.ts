/**
 * Segmentation Classifier
 *
 * Assigns price tiers relative to the current product set. Thresholds are the
 * 25th and 75th price percentiles, so the same product can change tier when
 * the set changes.
 */

import { HIGH_TIER_PERCENTILE, LOW_TIER_PERCENTILE } from './constants';
import type { Segment } from './types';

/**
 * Percentile with linear interpolation between closest ranks.
 * `sorted` must be ascending and non-empty.
 */
export function percentile(sorted: readonly number[], q: number): number {
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  if (lower === upper) return sorted[lower];
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export type TierThresholds =
  | { kind: 'percentile'; low: number; high: number }
  | { kind: 'midpoint'; midpoint: number }
  | { kind: 'uniform' }
  | { kind: 'none' };

/**
 * Work out which classification branch applies to a set of prices
 */
export function computeThresholds(prices: readonly number[]): TierThresholds {
  const finite = prices.filter((p) => Number.isFinite(p)).sort((a, b) => a - b);
  if (finite.length === 0) {
    return { kind: 'none' };
  }

  const low = percentile(finite, LOW_TIER_PERCENTILE);
  const high = percentile(finite, HIGH_TIER_PERCENTILE);
  if (low !== high) {
    return { kind: 'percentile', low, high };
  }

  const min = finite[0];
  const max = finite[finite.length - 1];
  if (min === max) {
    return { kind: 'uniform' };
  }

  return { kind: 'midpoint', midpoint: (min + max) / 2 };
}

export function segmentForPrice(price: number, thresholds: TierThresholds): Segment {
  if (!Number.isFinite(price)) return 'undefined';

  switch (thresholds.kind) {
    case 'none':
      return 'undefined';
    case 'uniform':
      return 'medium';
    case 'midpoint':
      return price < thresholds.midpoint ? 'low' : 'high';
    case 'percentile':
      if (price <= thresholds.low) return 'low';
      if (price <= thresholds.high) return 'medium';
      return 'high';
  }
}

/**
 * Tag every row with its tier. Returns new objects; inputs are not mutated.
 */
export function classifySegments<T extends { price: number }>(
  rows: readonly T[]
): Array<T & { segment: Segment }> {
  const thresholds = computeThresholds(rows.map((row) => row.price));
  return rows.map((row) => ({ ...row, segment: segmentForPrice(row.price, thresholds) }));
}
