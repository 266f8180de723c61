/**
 * Inventory analytics constants
 */

import type { DateRange } from './types';

/** Price floor applied to every accepted product */
export const MIN_PRICE = 1000;

/** Exclusive upper bound for a valid source price */
export const MAX_SOURCE_PRICE = 1_000_000_000;

/** History entries kept per product by the source adapter */
export const SOURCE_HISTORY_LIMIT = 100;

/** History entries kept per product in the snapshot */
export const SNAPSHOT_HISTORY_LIMIT = 50;

/** Date range reported when the snapshot holds no dated movements */
export const FALLBACK_DATE_RANGE: DateRange = {
  start: '2025-03-05',
  end: '2025-05-25',
};

/** Bounds of the window selected when the caller gives none */
export const DEFAULT_WINDOW_BOUNDS: DateRange = {
  start: '2025-03-05',
  end: '2025-05-18',
};

/** Percentiles used for three-tier classification */
export const LOW_TIER_PERCENTILE = 0.25;
export const HIGH_TIER_PERCENTILE = 0.75;

export const DEFAULT_RANKING_LIMIT = 5;
