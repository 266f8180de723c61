/**
 * Inventory Analytics Types
 *
 * Core type definitions for the product snapshot, price-tier segmentation
 * and window recomputation.
 */

/**
 * Raw product document as returned by the products table.
 * Every field is optional and untyped: the normalizer owns validation.
 */
export interface RawProductRecord {
  id?: unknown;
  name?: unknown;
  category?: unknown;
  price?: unknown;
  promotion?: unknown;
  stock_history?: unknown;
  [key: string]: unknown;
}

/**
 * One dated stock movement for a product
 */
export interface MovementEntry {
  /** Calendar date, zero-padded YYYY-MM-DD */
  date: string;
  stock_decreased: number;
  stock_increased: number;
}

/**
 * Price tier. `undefined` is the fallback when no usable price exists.
 */
export type Segment = 'low' | 'medium' | 'high' | 'undefined';

/**
 * The three tiers shown in rollups, in display order
 */
export const KNOWN_SEGMENTS = ['low', 'medium', 'high'] as const;

export type KnownSegment = (typeof KNOWN_SEGMENTS)[number];

/**
 * Selects which metric pair is active for rollups and rankings
 */
export type DisplayMode = 'sales' | 'inventory';

export interface SalesMetrics {
  mode: 'sales';
  quantitySold: number;
  revenue: number;
}

export interface InventoryMetrics {
  mode: 'inventory';
  stockRemaining: number;
  stockRevenue: number;
}

export type ModeMetrics = SalesMetrics | InventoryMetrics;

/**
 * Product row as produced by the normalizer, before segmentation
 */
export interface ProductRowBase {
  id: string;
  name: string;
  category: string;
  /** Rounded to 0 decimals, never below 1000 */
  price: number;
  promotion: string;
  /** At most 50 validated entries */
  movements: readonly MovementEntry[];

  /** Lifetime totals */
  totalSold: number;
  totalStockIncreased: number;

  /** Window figures; equal to the lifetime totals until a window is applied */
  quantitySold: number;
  stockRemaining: number;
  revenue: number;
  stockRevenue: number;
}

export interface ProductRow extends ProductRowBase {
  segment: Segment;
}

/**
 * Per-tier rollup. In inventory mode `quantitySold` and `revenue` carry
 * stock remaining and stock revenue.
 */
export interface SegmentSummary {
  segment: KnownSegment;
  quantitySold: number;
  revenue: number;
  revenuePct: number;
  quantityPct: number;
}

/**
 * Inclusive calendar date range (YYYY-MM-DD)
 */
export interface DateRange {
  start: string;
  end: string;
}

/**
 * Load statistics reported with each snapshot
 */
export interface LoadStats {
  fetched: number;
  accepted: number;
  rejected: number;
  droppedEntries: number;
}

/**
 * Immutable result of one load: normalized, aggregated, classified
 */
export interface ProductSnapshot {
  rows: readonly ProductRow[];
  dateRange: DateRange;
  stats: LoadStats;
  loadedAt: string;
}
