/**
 * Inventory Analytics Module
 *
 * Aggregation and segmentation engine for per-product stock movements:
 * - Normalization of raw product documents
 * - Lifetime sold / stock totals
 * - Percentile-based price tiers
 * - Date-window recomputation and per-tier rollups
 */

export { normalizeProduct, normalizeProducts, normalizeMovements, normalizePrice } from './normalizer';
export { aggregateMovements, revenueFor } from './lifetime-aggregator';
export { classifySegments, computeThresholds, percentile, segmentForPrice } from './segment-classifier';
export { recomputeWindow, recomputeRow, type WindowResult, type WindowFailure } from './window-recompute';
export { rollupSegments, metricsFor, metricPair, percentShares } from './segment-rollup';
export { filterProducts, listFilterOptions, type ProductFilters, type FilterOptions } from './product-filters';
export { summarizeKpis, rankProducts, buildDailySeries, type KpiSummary, type ProductRanking, type DailyPoint } from './dashboard-metrics';
export { observedDateRange, defaultWindow } from './date-range';
export { parseCalendarDate } from './calendar-date';
export { SEGMENT_LABELS, DISPLAY_MODE_LABELS, segmentLabel, parseSegment, parseDisplayMode } from './labels';
export { DynamoProductSource, type ProductSource, type SourceFetchResult } from './product-source';
export {
  InventoryAnalyticsService,
  buildSnapshot,
  type DashboardQuery,
  type DashboardResult,
  type DashboardData,
  type EmptyDashboard,
} from './inventory-analytics-service';
export * from './types';
