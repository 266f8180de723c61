/**
 * Inventory Analytics Service
 *
 * Loads the product snapshot once per cache window (normalize → aggregate →
 * classify) and answers dashboard queries against it (filter → window →
 * rollup). Queries never touch the source and never mutate the snapshot.
 *
 * @module lib/inventory-analytics/inventory-analytics-service
 */

import { Logger } from '@aws-lambda-powertools/logger';

import { SnapshotCache } from '../cache/snapshot-cache';
import { isWithinRange } from './calendar-date';
import { DEFAULT_WINDOW_BOUNDS, FALLBACK_DATE_RANGE } from './constants';
import {
  buildDailySeries,
  rankProducts,
  summarizeKpis,
  type DailyPoint,
  type KpiSummary,
  type ProductRanking,
} from './dashboard-metrics';
import { defaultWindow, observedDateRange } from './date-range';
import { normalizeProducts } from './normalizer';
import { filterProducts, listFilterOptions, type FilterOptions, type ProductFilters } from './product-filters';
import type { ProductSource, SourceFetchResult } from './product-source';
import { classifySegments } from './segment-classifier';
import { rollupSegments } from './segment-rollup';
import type {
  DateRange,
  DisplayMode,
  ProductRow,
  ProductSnapshot,
  SegmentSummary,
} from './types';
import { recomputeWindow, type WindowFailure } from './window-recompute';

// ============================================================================
// Types
// ============================================================================

export interface InventoryAnalyticsServiceConfig {
  source: ProductSource;
  /** Snapshot TTL in seconds (default: 600); ignored when `cache` is given */
  cacheTtlSeconds?: number;
  cache?: SnapshotCache<ProductSnapshot>;
  /** Reported range when the snapshot has no dated movements */
  fallbackDateRange?: DateRange;
  /** Bounds of the window used when a query gives none */
  defaultWindowBounds?: DateRange;
  logger?: Logger;
  now?: () => Date;
}

export interface DashboardQuery {
  mode: DisplayMode;
  filters?: ProductFilters;
  /** Missing bounds fall back to the default window */
  window?: Partial<DateRange>;
}

interface DashboardContext {
  mode: DisplayMode;
  dateRange: DateRange;
  window: DateRange;
  options: FilterOptions;
}

export interface EmptyDashboard extends DashboardContext {
  status: 'empty';
  /** no-products: filters matched nothing; no-movements: nothing happened in the window */
  reason: 'no-products' | 'no-movements';
}

export interface DashboardData extends DashboardContext {
  status: 'ok';
  rows: ProductRow[];
  segments: SegmentSummary[];
  kpis: KpiSummary;
  ranking: ProductRanking;
  daily: DailyPoint[];
  failures: WindowFailure[];
}

export type DashboardResult = EmptyDashboard | DashboardData;

// ============================================================================
// Snapshot construction
// ============================================================================

/**
 * Build an immutable snapshot from one source fetch
 */
export function buildSnapshot(
  fetched: SourceFetchResult,
  options: { fallbackDateRange?: DateRange; loadedAt?: Date; logger?: Logger } = {}
): ProductSnapshot {
  const batch = normalizeProducts(fetched.records, options.logger);
  const rows = classifySegments(batch.rows).map((row) => Object.freeze(row));

  return Object.freeze({
    rows: Object.freeze(rows),
    dateRange: observedDateRange(rows, options.fallbackDateRange ?? FALLBACK_DATE_RANGE),
    stats: {
      fetched: fetched.records.length,
      accepted: rows.length,
      rejected: batch.rejected,
      droppedEntries: batch.droppedEntries,
    },
    loadedAt: (options.loadedAt ?? new Date()).toISOString(),
  });
}

// ============================================================================
// Service
// ============================================================================

export class InventoryAnalyticsService {
  private source: ProductSource;
  private cache: SnapshotCache<ProductSnapshot>;
  private fallbackDateRange: DateRange;
  private defaultWindowBounds: DateRange;
  private logger: Logger;
  private now: () => Date;

  constructor(config: InventoryAnalyticsServiceConfig) {
    this.source = config.source;
    this.logger = config.logger ?? new Logger({ serviceName: 'inventory-segments' });
    this.cache =
      config.cache ??
      new SnapshotCache<ProductSnapshot>({
        ttlSeconds: config.cacheTtlSeconds ?? 600,
        logger: this.logger,
      });
    this.fallbackDateRange = config.fallbackDateRange ?? FALLBACK_DATE_RANGE;
    this.defaultWindowBounds = config.defaultWindowBounds ?? DEFAULT_WINDOW_BOUNDS;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Current snapshot, loading it from the source when the cached one has
   * expired.
   *
   * @throws SourceUnavailableError when the source cannot be read
   */
  async loadSnapshot(): Promise<ProductSnapshot> {
    return this.cache.getOrLoad(this.source.identity, async () => {
      const fetched = await this.source.fetchProducts();
      const snapshot = buildSnapshot(fetched, {
        fallbackDateRange: this.fallbackDateRange,
        loadedAt: this.now(),
        logger: this.logger,
      });

      this.logger.info('Product snapshot built', {
        source: this.source.identity,
        scanned: fetched.scanned,
        ...snapshot.stats,
        dateRange: snapshot.dateRange,
      });

      return snapshot;
    });
  }

  async query(query: DashboardQuery): Promise<DashboardResult> {
    const snapshot = await this.loadSnapshot();
    return this.evaluate(snapshot, query);
  }

  /**
   * Run a dashboard query against a given snapshot
   */
  evaluate(snapshot: ProductSnapshot, query: DashboardQuery): DashboardResult {
    const filters = query.filters ?? {};
    const preset = defaultWindow(snapshot.dateRange, this.defaultWindowBounds);
    const window: DateRange = {
      start: query.window?.start ?? preset.start,
      end: query.window?.end ?? preset.end,
    };

    const context: DashboardContext = {
      mode: query.mode,
      dateRange: snapshot.dateRange,
      window,
      options: listFilterOptions(snapshot.rows, filters),
    };

    const selected = filterProducts(snapshot.rows, filters);
    if (selected.length === 0) {
      return { ...context, status: 'empty', reason: 'no-products' };
    }

    const hasActivity = selected.some((row) =>
      row.movements.some((entry) => isWithinRange(entry.date, window))
    );
    if (!hasActivity) {
      return { ...context, status: 'empty', reason: 'no-movements' };
    }

    const windowed = recomputeWindow(selected, window, this.logger);

    return {
      ...context,
      status: 'ok',
      rows: windowed.rows,
      segments: rollupSegments(windowed.rows, query.mode),
      kpis: summarizeKpis(windowed.rows, query.mode),
      ranking: rankProducts(windowed.rows, query.mode),
      daily: buildDailySeries(windowed.rows, window, query.mode, filters.product),
      failures: windowed.failures,
    };
  }

  invalidate(): void {
    this.cache.invalidate(this.source.identity);
  }
}
