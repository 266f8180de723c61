/**
 * Dashboard Metrics
 *
 * Headline figures, product rankings and the per-day series derived from a
 * (usually window-filtered) product set. All functions take the display
 * mode explicitly and never infer it from the rows.
 *
 * @module lib/inventory-analytics/dashboard-metrics
 */

import { isWithinRange } from './calendar-date';
import { DEFAULT_RANKING_LIMIT } from './constants';
import { metricPair, metricsFor } from './segment-rollup';
import type { DateRange, DisplayMode, ProductRowBase } from './types';

// ============================================================================
// KPI summary
// ============================================================================

export interface KpiSummary {
  mode: DisplayMode;
  /** Revenue (sales) or stock revenue (inventory) */
  totalValue: number;
  /** Quantity sold (sales) or stock remaining (inventory) */
  totalQuantity: number;
  /** Mean price of the products that contribute to the active metric */
  averagePrice: number;
  /** Product with the largest quantity, null when every quantity is 0 */
  topProduct: string | null;
}

export function summarizeKpis(rows: readonly ProductRowBase[], mode: DisplayMode): KpiSummary {
  let totalValue = 0;
  let totalQuantity = 0;
  let priceSum = 0;
  let priceCount = 0;
  let top: { name: string; quantity: number } | null = null;

  for (const row of rows) {
    const { quantity, value } = metricPair(metricsFor(row, mode));
    totalValue += value;
    totalQuantity += quantity;

    // sales counts products that sold; inventory counts products holding stock value
    const contributes = mode === 'sales' ? quantity > 0 : value > 0;
    if (contributes) {
      priceSum += row.price;
      priceCount++;
    }

    if (top === null || quantity > top.quantity) {
      top = { name: row.name, quantity };
    }
  }

  return {
    mode,
    totalValue,
    totalQuantity,
    averagePrice: priceCount > 0 ? Math.round(priceSum / priceCount) : 0,
    topProduct: top !== null && totalQuantity > 0 ? top.name : null,
  };
}

// ============================================================================
// Rankings
// ============================================================================

export interface RankedProduct {
  id: string;
  name: string;
  quantity: number;
}

export interface ProductRanking {
  top: RankedProduct[];
  slow: RankedProduct[];
}

/**
 * Best and worst movers among products with a positive quantity
 */
export function rankProducts(
  rows: readonly ProductRowBase[],
  mode: DisplayMode,
  limit: number = DEFAULT_RANKING_LIMIT
): ProductRanking {
  const moving = rows
    .map((row) => ({
      id: row.id,
      name: row.name,
      quantity: metricPair(metricsFor(row, mode)).quantity,
    }))
    .filter((item) => item.quantity > 0);

  return {
    top: [...moving].sort((a, b) => b.quantity - a.quantity).slice(0, limit),
    slow: [...moving].sort((a, b) => a.quantity - b.quantity).slice(0, limit),
  };
}

// ============================================================================
// Daily series
// ============================================================================

export interface DailyPoint {
  date: string;
  quantity: number;
  /** Mean unit price over the movements recorded that day */
  averagePrice: number;
  /** quantity × averagePrice, truncated to an integer */
  value: number;
}

export function buildDailySeries(
  rows: readonly ProductRowBase[],
  window: DateRange,
  mode: DisplayMode,
  productName?: string
): DailyPoint[] {
  const days = new Map<string, { quantity: number; priceSum: number; entries: number }>();

  for (const row of rows) {
    if (productName !== undefined && row.name !== productName) continue;

    for (const entry of row.movements) {
      if (!isWithinRange(entry.date, window)) continue;

      const raw = mode === 'sales' ? entry.stock_decreased : entry.stock_increased;
      const day = days.get(entry.date) ?? { quantity: 0, priceSum: 0, entries: 0 };
      day.quantity += Math.max(0, raw);
      day.priceSum += row.price;
      day.entries++;
      days.set(entry.date, day);
    }
  }

  return [...days.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, day]) => {
      const averagePrice = day.priceSum / day.entries;
      return {
        date,
        quantity: day.quantity,
        averagePrice,
        value: Math.floor(Math.max(0, day.quantity * averagePrice)),
      };
    });
}
