/**
 * Event Normalizer
 *
 * Turns one raw product document into a canonical product row with a
 * bounded, validated movement list. Malformed movement entries are dropped
 * and malformed fields fall back to defaults; nothing here throws for bad data.
 *
 * @module lib/inventory-analytics/normalizer
 */

import { z } from 'zod';
import type { Logger } from '@aws-lambda-powertools/logger';

import { parseCalendarDate } from './calendar-date';
import { MAX_SOURCE_PRICE, MIN_PRICE, SNAPSHOT_HISTORY_LIMIT } from './constants';
import { aggregateMovements, revenueFor } from './lifetime-aggregator';
import type { MovementEntry, ProductRowBase, RawProductRecord } from './types';

// ============================================================================
// Schemas
// ============================================================================

/**
 * Missing quantities count as zero; numeric strings are accepted.
 */
const quantitySchema = z.preprocess((value) => {
  if (value === undefined || value === null) return 0;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return value;
}, z.number().finite());

const calendarDateSchema = z.string().transform((value, ctx) => {
  const parsed = parseCalendarDate(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid calendar date: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

export const movementEntrySchema = z.object({
  date: calendarDateSchema,
  stock_decreased: quantitySchema,
  stock_increased: quantitySchema,
});

const priceSchema = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
  z.number().finite().gt(0).lt(MAX_SOURCE_PRICE)
);

// ============================================================================
// Field helpers
// ============================================================================

function textField(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

/**
 * Validated price, rounded and floored, or null when the record must be skipped
 */
export function normalizePrice(value: unknown): number | null {
  const result = priceSchema.safeParse(value);
  if (!result.success) return null;
  return Math.max(MIN_PRICE, Math.round(result.data));
}

/**
 * Keep the first entries of the raw history and drop every entry that fails
 * validation.
 */
export function normalizeMovements(history: unknown): {
  movements: MovementEntry[];
  dropped: number;
} {
  if (!Array.isArray(history)) {
    return { movements: [], dropped: 0 };
  }

  const movements: MovementEntry[] = [];
  let dropped = 0;

  for (const entry of history.slice(0, SNAPSHOT_HISTORY_LIMIT)) {
    const result = movementEntrySchema.safeParse(entry);
    if (result.success) {
      movements.push(result.data);
    } else {
      dropped++;
    }
  }

  return { movements, dropped };
}

// ============================================================================
// Public API
// ============================================================================

export interface NormalizedProduct {
  row: ProductRowBase | null;
  droppedEntries: number;
}

export function normalizeProduct(raw: RawProductRecord): NormalizedProduct {
  const price = normalizePrice(raw.price);
  if (price === null) {
    return { row: null, droppedEntries: 0 };
  }

  const { movements, dropped } = normalizeMovements(raw.stock_history);
  const totals = aggregateMovements(movements);

  return {
    row: {
      id: textField(raw.id),
      name: textField(raw.name),
      category: textField(raw.category),
      price,
      promotion: textField(raw.promotion),
      movements,
      totalSold: totals.sold,
      totalStockIncreased: totals.stockIncreased,
      quantitySold: totals.sold,
      stockRemaining: totals.stockIncreased,
      revenue: revenueFor(price, totals.sold),
      stockRevenue: revenueFor(price, totals.stockIncreased),
    },
    droppedEntries: dropped,
  };
}

export interface NormalizedBatch {
  rows: ProductRowBase[];
  rejected: number;
  droppedEntries: number;
}

export function normalizeProducts(
  records: Iterable<RawProductRecord>,
  logger?: Logger
): NormalizedBatch {
  const rows: ProductRowBase[] = [];
  let rejected = 0;
  let droppedEntries = 0;

  for (const record of records) {
    try {
      const normalized = normalizeProduct(record);
      droppedEntries += normalized.droppedEntries;
      if (normalized.row) {
        rows.push(normalized.row);
      } else {
        rejected++;
      }
    } catch (error) {
      rejected++;
      logger?.warn('Skipping product that failed normalization', {
        productId: textField(record.id),
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { rows, rejected, droppedEntries };
}
