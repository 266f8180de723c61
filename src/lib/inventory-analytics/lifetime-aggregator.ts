/**
 * Lifetime Aggregator
 *
 * Sums a product's movement history into sold / stock-increased totals.
 * Negative quantities contribute nothing; they are not treated as reversals.
 */

import type { MovementEntry } from './types';

export interface MovementTotals {
  sold: number;
  stockIncreased: number;
}

export function aggregateMovements(movements: readonly MovementEntry[]): MovementTotals {
  let sold = 0;
  let stockIncreased = 0;

  for (const entry of movements) {
    sold += Math.max(0, entry.stock_decreased);
    stockIncreased += Math.max(0, entry.stock_increased);
  }

  return {
    sold: Math.round(sold),
    stockIncreased: Math.round(stockIncreased),
  };
}

/**
 * Revenue figure for a quantity at a unit price, never negative
 */
export function revenueFor(price: number, quantity: number): number {
  return Math.max(0, Math.round(price * quantity));
}
