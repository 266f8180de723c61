import type { MovementEntry, ProductRow } from '../types';

export function movement(date: string, sold: number, increased: number = 0): MovementEntry {
  return { date, stock_decreased: sold, stock_increased: increased };
}

/**
 * Product row whose window figures equal its lifetime totals
 */
export function makeRow(overrides: Partial<ProductRow> & { id: string }): ProductRow {
  const price = overrides.price ?? 1000;
  const movements = overrides.movements ?? [];
  const sold = movements.reduce((acc, m) => acc + Math.max(0, m.stock_decreased), 0);
  const increased = movements.reduce((acc, m) => acc + Math.max(0, m.stock_increased), 0);

  return {
    name: overrides.id,
    category: 'Food',
    promotion: '',
    totalSold: sold,
    totalStockIncreased: increased,
    quantitySold: sold,
    stockRemaining: increased,
    revenue: price * sold,
    stockRevenue: price * increased,
    segment: 'medium',
    ...overrides,
    price,
    movements,
  };
}
