/**
 * Tests for the Event Normalizer
 *
 * Covers:
 * - Price validation, rounding and the 1000 floor
 * - History capping and per-entry validation
 * - Field defaults for malformed records
 */

import { normalizeMovements, normalizePrice, normalizeProduct, normalizeProducts } from '../normalizer';

describe('normalizePrice', () => {
  it('should round and floor valid prices', () => {
    expect(normalizePrice(1500.4)).toBe(1500);
    expect(normalizePrice(999.6)).toBe(1000);
    expect(normalizePrice(500)).toBe(1000);
    expect(normalizePrice('2500')).toBe(2500);
  });

  it('should reject prices outside (0, 1e9) or unusable values', () => {
    expect(normalizePrice(0)).toBeNull();
    expect(normalizePrice(-5)).toBeNull();
    expect(normalizePrice(1_000_000_000)).toBeNull();
    expect(normalizePrice(undefined)).toBeNull();
    expect(normalizePrice(Number.NaN)).toBeNull();
    expect(normalizePrice(Number.POSITIVE_INFINITY)).toBeNull();
    expect(normalizePrice('abc')).toBeNull();
  });
});

describe('normalizeMovements', () => {
  it('should keep only the first 50 entries', () => {
    const history = Array.from({ length: 60 }, (_, i) => ({
      date: `2025-04-${String((i % 28) + 1).padStart(2, '0')}`,
      stock_decreased: 1,
      stock_increased: 0,
    }));

    const { movements, dropped } = normalizeMovements(history);

    expect(movements).toHaveLength(50);
    expect(dropped).toBe(0);
  });

  it('should cap before validating', () => {
    const invalid = Array.from({ length: 50 }, () => ({ date: 'bad' }));
    const history = [...invalid, { date: '2025-04-01', stock_decreased: 3 }];

    const { movements, dropped } = normalizeMovements(history);

    expect(movements).toEqual([]);
    expect(dropped).toBe(50);
  });

  it('should drop unparsable dates and non-object entries', () => {
    const { movements, dropped } = normalizeMovements([
      { date: 'not-a-date', stock_decreased: 10 },
      { date: '2025-02-30', stock_decreased: 1 },
      '2025-03-01',
      null,
      [1, 2],
      { stock_decreased: 4 },
      { date: '2025-03-10', stock_decreased: 5, stock_increased: 2 },
    ]);

    expect(movements).toEqual([{ date: '2025-03-10', stock_decreased: 5, stock_increased: 2 }]);
    expect(dropped).toBe(6);
  });

  it('should default missing quantities to zero and reject non-numeric ones', () => {
    const { movements, dropped } = normalizeMovements([
      { date: '2025-03-01' },
      { date: '2025-03-02', stock_decreased: null, stock_increased: '7' },
      { date: '2025-03-03', stock_decreased: 'abc' },
      { date: '2025-03-04', stock_increased: '' },
    ]);

    expect(movements).toEqual([
      { date: '2025-03-01', stock_decreased: 0, stock_increased: 0 },
      { date: '2025-03-02', stock_decreased: 0, stock_increased: 7 },
    ]);
    expect(dropped).toBe(2);
  });

  it('should zero-pad single digit months and days', () => {
    const { movements } = normalizeMovements([{ date: '2025-3-5', stock_decreased: 1 }]);

    expect(movements[0].date).toBe('2025-03-05');
  });

  it('should return no movements when history is not a list', () => {
    expect(normalizeMovements(undefined)).toEqual({ movements: [], dropped: 0 });
    expect(normalizeMovements('[]')).toEqual({ movements: [], dropped: 0 });
  });
});

describe('normalizeProduct', () => {
  it('should build a row with lifetime totals and revenues', () => {
    const { row, droppedEntries } = normalizeProduct({
      id: 'p1',
      name: 'Jasmine rice 5kg',
      category: 'Food',
      price: 2000,
      promotion: 'Buy 2 get 1',
      stock_history: [
        { date: 'not-a-date', stock_decreased: 10 },
        { date: '2025-03-10', stock_decreased: 5, stock_increased: 2 },
        { date: '2025-03-11', stock_decreased: -4, stock_increased: 1 },
      ],
    });

    expect(droppedEntries).toBe(1);
    expect(row).toEqual({
      id: 'p1',
      name: 'Jasmine rice 5kg',
      category: 'Food',
      price: 2000,
      promotion: 'Buy 2 get 1',
      movements: [
        { date: '2025-03-10', stock_decreased: 5, stock_increased: 2 },
        { date: '2025-03-11', stock_decreased: -4, stock_increased: 1 },
      ],
      totalSold: 5,
      totalStockIncreased: 3,
      quantitySold: 5,
      stockRemaining: 3,
      revenue: 10000,
      stockRevenue: 6000,
    });
  });

  it('should default missing text fields to empty strings', () => {
    const { row } = normalizeProduct({ id: 42, name: { text: 'x' }, price: 3000 });

    expect(row?.id).toBe('42');
    expect(row?.name).toBe('');
    expect(row?.category).toBe('');
    expect(row?.promotion).toBe('');
    expect(row?.movements).toEqual([]);
    expect(row?.totalSold).toBe(0);
  });

  it('should skip records without a valid price', () => {
    expect(normalizeProduct({ id: 'p1', price: 0 }).row).toBeNull();
    expect(normalizeProduct({ id: 'p2' }).row).toBeNull();
  });
});

describe('normalizeProducts', () => {
  it('should report accepted, rejected and dropped counts', () => {
    const batch = normalizeProducts([
      { id: 'p1', price: 1000, stock_history: [{ date: 'bad' }] },
      { id: 'p2', price: -1 },
      { id: 'p3', price: 4000, stock_history: [{ date: '2025-04-01', stock_decreased: 2 }] },
    ]);

    expect(batch.rows.map((row) => row.id)).toEqual(['p1', 'p3']);
    expect(batch.rejected).toBe(1);
    expect(batch.droppedEntries).toBe(1);
  });
});
