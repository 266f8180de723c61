/**
 * Tests for KPI summary, product ranking and the daily series
 */

import { buildDailySeries, rankProducts, summarizeKpis } from '../dashboard-metrics';
import { makeRow, movement } from './fixtures';

describe('summarizeKpis', () => {
  const rows = [
    makeRow({ id: 'p1', name: 'Rice', price: 1000, quantitySold: 5, revenue: 5000, stockRemaining: 0, stockRevenue: 0 }),
    makeRow({ id: 'p2', name: 'Oil', price: 5000, quantitySold: 3, revenue: 15000, stockRemaining: 2, stockRevenue: 10000 }),
    makeRow({ id: 'p3', name: 'Salt', price: 3000, quantitySold: 0, revenue: 0, stockRemaining: 1, stockRevenue: 3000 }),
  ];

  it('should summarize sales figures', () => {
    expect(summarizeKpis(rows, 'sales')).toEqual({
      mode: 'sales',
      totalValue: 20000,
      totalQuantity: 8,
      averagePrice: 3000,
      topProduct: 'Rice',
    });
  });

  it('should summarize inventory figures', () => {
    expect(summarizeKpis(rows, 'inventory')).toEqual({
      mode: 'inventory',
      totalValue: 13000,
      totalQuantity: 3,
      averagePrice: 4000,
      topProduct: 'Oil',
    });
  });

  it('should report no top product when nothing moved', () => {
    const idle = [makeRow({ id: 'p1', quantitySold: 0, revenue: 0 })];

    expect(summarizeKpis(idle, 'sales')).toEqual({
      mode: 'sales',
      totalValue: 0,
      totalQuantity: 0,
      averagePrice: 0,
      topProduct: null,
    });
  });
});

describe('rankProducts', () => {
  it('should rank moving products both ways and respect the limit', () => {
    const rows = [
      makeRow({ id: 'p1', name: 'A', quantitySold: 5 }),
      makeRow({ id: 'p2', name: 'B', quantitySold: 0 }),
      makeRow({ id: 'p3', name: 'C', quantitySold: 9 }),
      makeRow({ id: 'p4', name: 'D', quantitySold: 1 }),
    ];

    const ranking = rankProducts(rows, 'sales', 2);

    expect(ranking.top).toEqual([
      { id: 'p3', name: 'C', quantity: 9 },
      { id: 'p1', name: 'A', quantity: 5 },
    ]);
    expect(ranking.slow).toEqual([
      { id: 'p4', name: 'D', quantity: 1 },
      { id: 'p1', name: 'A', quantity: 5 },
    ]);
  });
});

describe('buildDailySeries', () => {
  const rows = [
    makeRow({
      id: 'p1',
      name: 'Rice',
      price: 1000,
      movements: [movement('2025-03-11', 1, 4), movement('2025-03-10', 2, 0), movement('2025-06-01', 7, 0)],
    }),
    makeRow({ id: 'p2', name: 'Oil', price: 3000, movements: [movement('2025-03-10', 4, -2)] }),
  ];
  const window = { start: '2025-03-01', end: '2025-03-31' };

  it('should aggregate sales per day inside the window', () => {
    expect(buildDailySeries(rows, window, 'sales')).toEqual([
      { date: '2025-03-10', quantity: 6, averagePrice: 2000, value: 12000 },
      { date: '2025-03-11', quantity: 1, averagePrice: 1000, value: 1000 },
    ]);
  });

  it('should aggregate stock increases in inventory mode', () => {
    expect(buildDailySeries(rows, window, 'inventory')).toEqual([
      { date: '2025-03-10', quantity: 0, averagePrice: 2000, value: 0 },
      { date: '2025-03-11', quantity: 4, averagePrice: 1000, value: 4000 },
    ]);
  });

  it('should restrict the series to one product when named', () => {
    expect(buildDailySeries(rows, window, 'sales', 'Oil')).toEqual([
      { date: '2025-03-10', quantity: 4, averagePrice: 3000, value: 12000 },
    ]);
  });
});
