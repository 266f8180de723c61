import { aggregateMovements, revenueFor } from '../lifetime-aggregator';
import { movement } from './fixtures';

describe('aggregateMovements', () => {
  it('should return zeros for an empty history', () => {
    expect(aggregateMovements([])).toEqual({ sold: 0, stockIncreased: 0 });
  });

  it('should sum sold and increased quantities', () => {
    const totals = aggregateMovements([
      movement('2025-03-10', 5, 2),
      movement('2025-03-11', 3, 10),
    ]);

    expect(totals).toEqual({ sold: 8, stockIncreased: 12 });
  });

  it('should treat negative quantities as zero contribution', () => {
    const totals = aggregateMovements([
      movement('2025-03-10', -7, -2),
      movement('2025-03-11', 4, -1),
    ]);

    expect(totals).toEqual({ sold: 4, stockIncreased: 0 });
  });

  it('should round the final sums', () => {
    const totals = aggregateMovements([
      movement('2025-03-10', 1.4, 0.2),
      movement('2025-03-11', 1.4, 0.2),
    ]);

    expect(totals).toEqual({ sold: 3, stockIncreased: 0 });
  });
});

describe('revenueFor', () => {
  it('should multiply and round', () => {
    expect(revenueFor(1500, 3)).toBe(4500);
    expect(revenueFor(1000, 0)).toBe(0);
  });
});
