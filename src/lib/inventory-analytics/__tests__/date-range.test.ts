import { defaultWindow, observedDateRange } from '../date-range';
import { makeRow, movement } from './fixtures';

describe('observedDateRange', () => {
  it('should span the earliest and latest movement', () => {
    const rows = [
      makeRow({ id: 'p1', movements: [movement('2025-04-02', 1), movement('2025-03-15', 1)] }),
      makeRow({ id: 'p2', movements: [movement('2025-05-20', 1)] }),
    ];

    expect(observedDateRange(rows)).toEqual({ start: '2025-03-15', end: '2025-05-20' });
  });

  it('should fall back to the default range when there are no movements', () => {
    expect(observedDateRange([makeRow({ id: 'p1' })])).toEqual({ start: '2025-03-05', end: '2025-05-25' });
    expect(observedDateRange([], { start: '2024-01-01', end: '2024-12-31' })).toEqual({
      start: '2024-01-01',
      end: '2024-12-31',
    });
  });
});

describe('defaultWindow', () => {
  it('should clip the default bounds to the observed range', () => {
    expect(defaultWindow({ start: '2025-03-01', end: '2025-06-30' })).toEqual({
      start: '2025-03-05',
      end: '2025-05-18',
    });
    expect(defaultWindow({ start: '2025-03-10', end: '2025-04-01' })).toEqual({
      start: '2025-03-10',
      end: '2025-04-01',
    });
  });

  it('should use the observed range when clipping leaves nothing', () => {
    expect(defaultWindow({ start: '2024-01-01', end: '2024-02-01' })).toEqual({
      start: '2024-01-01',
      end: '2024-02-01',
    });
  });
});
