import { filterProducts, listFilterOptions } from '../product-filters';
import { makeRow } from './fixtures';

describe('product filters', () => {
  const rows = [
    makeRow({ id: 'p1', name: 'Rice', category: 'Food', segment: 'low' }),
    makeRow({ id: 'p2', name: 'Oil', category: 'Food', segment: 'high' }),
    makeRow({ id: 'p3', name: 'Soap', category: 'Household', segment: 'medium' }),
  ];

  it('should return every row when no filter is set', () => {
    expect(filterProducts(rows, {})).toHaveLength(3);
  });

  it('should combine category, segment and product filters', () => {
    expect(filterProducts(rows, { category: 'Food' }).map((r) => r.id)).toEqual(['p1', 'p2']);
    expect(filterProducts(rows, { category: 'Food', segment: 'high' }).map((r) => r.id)).toEqual(['p2']);
    expect(filterProducts(rows, { product: 'Soap', category: 'Food' })).toEqual([]);
  });

  it('should narrow option lists by the selections above them', () => {
    expect(listFilterOptions(rows, { category: 'Food' })).toEqual({
      categories: ['Food', 'Household'],
      segments: ['high', 'low'],
      products: ['Oil', 'Rice'],
    });
    expect(listFilterOptions(rows, { category: 'Food', segment: 'low' }).products).toEqual(['Rice']);
  });
});
