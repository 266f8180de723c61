/**
 * Category / tier / product filters applied before window recomputation
 */

import type { ProductRow, Segment } from './types';

export interface ProductFilters {
  /** Absent means all categories */
  category?: string;
  segment?: Segment;
  /** Product name */
  product?: string;
}

export interface FilterOptions {
  categories: string[];
  segments: Segment[];
  products: string[];
}

function distinctSorted<T extends string>(values: readonly T[]): T[] {
  return [...new Set(values)].sort((a, b) => a.localeCompare(b));
}

export function filterProducts(
  rows: readonly ProductRow[],
  filters: ProductFilters
): ProductRow[] {
  return rows.filter(
    (row) =>
      (filters.category === undefined || row.category === filters.category) &&
      (filters.segment === undefined || row.segment === filters.segment) &&
      (filters.product === undefined || row.name === filters.product)
  );
}

/**
 * Choices for each filter control. Segment choices are narrowed by the
 * selected category and product choices by category and segment, so a
 * control never offers a value that empties the set by itself.
 */
export function listFilterOptions(
  rows: readonly ProductRow[],
  filters: ProductFilters
): FilterOptions {
  const byCategory = filterProducts(rows, { category: filters.category });
  const bySegment = filterProducts(byCategory, { segment: filters.segment });

  return {
    categories: distinctSorted(rows.map((row) => row.category)),
    segments: distinctSorted(byCategory.map((row) => row.segment)),
    products: distinctSorted(bySegment.map((row) => row.name)),
  };
}
