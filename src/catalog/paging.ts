/**
 * Pricewise — Sorting & Pagination
 */

import type { CatalogSortField, Page, PageRequest, SortField, SortOrder } from '../types';

interface Sortable {
  price: number;
  bestPrice?: number;
  rating?: number;
}

function sortValue(item: Sortable, field: SortField): number | undefined {
  return field === 'price' ? item.bestPrice ?? item.price : item.rating;
}

/**
 * Stable sort by price (best price when merged) or rating.
 * Items without a value for the field always go last.
 */
export function sortProducts<T extends Sortable>(
  items: readonly T[],
  sortBy: SortField,
  sortOrder: SortOrder
): T[] {
  const direction = sortOrder === 'asc' ? 1 : -1;

  return [...items].sort((a, b) => {
    const left = sortValue(a, sortBy);
    const right = sortValue(b, sortBy);

    if (left === undefined && right === undefined) return 0;
    if (left === undefined) return 1;
    if (right === undefined) return -1;
    return (left - right) * direction;
  });
}

interface Timestamped extends Sortable {
  createdAt: string;
  updatedAt: string;
}

/**
 * Stable sort for catalog listings: price and rating as in sortProducts,
 * or by an ISO timestamp.
 */
export function sortCatalog<T extends Timestamped>(
  items: readonly T[],
  sortBy: CatalogSortField,
  sortOrder: SortOrder
): T[] {
  if (sortBy === 'price' || sortBy === 'rating') {
    return sortProducts(items, sortBy, sortOrder);
  }

  const direction = sortOrder === 'asc' ? 1 : -1;
  return [...items].sort((a, b) => (Date.parse(a[sortBy]) - Date.parse(b[sortBy])) * direction);
}

/**
 * Slice one page. Pages are 1-based; a page past the end is empty.
 */
export function paginate<T>(items: readonly T[], request: Pick<PageRequest, 'page' | 'perPage'>): Page<T> {
  const { page, perPage } = request;
  const total = items.length;
  const totalPages = total === 0 ? 0 : Math.ceil(total / perPage);
  const start = (page - 1) * perPage;

  return {
    items: items.slice(start, start + perPage),
    pagination: {
      page,
      perPage,
      total,
      totalPages,
      hasNext: page < totalPages,
      hasPrev: page > 1,
    },
  };
}
