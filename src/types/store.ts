/**
 * Pricewise — Store Types
 */

import type { ListingSource, NormalizedProduct } from './listing';

/**
 * What the pipeline hands to the store. Aggregated products carry their
 * merged sources; single scrapes do not.
 */
export interface ProductInput extends NormalizedProduct {
  sources?: ListingSource[];
  bestPrice?: number;
}

export interface StoredProduct extends ProductInput {
  id: number;
  createdAt: string;
  updatedAt: string;
}

export interface PriceSample {
  productId: number;
  price: number;
  currency: string;
  recordedAt: string;
}

export interface PageRequest {
  page: number;
  perPage: number;
  sortBy: SortField;
  sortOrder: SortOrder;
}

export type SortField = 'price' | 'rating';
export type SortOrder = 'asc' | 'desc';

/** Sort keys for listing the whole catalog. */
export type CatalogSortField = SortField | 'updatedAt' | 'createdAt';

export interface CatalogPageRequest {
  page: number;
  perPage: number;
  sortBy: CatalogSortField;
  sortOrder: SortOrder;
}

export interface Pagination {
  page: number;
  perPage: number;
  total: number;
  totalPages: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export interface Page<T> {
  items: T[];
  pagination: Pagination;
}

export interface StoreHealth {
  healthy: boolean;
  latencyMs: number;
  error?: string;
}

export interface StoreStats {
  totalProducts: number;
  totalPriceSamples: number;
  productsBySource: Record<string, number>;
}
