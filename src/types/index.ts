/**
 * Pricewise — Type Exports
 */

export type {
  RawListing,
  NormalizedProduct,
  ListingSource,
  AggregatedProduct,
  ProductRecord,
  SourceResult,
  BatchResult,
  SupportedSite,
} from './listing';

export type {
  ProductInput,
  StoredProduct,
  PriceSample,
  PageRequest,
  CatalogPageRequest,
  CatalogSortField,
  SortField,
  SortOrder,
  Pagination,
  Page,
  StoreHealth,
  StoreStats,
} from './store';
