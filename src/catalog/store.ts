/**
 * Pricewise — Product Store Interface
 *
 * Persistence boundary for products and their price history.
 * Implemented in memory (src/catalog/memory-store.ts) and on Supabase
 * (src/db/products.ts).
 */

import type {
  CatalogPageRequest,
  ListingSource,
  Page,
  PageRequest,
  PriceSample,
  ProductInput,
  StoreHealth,
  StoreStats,
  StoredProduct,
} from '../types';

export interface ProductStore {
  /**
   * Insert by URL or update the existing record. A price sample is
   * recorded on insert and whenever the price changes.
   */
  upsertProduct(product: ProductInput): Promise<StoredProduct>;

  getById(id: number): Promise<StoredProduct | null>;

  getByUrl(url: string): Promise<StoredProduct | null>;

  /** Found products in the order of `ids`; missing ids are skipped. */
  getByIds(ids: readonly number[]): Promise<StoredProduct[]>;

  recordPriceSample(productId: number, price: number, currency: string): Promise<PriceSample>;

  /** Newest first. */
  getPriceHistory(productId: number, limit?: number): Promise<PriceSample[]>;

  /** Products whose title contains every word of `query`, case-insensitively. */
  searchByTitle(query: string, page: PageRequest): Promise<Page<StoredProduct>>;

  /** Every stored product, one page at a time. */
  listProducts(page: CatalogPageRequest): Promise<Page<StoredProduct>>;

  stats(): Promise<StoreStats>;

  health(): Promise<StoreHealth>;
}

export const DEFAULT_HISTORY_LIMIT = 30;

/**
 * The fields an upsert writes over `existing`.
 *
 * An update without `sources` (a single scrape) over an aggregated record
 * replaces that listing's entry in the record's sources, or appends one,
 * and recomputes `bestPrice` from them. Explicit `sources` win.
 */
export function applyUpdate(existing: ProductInput, update: ProductInput): ProductInput {
  if (update.sources || !existing.sources) {
    return update;
  }

  const entry: ListingSource = {
    source: update.source,
    url: update.url,
    price: update.price,
    availability: update.availability,
  };
  const known = existing.sources.some(source => source.url === update.url);
  const sources = known
    ? existing.sources.map(source => (source.url === update.url ? entry : { ...source }))
    : [...existing.sources.map(source => ({ ...source })), entry];

  return {
    ...update,
    sources,
    bestPrice: Math.min(...sources.map(source => source.price)),
  };
}
