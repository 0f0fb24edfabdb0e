/**
 * Pricewise — Catalog Service
 *
 * Store-backed reads with the staleness policy in front of them, and the
 * scrape → normalize → store path for single URLs and batches.
 */

import type { BatchResult, CatalogPageRequest, Page, PriceSample, RawListing, StoredProduct } from '../types';
import type { ProductStore } from './store';
import type { AggregationDispatcher } from '../aggregation/dispatcher';
import { normalizeListing } from '../aggregation/normalizer';
import { NotFoundError, StoreError, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { isStale } from './staleness';
import { compareProducts, type Comparison } from './compare';

const log = logger.child({ component: 'catalog' });

export interface CatalogServiceOptions {
  /** How long a stored record counts as fresh. */
  staleAfterMs: number;
  defaultCurrency: string;
  /** Clock in epoch ms. */
  now?: () => number;
}

export interface ProductDetail {
  product: StoredProduct;
  priceHistory: PriceSample[];
  isStale: boolean;
}

export interface ProductLookup extends ProductDetail {
  /** True when served from the store without scraping. */
  cached: boolean;
}

export type StoredBatchResult =
  | { url: string; success: true; product: StoredProduct }
  | { url: string; success: false; error: string };

export class CatalogService {
  private readonly now: () => number;

  constructor(
    private readonly store: ProductStore,
    private readonly dispatcher: AggregationDispatcher,
    private readonly options: CatalogServiceOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Read a product by id. A stale record with a scrapeable URL is
   * refreshed before returning; if the refresh fails the stored record
   * is returned flagged as stale.
   */
  async getProduct(id: number): Promise<ProductDetail> {
    const stored = await this.store.getById(id);
    if (!stored) {
      throw new NotFoundError(`Product with ID ${id} not found`);
    }

    let product = stored;
    let stale = this.isStale(stored);

    if (stale && this.dispatcher.sourceFor(stored.url)) {
      try {
        await this.scrapeAndStore(stored.url);
        const refreshed = await this.store.getById(id);
        if (refreshed) {
          product = refreshed;
          stale = false;
        }
      } catch (error) {
        log.warn('Refresh of stale product failed', {
          productId: id,
          url: stored.url,
          error: errorMessage(error),
        });
      }
    }

    return {
      product,
      priceHistory: await this.store.getPriceHistory(product.id),
      isStale: stale,
    };
  }

  /**
   * Serve a fresh stored record for `url`, or scrape and store it.
   */
  async getProductByUrl(url: string): Promise<ProductLookup> {
    const stored = await this.store.getByUrl(url);

    if (stored && !this.isStale(stored)) {
      return {
        product: stored,
        priceHistory: await this.store.getPriceHistory(stored.id),
        isStale: false,
        cached: true,
      };
    }

    const product = await this.scrapeAndStore(url);
    return {
      product,
      priceHistory: await this.store.getPriceHistory(product.id),
      isStale: false,
      cached: false,
    };
  }

  async getPriceHistory(id: number, limit?: number): Promise<PriceSample[]> {
    const product = await this.store.getById(id);
    if (!product) {
      throw new NotFoundError(`Product with ID ${id} not found`);
    }
    return this.store.getPriceHistory(id, limit);
  }

  listProducts(page: CatalogPageRequest): Promise<Page<StoredProduct>> {
    return this.store.listProducts(page);
  }

  async compare(ids: readonly number[]): Promise<Comparison> {
    const products = await this.store.getByIds(ids);
    return compareProducts(products);
  }

  /**
   * Scrape one URL and persist it. Rejects with UnsupportedSourceError or
   * ScrapeFailedError.
   */
  async scrapeAndStore(url: string): Promise<StoredProduct> {
    const raw = await this.dispatcher.scrapeOne(url);
    return this.storeListing(url, raw);
  }

  /**
   * Scrape and persist many URLs. Each URL succeeds or fails on its own.
   */
  async scrapeBatchAndStore(urls: readonly string[]): Promise<StoredBatchResult[]> {
    const results = await this.dispatcher.scrapeBatch(urls);
    return Promise.all(results.map(result => this.storeBatchResult(result)));
  }

  private async storeBatchResult(result: BatchResult): Promise<StoredBatchResult> {
    if (!result.success) {
      return result;
    }
    try {
      return { url: result.url, success: true, product: await this.storeListing(result.url, result.listing) };
    } catch (error) {
      return { url: result.url, success: false, error: errorMessage(error) };
    }
  }

  private async storeListing(url: string, raw: RawListing): Promise<StoredProduct> {
    const source = this.dispatcher.sourceFor(url)?.key ?? raw.source;
    const normalized = normalizeListing(
      { ...raw, url },
      { defaultCurrency: this.options.defaultCurrency, source }
    );

    try {
      return await this.store.upsertProduct(normalized);
    } catch (error) {
      if (error instanceof StoreError) throw error;
      throw new StoreError(`Failed to store product: ${errorMessage(error)}`);
    }
  }

  private isStale(product: StoredProduct): boolean {
    return isStale(product.updatedAt, this.options.staleAfterMs, this.now());
  }
}
