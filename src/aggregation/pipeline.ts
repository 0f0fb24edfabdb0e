/**
 * Pricewise — Search Pipeline
 *
 * cache → dispatch → normalize → dedup → persist → sort → paginate → cache.
 *
 * When every source fails, or the pipeline itself throws, stored products
 * matching the query are served instead and the response is marked partial.
 * Partial responses are never cached.
 */

import { nanoid } from 'nanoid';
import type {
  AggregatedProduct,
  PageRequest,
  Pagination,
  ProductRecord,
  SourceResult,
} from '../types';
import type { ProductStore } from '../catalog/store';
import type { ResultCache } from '../admission/result-cache';
import { buildSearchCacheKey } from '../admission/result-cache';
import { paginate, sortProducts } from '../catalog/paging';
import { toStoredProductRecord } from '../catalog/records';
import { logger, timeOperation } from '../lib/logger';
import { SearchFailedError, errorMessage } from '../lib/errors';
import type { AggregationDispatcher } from './dispatcher';
import { normalizeSourceResults } from './normalizer';
import { DEFAULT_MATCH_THRESHOLD, deduplicate, toProductRecord } from './deduplicator';

const log = logger.child({ component: 'search' });

// ============================================================
// TYPES
// ============================================================

export interface SearchRequest {
  query: string;
  page: PageRequest;
  /** Restrict to these source keys; empty means every source. */
  sites?: string[];
}

/** A product record plus its store id; null when persisting it failed. */
export type SearchProduct = ProductRecord & { id: number | null };

export interface SourceSummary {
  source: string;
  success: boolean;
  count: number;
  durationMs: number;
  error?: string;
}

export interface SearchResponse {
  runId: string;
  query: string;
  products: SearchProduct[];
  pagination: Pagination;
  sort: { by: PageRequest['sortBy']; order: PageRequest['sortOrder'] };
  sources: SourceSummary[];
  /** Listings folded into another listing's record. */
  duplicatesMerged: number;
  /** Served from stored products after the live search failed. */
  partial: boolean;
}

export interface SearchOutcome extends SearchResponse {
  cached: boolean;
}

export interface SearchServiceOptions {
  maxPerSource: number;
  fuzzyMatchThreshold?: number;
  defaultCurrency?: string;
}

// ============================================================
// HELPERS
// ============================================================

function summarize(result: SourceResult): SourceSummary {
  return result.success
    ? { source: result.source, success: true, count: result.listings.length, durationMs: result.durationMs }
    : {
        source: result.source,
        success: false,
        count: 0,
        durationMs: result.durationMs,
        error: result.error,
      };
}

// ============================================================
// SERVICE
// ============================================================

export class SearchService {
  constructor(
    private readonly dispatcher: AggregationDispatcher,
    private readonly store: ProductStore,
    private readonly cache: ResultCache<SearchResponse>,
    private readonly options: SearchServiceOptions
  ) {}

  async search(request: SearchRequest): Promise<SearchOutcome> {
    const sites = request.sites ?? [];
    const cacheKey = buildSearchCacheKey(request.query, request.page, sites);

    const hit = this.cache.get(cacheKey);
    if (hit) {
      log.info('Cache hit', { query: request.query, runId: hit.runId });
      return { ...hit, cached: true };
    }

    const runId = nanoid(10);
    let sourceResults: SourceResult[] = [];

    try {
      const response = await timeOperation(`search ${runId}`, async () => {
        sourceResults =
          sites.length > 0
            ? await this.dispatcher.searchSources(request.query, sites, this.options.maxPerSource)
            : await this.dispatcher.searchAll(request.query, this.options.maxPerSource);

        if (sourceResults.length > 0 && sourceResults.every(result => !result.success)) {
          throw new SearchFailedError(request.query, 'every source failed');
        }

        return this.aggregate(runId, request, sourceResults);
      });

      this.cache.set(cacheKey, response);
      return { ...response, cached: false };
    } catch (error) {
      log.error('Live search failed, falling back to stored products', {
        runId,
        query: request.query,
        error: errorMessage(error),
      });
      return this.fallback(runId, request, sourceResults, error);
    }
  }

  private async aggregate(
    runId: string,
    request: SearchRequest,
    sourceResults: SourceResult[]
  ): Promise<SearchResponse> {
    const normalized = normalizeSourceResults(sourceResults, {
      defaultCurrency: this.options.defaultCurrency,
    });
    const dedup = deduplicate(normalized, this.options.fuzzyMatchThreshold ?? DEFAULT_MATCH_THRESHOLD);

    const ids = await Promise.all(dedup.products.map(product => this.persist(runId, product)));
    const withIds = dedup.products.map((product, index) => ({ ...product, id: ids[index] }));

    const sorted = sortProducts(withIds, request.page.sortBy, request.page.sortOrder);
    const page = paginate(sorted, request.page);

    log.info('Search aggregated', {
      runId,
      query: request.query,
      listings: normalized.length,
      products: dedup.products.length,
      duplicatesMerged: dedup.duplicateCount,
    });

    return {
      runId,
      query: request.query,
      products: page.items.map(entry => ({ ...toProductRecord(entry), id: entry.id })),
      pagination: page.pagination,
      sort: { by: request.page.sortBy, order: request.page.sortOrder },
      sources: sourceResults.map(summarize),
      duplicatesMerged: dedup.duplicateCount,
      partial: false,
    };
  }

  private async persist(runId: string, product: AggregatedProduct): Promise<number | null> {
    try {
      const stored = await this.store.upsertProduct(product);
      return stored.id;
    } catch (error) {
      log.warn('Failed to store product', { runId, url: product.url, error: errorMessage(error) });
      return null;
    }
  }

  private async fallback(
    runId: string,
    request: SearchRequest,
    sourceResults: SourceResult[],
    cause: unknown
  ): Promise<SearchOutcome> {
    const stored = await this.store.searchByTitle(request.query, request.page);

    if (stored.items.length === 0) {
      throw cause instanceof SearchFailedError
        ? cause
        : new SearchFailedError(request.query, errorMessage(cause));
    }

    return {
      runId,
      query: request.query,
      products: stored.items.map(toStoredProductRecord),
      pagination: stored.pagination,
      sort: { by: request.page.sortBy, order: request.page.sortOrder },
      sources: sourceResults.map(summarize),
      duplicatesMerged: 0,
      partial: true,
      cached: false,
    };
  }
}
