/**
 * Pricewise — Service Wiring
 *
 * Builds the object graph from config. The cache and limiter are created
 * here and passed down; nothing is a module-level singleton.
 */

import type { AppConfig } from '../lib/config';
import { logger } from '../lib/logger';
import { RateLimiter } from '../admission/rate-limiter';
import { ResultCache } from '../admission/result-cache';
import { AggregationDispatcher, type SourceAdapter } from '../aggregation/dispatcher';
import { SearchService, type SearchResponse } from '../aggregation/pipeline';
import { CatalogService } from '../catalog/service';
import { InMemoryProductStore } from '../catalog/memory-store';
import type { ProductStore } from '../catalog/store';
import { createSupabaseClient } from '../db/client';
import { SupabaseProductStore } from '../db/products';
import { createDefaultSources } from '../sources';
import type { AppDeps } from './app';

export interface ServiceOverrides {
  store?: ProductStore;
  sources?: SourceAdapter[];
  /** Clock for the cache, limiter and staleness checks. */
  now?: () => number;
}

export function createStore(config: AppConfig): ProductStore {
  if (config.supabase) {
    logger.info('Using Supabase product store');
    return new SupabaseProductStore(createSupabaseClient(config));
  }
  logger.info('No database configured, using in-memory product store');
  return new InMemoryProductStore();
}

export function createDispatcher(config: AppConfig, sources?: SourceAdapter[]): AggregationDispatcher {
  return new AggregationDispatcher(sources ?? createDefaultSources(config.scraper), {
    maxWorkers: config.dispatch.maxWorkers,
    sourceTimeoutMs: config.dispatch.sourceTimeoutMs,
  });
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppDeps {
  const store = overrides.store ?? createStore(config);
  const dispatcher = createDispatcher(config, overrides.sources);

  const cache = new ResultCache<SearchResponse>({
    maxSize: config.cache.maxSize,
    ttlMs: config.cache.ttlMs,
    now: overrides.now,
  });
  const rateLimiter = new RateLimiter({
    limit: config.rateLimit.limit,
    windowMs: config.rateLimit.windowMs,
    now: overrides.now,
  });

  const search = new SearchService(dispatcher, store, cache, {
    maxPerSource: config.dispatch.maxResultsPerSource,
    fuzzyMatchThreshold: config.fuzzyMatchThreshold,
    defaultCurrency: config.defaultCurrency,
  });
  const catalog = new CatalogService(store, dispatcher, {
    staleAfterMs: config.staleAfterMs,
    defaultCurrency: config.defaultCurrency,
    now: overrides.now,
  });

  return {
    search,
    catalog,
    dispatcher,
    store,
    cache,
    rateLimiter,
    config: { pagination: config.pagination },
  };
}
