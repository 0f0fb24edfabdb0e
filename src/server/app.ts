/**
 * Pricewise — HTTP API
 *
 * Thin Express controllers over the search pipeline and catalog.
 *
 * Endpoints:
 * - GET  /health
 * - GET  /api/search?q&page&per_page&sort&order&sites
 * - GET  /api/compare?ids=1,2,3
 * - GET  /api/products/all?page&per_page&sort&order
 * - GET  /api/products/:id
 * - GET  /api/products?url=
 * - GET  /api/products/:id/prices?limit=
 * - POST /api/scrape          { url }
 * - POST /api/scrape/batch    { urls }
 * - GET  /api/supported-sites
 * - GET  /api/stats
 *
 * Every /api route except supported-sites and stats is rate limited per
 * client IP.
 */

import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../lib/config';
import type { CatalogSortField } from '../types';
import { logger } from '../lib/logger';
import { AppError, RateLimitExceededError, ValidationError } from '../lib/errors';
import type { RateLimiter } from '../admission/rate-limiter';
import type { ResultCache } from '../admission/result-cache';
import type { AggregationDispatcher } from '../aggregation/dispatcher';
import type { SearchResponse, SearchService } from '../aggregation/pipeline';
import type { CatalogService } from '../catalog/service';
import type { ProductStore } from '../catalog/store';
import { toPriceSampleRecord, toStoredProductRecord } from '../catalog/records';

const log = logger.child({ component: 'http' });

export interface AppDeps {
  search: SearchService;
  catalog: CatalogService;
  dispatcher: AggregationDispatcher;
  store: ProductStore;
  cache: ResultCache<SearchResponse>;
  rateLimiter: RateLimiter;
  config: Pick<AppConfig, 'pagination'>;
}

export const MAX_COMPARE_IDS = 10;
export const MAX_BATCH_URLS = 20;

// ============================================================
// VALIDATION
// ============================================================

const productIdSchema = z.coerce.number().int().positive();

const httpUrlSchema = z
  .string()
  .trim()
  .url()
  .refine(value => /^https?:\/\//i.test(value), 'URL must use http or https');

function searchQuerySchema(pagination: AppConfig['pagination']) {
  return z.object({
    q: z.string().trim().min(1, 'Search query (q) is required'),
    page: z.coerce.number().int().min(1).default(1),
    per_page: z.coerce
      .number()
      .int()
      .min(1)
      .default(pagination.defaultPageSize)
      .transform(value => Math.min(value, pagination.maxPageSize)),
    sort: z.enum(['price', 'rating']).catch('price'),
    order: z.enum(['asc', 'desc']).catch('asc'),
    sites: z
      .string()
      .optional()
      .transform(value => (value ?? '').split(',').map(site => site.trim()).filter(Boolean)),
  });
}

const CATALOG_SORT_FIELDS: Record<'updated_at' | 'created_at' | 'price' | 'rating', CatalogSortField> = {
  updated_at: 'updatedAt',
  created_at: 'createdAt',
  price: 'price',
  rating: 'rating',
};

function catalogQuerySchema(pagination: AppConfig['pagination']) {
  return z.object({
    page: z.coerce.number().int().min(1).default(1),
    per_page: z.coerce
      .number()
      .int()
      .min(1)
      .default(pagination.defaultPageSize)
      .transform(value => Math.min(value, pagination.maxPageSize)),
    sort: z
      .enum(['updated_at', 'created_at', 'price', 'rating'])
      .catch('updated_at')
      .transform(value => CATALOG_SORT_FIELDS[value]),
    order: z.enum(['asc', 'desc']).catch('desc'),
  });
}

const compareQuerySchema = z.object({
  ids: z
    .string({ required_error: 'Product IDs (ids) are required' })
    .transform(value => value.split(',').map(id => id.trim()).filter(Boolean))
    .pipe(
      z
        .array(productIdSchema)
        .min(1, 'At least one product ID is required')
        .max(MAX_COMPARE_IDS, `Maximum ${MAX_COMPARE_IDS} products can be compared at once`)
    ),
});

const urlQuerySchema = z.object({ url: httpUrlSchema });

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(365).optional(),
});

const scrapeBodySchema = z.object({ url: httpUrlSchema });

const batchBodySchema = z.object({
  urls: z
    .array(httpUrlSchema)
    .min(1, 'At least one URL is required')
    .max(MAX_BATCH_URLS, `Maximum ${MAX_BATCH_URLS} URLs per batch`),
});

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(details[0]?.message ?? 'Invalid request', details);
  }
  return result.data;
}

// ============================================================
// MIDDLEWARE
// ============================================================

/**
 * Express 4 does not forward rejected promises; route them to next().
 */
function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function clientId(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

function rateLimit(limiter: RateLimiter): RequestHandler {
  return (req, res, next) => {
    const id = clientId(req);
    const allowed = limiter.allow(id);
    const resetAt = limiter.resetTimeFor(id);

    res.setHeader('X-RateLimit-Limit', String(limiter.limit));
    res.setHeader('X-RateLimit-Remaining', String(limiter.remainingFor(id)));
    if (resetAt !== null) {
      res.setHeader('X-RateLimit-Reset', String(Math.ceil(resetAt / 1000)));
    }

    if (!allowed) {
      const retryAfter = limiter.retryAfterSeconds(id);
      log.warn('Rate limit exceeded', { client: id });
      next(new RateLimitExceededError(retryAfter));
      return;
    }

    next();
  };
}

// ============================================================
// APP
// ============================================================

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const limited = rateLimit(deps.rateLimiter);
  const searchQuery = searchQuerySchema(deps.config.pagination);
  const catalogQuery = catalogQuerySchema(deps.config.pagination);

  app.use(express.json({ limit: '100kb' }));

  app.get(
    '/health',
    asyncHandler(async (_req, res) => {
      const store = await deps.store.health();
      if (!store.healthy) {
        log.warn('Store health check failed', { error: store.error });
      }

      res.status(store.healthy ? 200 : 503).json({
        status: store.healthy ? 'healthy' : 'degraded',
        timestamp: new Date().toISOString(),
        service: 'pricewise',
        version: '1.0.0',
        store: { healthy: store.healthy, latency_ms: store.latencyMs, ...(store.error ? { error: store.error } : {}) },
      });
    })
  );

  app.get(
    '/api/search',
    limited,
    asyncHandler(async (req, res) => {
      const query = parse(searchQuery, req.query);
      const outcome = await deps.search.search({
        query: query.q,
        page: {
          page: query.page,
          perPage: query.per_page,
          sortBy: query.sort,
          sortOrder: query.order,
        },
        sites: query.sites,
      });

      const { cached, partial, ...data } = outcome;
      res.json({
        success: true,
        data,
        cached,
        ...(partial ? { partial: true, message: 'Returning stored results due to scraping error' } : {}),
      });
    })
  );

  app.get(
    '/api/compare',
    limited,
    asyncHandler(async (req, res) => {
      const { ids } = parse(compareQuerySchema, req.query);
      const comparison = await deps.catalog.compare(ids);

      res.json({
        success: true,
        data: comparison,
        ...(comparison.count === 0 ? { message: 'No products found for the given IDs' } : {}),
      });
    })
  );

  app.get(
    '/api/products/all',
    limited,
    asyncHandler(async (req, res) => {
      const query = parse(catalogQuery, req.query);
      const page = await deps.catalog.listProducts({
        page: query.page,
        perPage: query.per_page,
        sortBy: query.sort,
        sortOrder: query.order,
      });

      res.json({
        success: true,
        data: {
          products: page.items.map(toStoredProductRecord),
          pagination: page.pagination,
        },
      });
    })
  );

  app.get(
    '/api/products/:id',
    limited,
    asyncHandler(async (req, res) => {
      const id = parse(productIdSchema, req.params.id);
      const detail = await deps.catalog.getProduct(id);

      res.json({
        success: true,
        data: {
          ...toStoredProductRecord(detail.product),
          price_history: detail.priceHistory.map(toPriceSampleRecord),
          is_stale: detail.isStale,
        },
      });
    })
  );

  app.get(
    '/api/products',
    limited,
    asyncHandler(async (req, res) => {
      const { url } = parse(urlQuerySchema, req.query);
      const lookup = await deps.catalog.getProductByUrl(url);

      res.json({
        success: true,
        data: {
          ...toStoredProductRecord(lookup.product),
          price_history: lookup.priceHistory.map(toPriceSampleRecord),
          is_stale: lookup.isStale,
        },
        cached: lookup.cached,
      });
    })
  );

  app.get(
    '/api/products/:id/prices',
    limited,
    asyncHandler(async (req, res) => {
      const id = parse(productIdSchema, req.params.id);
      const { limit } = parse(historyQuerySchema, req.query);
      const history = await deps.catalog.getPriceHistory(id, limit);

      res.json({
        success: true,
        data: {
          product_id: id,
          price_history: history.map(toPriceSampleRecord),
          count: history.length,
        },
      });
    })
  );

  app.post(
    '/api/scrape',
    limited,
    asyncHandler(async (req, res) => {
      const { url } = parse(scrapeBodySchema, req.body);
      const product = await deps.catalog.scrapeAndStore(url);

      res.json({ success: true, data: toStoredProductRecord(product) });
    })
  );

  app.post(
    '/api/scrape/batch',
    limited,
    asyncHandler(async (req, res) => {
      const { urls } = parse(batchBodySchema, req.body);
      const results = await deps.catalog.scrapeBatchAndStore(urls);

      res.json({
        success: true,
        data: results.map(result =>
          result.success
            ? { url: result.url, success: true, data: toStoredProductRecord(result.product) }
            : { url: result.url, success: false, error: result.error }
        ),
        total: results.length,
        successful: results.filter(result => result.success).length,
      });
    })
  );

  app.get('/api/supported-sites', (_req: Request, res: Response) => {
    const sites = deps.dispatcher.supportedSites();
    res.json({ success: true, data: sites, count: sites.length });
  });

  app.get(
    '/api/stats',
    asyncHandler(async (_req, res) => {
      const store = await deps.store.stats();

      res.json({
        success: true,
        data: {
          store,
          cache: deps.cache.stats(),
          rate_limiter: {
            limit: deps.rateLimiter.limit,
            window_ms: deps.rateLimiter.windowMs,
            clients: deps.rateLimiter.clientCount(),
          },
        },
      });
    })
  );

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'not_found', message: 'Route not found' });
  });

  // ============================================================
  // ERROR HANDLER
  // ============================================================

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof RateLimitExceededError) {
      res.setHeader('Retry-After', String(err.retryAfter));
      res.status(err.statusCode).json({
        success: false,
        error: err.code,
        message: err.message,
        retry_after: err.retryAfter,
      });
      return;
    }

    if (err instanceof ValidationError) {
      res.status(err.statusCode).json({
        success: false,
        error: err.code,
        message: err.message,
        details: err.details,
      });
      return;
    }

    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        log.error('Request failed', { error: err.message, code: err.code });
      }
      res.status(err.statusCode).json({ success: false, error: err.code, message: err.message });
      return;
    }

    // Malformed JSON bodies arrive from express.json() as a SyntaxError with status 400
    if (err instanceof SyntaxError) {
      res.status(400).json({ success: false, error: 'validation_error', message: 'Malformed JSON body' });
      return;
    }

    log.error('Unhandled error in API server', {
      error: err instanceof Error ? err.message : String(err),
    });
    res.status(500).json({ success: false, error: 'internal_error', message: 'Internal server error' });
  });

  return app;
}
