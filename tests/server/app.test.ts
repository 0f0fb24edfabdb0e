/**
 * Tests for HTTP API
 */

import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../src/server/app';
import { createServices } from '../../src/server/services';
import { loadConfig } from '../../src/lib/config';
import { ScrapeFailedError } from '../../src/lib/errors';
import { InMemoryProductStore } from '../../src/catalog/memory-store';
import type { StoreHealth } from '../../src/types';
import { fakeSource, makeListing, makeProduct } from '../fixtures';

const T0 = 1_700_000_000_000;

function shopSources() {
  return [
    fakeSource('a', {
      search: async () => [
        makeListing({ source: 'a', url: 'https://a.example/acme-earbuds', title: 'Acme Wireless Earbuds', price: '₹1,999' }),
      ],
    }),
    fakeSource('b', {
      search: async () => [
        makeListing({ source: 'b', url: 'https://b.example/acme-earbuds', title: 'Acme Wireless Earbuds', price: '₹1,899' }),
      ],
    }),
    fakeSource('c', {
      search: async () => [
        makeListing({ source: 'c', url: 'https://c.example/case', title: 'Smartphone Case Cover', price: '₹299' }),
      ],
      scrape: async url => {
        throw new ScrapeFailedError(url, 'HTTP 503');
      },
    }),
  ];
}

function failingSources() {
  return ['a', 'b'].map(key =>
    fakeSource(key, {
      search: async () => {
        throw new Error('HTTP 503');
      },
    })
  );
}

function buildApp(
  options: { env?: Record<string, string>; sources?: ReturnType<typeof shopSources>; store?: InMemoryProductStore } = {}
): Express {
  const now = () => T0;
  const deps = createServices(loadConfig(options.env ?? {}), {
    store: options.store ?? new InMemoryProductStore({ now }),
    sources: options.sources ?? shopSources(),
    now,
  });
  return createApp(deps);
}

describe('HTTP API', () => {
  let app: Express;

  beforeEach(() => {
    app = buildApp();
  });

  describe('GET /health', () => {
    it('reports the service as healthy', async () => {
      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        status: 'healthy',
        service: 'pricewise',
        version: '1.0.0',
        store: { healthy: true, latency_ms: 0 },
      });
    });

    it('reports a failing store as degraded', async () => {
      class UnreachableStore extends InMemoryProductStore {
        override async health(): Promise<StoreHealth> {
          return { healthy: false, latencyMs: 3, error: 'connection refused' };
        }
      }

      const res = await request(buildApp({ store: new UnreachableStore() })).get('/health');

      expect(res.status).toBe(503);
      expect(res.body).toMatchObject({
        status: 'degraded',
        store: { healthy: false, latency_ms: 3, error: 'connection refused' },
      });
    });
  });

  describe('GET /api/search', () => {
    it('returns merged, sorted products with rate limit headers', async () => {
      const res = await request(app).get('/api/search').query({ q: 'acme' });

      expect(res.status).toBe(200);
      expect(res.body.success).toBe(true);
      expect(res.body.cached).toBe(false);
      expect(res.body.partial).toBeUndefined();
      expect(res.body.data.duplicatesMerged).toBe(1);
      expect(res.body.data.products.map((p: { title: string; best_price: number }) => [p.title, p.best_price])).toEqual([
        ['Smartphone Case Cover', 299],
        ['Acme Wireless Earbuds', 1899],
      ]);
      expect(res.body.data.pagination).toEqual({
        page: 1,
        perPage: 20,
        total: 2,
        totalPages: 1,
        hasNext: false,
        hasPrev: false,
      });

      expect(res.headers['x-ratelimit-limit']).toBe('10');
      expect(res.headers['x-ratelimit-remaining']).toBe('9');
      expect(res.headers['x-ratelimit-reset']).toBe('1700000060');
    });

    it('serves the second identical search from the cache', async () => {
      const first = await request(app).get('/api/search').query({ q: 'acme' });
      const second = await request(app).get('/api/search').query({ q: 'ACME' });

      expect(second.body.cached).toBe(true);
      expect(second.body.data.runId).toBe(first.body.data.runId);
    });

    it('clamps per_page and falls back to the default sort', async () => {
      const res = await request(app)
        .get('/api/search')
        .query({ q: 'acme', per_page: '500', sort: 'popularity', order: 'sideways' });

      expect(res.status).toBe(200);
      expect(res.body.data.pagination.perPage).toBe(100);
      expect(res.body.data.sort).toEqual({ by: 'price', order: 'asc' });
    });

    it('requires a non-empty query', async () => {
      const missing = await request(app).get('/api/search');
      const blank = await request(app).get('/api/search').query({ q: '   ' });

      expect(missing.status).toBe(400);
      expect(missing.body.error).toBe('validation_error');
      expect(blank.status).toBe(400);
      expect(blank.body.message).toBe('Search query (q) is required');
    });

    it('filters by site', async () => {
      const res = await request(app).get('/api/search').query({ q: 'acme', sites: 'c' });

      expect(res.body.data.sources.map((s: { source: string }) => s.source)).toEqual(['c']);
    });

    it('returns stored products marked partial when every source fails', async () => {
      const store = new InMemoryProductStore({ now: () => T0 });
      await store.upsertProduct(makeProduct({ url: 'https://a.example/old', title: 'Acme Wireless Earbuds Pro' }));
      const failing = buildApp({ sources: failingSources(), store });

      const res = await request(failing).get('/api/search').query({ q: 'acme' });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        success: true,
        cached: false,
        partial: true,
        message: 'Returning stored results due to scraping error',
      });
      expect(res.body.data.products[0].title).toBe('Acme Wireless Earbuds Pro');
    });

    it('fails with 502 when every source fails and nothing is stored', async () => {
      const res = await request(buildApp({ sources: failingSources() })).get('/api/search').query({ q: 'acme' });

      expect(res.status).toBe(502);
      expect(res.body).toMatchObject({ success: false, error: 'search_failed' });
    });
  });

  describe('rate limiting', () => {
    it('rejects requests over the limit with Retry-After', async () => {
      const limited = buildApp({ env: { RATE_LIMIT_PER_MINUTE: '2' } });

      await request(limited).get('/api/products/99');
      await request(limited).get('/api/products/99');
      const res = await request(limited).get('/api/products/99');

      expect(res.status).toBe(429);
      expect(res.headers['retry-after']).toBe('60');
      expect(res.headers['x-ratelimit-remaining']).toBe('0');
      expect(res.body).toEqual({
        success: false,
        error: 'rate_limited',
        message: 'Too many requests. Please try again later.',
        retry_after: 60,
      });
    });

    it('does not limit the informational endpoints', async () => {
      const limited = buildApp({ env: { RATE_LIMIT_PER_MINUTE: '1' } });

      await request(limited).get('/api/products/99');
      const sites = await request(limited).get('/api/supported-sites');
      const stats = await request(limited).get('/api/stats');

      expect(sites.status).toBe(200);
      expect(stats.status).toBe(200);
    });
  });

  describe('GET /api/compare', () => {
    it('compares products found by a search', async () => {
      await request(app).get('/api/search').query({ q: 'acme' });

      const res = await request(app).get('/api/compare').query({ ids: '1,2' });

      expect(res.status).toBe(200);
      expect(res.body.data.count).toBe(2);
      expect(res.body.data.best.price).toEqual({ value: 299, product_ids: [2] });
    });

    it('says so when none of the ids exist', async () => {
      const res = await request(app).get('/api/compare').query({ ids: '98,99' });

      expect(res.status).toBe(200);
      expect(res.body.data.count).toBe(0);
      expect(res.body.message).toBe('No products found for the given IDs');
    });

    it('validates the id list', async () => {
      const missing = await request(app).get('/api/compare');
      const tooMany = await request(app).get('/api/compare').query({ ids: '1,2,3,4,5,6,7,8,9,10,11' });
      const junk = await request(app).get('/api/compare').query({ ids: 'abc' });

      expect(missing.status).toBe(400);
      expect(missing.body.message).toBe('Product IDs (ids) are required');
      expect(tooMany.status).toBe(400);
      expect(tooMany.body.message).toBe('Maximum 10 products can be compared at once');
      expect(junk.status).toBe(400);
    });
  });

  describe('GET /api/products/all', () => {
    beforeEach(async () => {
      let now = T0;
      const store = new InMemoryProductStore({ now: () => now });
      await store.upsertProduct(makeProduct({ url: 'https://a.example/p/1', title: 'Older', price: 500 }));
      now = T0 + 1000;
      await store.upsertProduct(makeProduct({ url: 'https://a.example/p/2', title: 'Newer', price: 200 }));
      app = buildApp({ store });
    });

    it('lists stored products, most recently updated first', async () => {
      const res = await request(app).get('/api/products/all');

      expect(res.status).toBe(200);
      expect(res.body.data.products.map((p: { id: number; title: string }) => [p.id, p.title])).toEqual([
        [2, 'Newer'],
        [1, 'Older'],
      ]);
      expect(res.body.data.pagination).toEqual({
        page: 1,
        perPage: 20,
        total: 2,
        totalPages: 1,
        hasNext: false,
        hasPrev: false,
      });
      expect(res.headers['x-ratelimit-remaining']).toBe('9');
    });

    it('honours sort, order and page size', async () => {
      const res = await request(app)
        .get('/api/products/all')
        .query({ sort: 'price', order: 'asc', per_page: '1', page: '2' });

      expect(res.body.data.products.map((p: { id: number }) => p.id)).toEqual([1]);
      expect(res.body.data.pagination).toMatchObject({ page: 2, perPage: 1, total: 2, hasNext: false, hasPrev: true });
    });

    it('caps the page size and ignores an unknown sort field', async () => {
      const res = await request(app).get('/api/products/all').query({ per_page: '500', sort: 'title' });

      expect(res.status).toBe(200);
      expect(res.body.data.pagination.perPage).toBe(100);
      expect(res.body.data.products.map((p: { id: number }) => p.id)).toEqual([2, 1]);
    });
  });

  describe('GET /api/products/:id', () => {
    it('returns the stored product with its price history', async () => {
      await request(app).get('/api/search').query({ q: 'acme' });

      const res = await request(app).get('/api/products/1');

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({
        id: 1,
        title: 'Acme Wireless Earbuds',
        price: 1999,
        best_price: 1899,
        is_stale: false,
        price_history: [{ price: 1999, currency: 'INR', recorded_at: '2023-11-14T22:13:20.000Z' }],
      });
    });

    it('returns 404 for an unknown id and 400 for a malformed one', async () => {
      const unknown = await request(app).get('/api/products/99');
      const malformed = await request(app).get('/api/products/abc');

      expect(unknown.status).toBe(404);
      expect(unknown.body).toEqual({ success: false, error: 'not_found', message: 'Product with ID 99 not found' });
      expect(malformed.status).toBe(400);
    });
  });

  describe('GET /api/products?url=', () => {
    it('scrapes an unseen URL, then serves it from the store', async () => {
      const first = await request(app).get('/api/products').query({ url: 'https://a.example/p/9' });
      const second = await request(app).get('/api/products').query({ url: 'https://a.example/p/9' });

      expect(first.status).toBe(200);
      expect(first.body.cached).toBe(false);
      expect(first.body.data).toMatchObject({ id: 1, source: 'a', title: 'a product', price: 100 });
      expect(second.body.cached).toBe(true);
    });

    it('rejects non-http URLs', async () => {
      const res = await request(app).get('/api/products').query({ url: 'ftp://a.example/p/9' });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('URL must use http or https');
    });
  });

  describe('GET /api/products/:id/prices', () => {
    it('returns the newest samples up to the limit', async () => {
      await request(app).post('/api/scrape').send({ url: 'https://a.example/p/1' });

      const res = await request(app).get('/api/products/1/prices').query({ limit: '5' });

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({
        product_id: 1,
        price_history: [{ price: 100, currency: 'INR', recorded_at: '2023-11-14T22:13:20.000Z' }],
        count: 1,
      });
    });
  });

  describe('POST /api/scrape', () => {
    it('scrapes and stores one URL', async () => {
      const res = await request(app).post('/api/scrape').send({ url: 'https://b.example/p/1' });

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({
        id: 1,
        url: 'https://b.example/p/1',
        source: 'b',
        price: 100,
        best_price: 100,
        sources: [{ source: 'b', url: 'https://b.example/p/1', price: 100 }],
      });
    });

    it('maps unsupported URLs to 400 and scrape failures to 502', async () => {
      const unsupported = await request(app).post('/api/scrape').send({ url: 'https://nowhere.example/p/1' });
      const failed = await request(app).post('/api/scrape').send({ url: 'https://c.example/p/1' });

      expect(unsupported.status).toBe(400);
      expect(unsupported.body.error).toBe('unsupported_source');
      expect(failed.status).toBe(502);
      expect(failed.body).toEqual({
        success: false,
        error: 'scrape_failed',
        message: 'Failed to scrape URL: https://c.example/p/1 - HTTP 503',
      });
    });

    it('rejects malformed JSON', async () => {
      const res = await request(app)
        .post('/api/scrape')
        .set('Content-Type', 'application/json')
        .send('{"url":');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('validation_error');
    });
  });

  describe('POST /api/scrape/batch', () => {
    it('reports each URL separately', async () => {
      const res = await request(app)
        .post('/api/scrape/batch')
        .send({ urls: ['https://a.example/p/1', 'https://nowhere.example/p/2'] });

      expect(res.status).toBe(200);
      expect(res.body.total).toBe(2);
      expect(res.body.successful).toBe(1);
      expect(res.body.data[0]).toMatchObject({ url: 'https://a.example/p/1', success: true, data: { id: 1 } });
      expect(res.body.data[1]).toEqual({
        url: 'https://nowhere.example/p/2',
        success: false,
        error: 'URL not supported: https://nowhere.example/p/2',
      });
    });

    it('bounds the batch size', async () => {
      const empty = await request(app).post('/api/scrape/batch').send({ urls: [] });
      const tooMany = await request(app)
        .post('/api/scrape/batch')
        .send({ urls: Array.from({ length: 21 }, (_, i) => `https://a.example/p/${i}`) });

      expect(empty.status).toBe(400);
      expect(empty.body.message).toBe('At least one URL is required');
      expect(tooMany.status).toBe(400);
      expect(tooMany.body.message).toBe('Maximum 20 URLs per batch');
    });
  });

  describe('GET /api/supported-sites', () => {
    it('lists the registered sources', async () => {
      const res = await request(app).get('/api/supported-sites');

      expect(res.body.count).toBe(3);
      expect(res.body.data[0]).toEqual({ key: 'a', name: 'A', domains: ['a.example'] });
    });
  });

  describe('GET /api/stats', () => {
    it('reports store, cache and limiter state', async () => {
      await request(app).get('/api/search').query({ q: 'acme' });

      const res = await request(app).get('/api/stats');

      expect(res.body.data).toEqual({
        store: { totalProducts: 2, totalPriceSamples: 2, productsBySource: { a: 1, c: 1 } },
        cache: { size: 1, maxSize: 100, ttlMs: 300_000 },
        rate_limiter: { limit: 10, window_ms: 60_000, clients: 1 },
      });
    });
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get('/api/nothing-here');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, error: 'not_found', message: 'Route not found' });
  });
});
