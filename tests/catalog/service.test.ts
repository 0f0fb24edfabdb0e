/**
 * Tests for Catalog Service
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AggregationDispatcher } from '../../src/aggregation/dispatcher';
import { CatalogService } from '../../src/catalog/service';
import { InMemoryProductStore } from '../../src/catalog/memory-store';
import { NotFoundError, StoreError, UnsupportedSourceError } from '../../src/lib/errors';
import type { ProductInput, StoredProduct } from '../../src/types';
import { fakeSource, makeListing, makeProduct } from '../fixtures';

const T0 = Date.parse('2024-05-01T00:00:00.000Z');
const HOUR = 3_600_000;
const PRODUCT_URL = 'https://shop.example/p/1';

describe('CatalogService', () => {
  let now: number;
  let price: string;
  let failScrape: boolean;
  let store: InMemoryProductStore;
  let source: ReturnType<typeof fakeSource>;
  let service: CatalogService;

  beforeEach(() => {
    now = T0;
    price = '₹100';
    failScrape = false;
    store = new InMemoryProductStore({ now: () => now });
    source = fakeSource('shop', {
      scrape: async url => {
        if (failScrape) throw new Error('HTTP 503');
        return makeListing({ source: 'Shop', url, title: 'Acme Earbuds', price });
      },
    });
    service = new CatalogService(store, new AggregationDispatcher([source]), {
      staleAfterMs: HOUR,
      defaultCurrency: 'INR',
      now: () => now,
    });
  });

  describe('getProductByUrl', () => {
    it('scrapes and stores a URL it has not seen', async () => {
      const result = await service.getProductByUrl(PRODUCT_URL);

      expect(result.cached).toBe(false);
      expect(result.isStale).toBe(false);
      expect(result.product).toMatchObject({ id: 1, url: PRODUCT_URL, source: 'shop', price: 100 });
      expect(result.priceHistory.map(s => s.price)).toEqual([100]);
    });

    it('serves a fresh stored record without scraping', async () => {
      await service.getProductByUrl(PRODUCT_URL);
      now = T0 + HOUR;

      const result = await service.getProductByUrl(PRODUCT_URL);

      expect(result.cached).toBe(true);
      expect(source.scrape).toHaveBeenCalledTimes(1);
    });

    it('scrapes again once the record is stale', async () => {
      await service.getProductByUrl(PRODUCT_URL);
      now = T0 + HOUR + 1;
      price = '₹120';

      const result = await service.getProductByUrl(PRODUCT_URL);

      expect(result.cached).toBe(false);
      expect(result.product.price).toBe(120);
      expect(result.priceHistory.map(s => s.price)).toEqual([120, 100]);
    });

    it('rejects URLs no source handles', async () => {
      await expect(service.getProductByUrl('https://elsewhere.example/p/1')).rejects.toBeInstanceOf(
        UnsupportedSourceError
      );
    });
  });

  describe('getProduct', () => {
    it('returns a fresh record as is', async () => {
      await service.scrapeAndStore(PRODUCT_URL);

      const detail = await service.getProduct(1);

      expect(detail.isStale).toBe(false);
      expect(detail.product.price).toBe(100);
      expect(source.scrape).toHaveBeenCalledTimes(1);
    });

    it('refreshes a stale record before returning it', async () => {
      await service.scrapeAndStore(PRODUCT_URL);
      now = T0 + 2 * HOUR;
      price = '₹150';

      const detail = await service.getProduct(1);

      expect(detail.isStale).toBe(false);
      expect(detail.product).toMatchObject({ id: 1, price: 150, updatedAt: '2024-05-01T02:00:00.000Z' });
      expect(detail.priceHistory.map(s => s.price)).toEqual([150, 100]);
    });

    it('returns the stored record flagged stale when the refresh fails', async () => {
      await service.scrapeAndStore(PRODUCT_URL);
      now = T0 + 2 * HOUR;
      failScrape = true;

      const detail = await service.getProduct(1);

      expect(detail.isStale).toBe(true);
      expect(detail.product).toMatchObject({ id: 1, price: 100, updatedAt: '2024-05-01T00:00:00.000Z' });
    });

    it('does not try to refresh a record no source can handle', async () => {
      await store.upsertProduct(makeProduct({ url: 'https://elsewhere.example/p/1' }));
      now = T0 + 2 * HOUR;

      const detail = await service.getProduct(1);

      expect(detail.isStale).toBe(true);
      expect(source.scrape).not.toHaveBeenCalled();
    });

    describe('refreshing a merged record', () => {
      const OTHER_URL = 'https://other.example/p/9';

      beforeEach(async () => {
        await store.upsertProduct({
          ...makeProduct({ url: PRODUCT_URL, source: 'shop', title: 'Acme Earbuds', price: 1999 }),
          sources: [
            { source: 'shop', url: PRODUCT_URL, price: 1999 },
            { source: 'other', url: OTHER_URL, price: 1899 },
          ],
          bestPrice: 1899,
        });
        now = T0 + 2 * HOUR;
      });

      it('updates its own source entry and keeps the others', async () => {
        price = '₹2,500';

        const { product } = await service.getProduct(1);

        expect(product.price).toBe(2500);
        expect(product.sources).toEqual([
          { source: 'shop', url: PRODUCT_URL, price: 2500 },
          { source: 'other', url: OTHER_URL, price: 1899 },
        ]);
        expect(product.bestPrice).toBe(1899);
      });

      it('recomputes the best price when the refreshed listing is cheapest', async () => {
        price = '₹1,500';

        const { product } = await service.getProduct(1);

        expect(product.sources?.map(s => s.price)).toEqual([1500, 1899]);
        expect(product.bestPrice).toBe(1500);
      });
    });

    it('throws NotFoundError for an unknown id', async () => {
      await expect(service.getProduct(99)).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.getProduct(99)).rejects.toThrow('Product with ID 99 not found');
    });
  });

  describe('getPriceHistory', () => {
    it('throws NotFoundError for an unknown id', async () => {
      await expect(service.getPriceHistory(7)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('honours the limit', async () => {
      for (const next of ['₹100', '₹110', '₹120']) {
        price = next;
        await service.scrapeAndStore(PRODUCT_URL);
      }

      expect((await service.getPriceHistory(1, 2)).map(s => s.price)).toEqual([120, 110]);
    });
  });

  describe('compare', () => {
    it('compares stored products by id', async () => {
      await store.upsertProduct(makeProduct({ url: 'https://shop.example/1', price: 500 }));
      await store.upsertProduct(makeProduct({ url: 'https://shop.example/2', price: 450 }));

      const result = await service.compare([1, 2, 3]);

      expect(result.count).toBe(2);
      expect(result.best.price).toEqual({ value: 450, product_ids: [2] });
    });
  });

  describe('scrapeBatchAndStore', () => {
    it('stores what it can and reports the rest', async () => {
      const results = await service.scrapeBatchAndStore([PRODUCT_URL, 'https://elsewhere.example/p/2']);

      expect(results[0]).toMatchObject({ url: PRODUCT_URL, success: true, product: { id: 1, price: 100 } });
      expect(results[1]).toEqual({
        url: 'https://elsewhere.example/p/2',
        success: false,
        error: 'URL not supported: https://elsewhere.example/p/2',
      });
    });

    it('reports a storage failure for that URL only', async () => {
      class BrokenStore extends InMemoryProductStore {
        override async upsertProduct(_product: ProductInput): Promise<StoredProduct> {
          throw new Error('disk full');
        }
      }
      const broken = new CatalogService(new BrokenStore(), new AggregationDispatcher([source]), {
        staleAfterMs: HOUR,
        defaultCurrency: 'INR',
      });

      const [result] = await broken.scrapeBatchAndStore([PRODUCT_URL]);

      expect(result).toEqual({
        url: PRODUCT_URL,
        success: false,
        error: 'Failed to store product: disk full',
      });
      await expect(broken.scrapeAndStore(PRODUCT_URL)).rejects.toBeInstanceOf(StoreError);
    });
  });
});
