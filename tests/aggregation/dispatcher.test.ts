/**
 * Tests for Aggregation Dispatcher
 */

import { describe, it, expect } from 'vitest';
import { AggregationDispatcher } from '../../src/aggregation/dispatcher';
import { UnsupportedSourceError } from '../../src/lib/errors';
import { AmazonSource } from '../../src/sources';
import { fakeSource, makeListing } from '../fixtures';

describe('AggregationDispatcher', () => {
  describe('searchAll', () => {
    it('isolates a failing source to its own slot', async () => {
      const alpha = fakeSource('alpha', {
        search: async query => [makeListing({ source: 'alpha', title: `${query} one` })],
      });
      const beta = fakeSource('beta', {
        search: async () => {
          throw new Error('HTTP 503');
        },
      });
      const gamma = fakeSource('gamma', {
        search: async () => [makeListing({ source: 'gamma' }), makeListing({ source: 'gamma' })],
      });

      const dispatcher = new AggregationDispatcher([alpha, beta, gamma]);
      const results = await dispatcher.searchAll('earbuds', 10);

      expect(results.map(r => [r.source, r.success, r.listings.length])).toEqual([
        ['alpha', true, 1],
        ['beta', false, 0],
        ['gamma', true, 2],
      ]);
      expect(results[1]).toMatchObject({ success: false, error: 'HTTP 503' });
    });

    it('catches synchronous throws inside a source', async () => {
      const broken = fakeSource('broken', {
        search: () => {
          throw new Error('parser exploded');
        },
      });

      const [result] = await new AggregationDispatcher([broken]).searchAll('q', 5);
      expect(result).toMatchObject({ source: 'broken', success: false, error: 'parser exploded' });
    });

    it('passes the query and per-source limit to every source', async () => {
      const alpha = fakeSource('alpha');
      const beta = fakeSource('beta');

      await new AggregationDispatcher([alpha, beta]).searchAll('usb cable', 7);

      expect(alpha.search).toHaveBeenCalledWith('usb cable', 7);
      expect(beta.search).toHaveBeenCalledWith('usb cable', 7);
    });

    it('reports a source that exceeds the timeout as failed', async () => {
      const slow = fakeSource('slow', { search: () => new Promise(() => {}) });
      const fast = fakeSource('fast', { search: async () => [makeListing()] });

      const dispatcher = new AggregationDispatcher([slow, fast], { sourceTimeoutMs: 20 });
      const results = await dispatcher.searchAll('q', 5);

      expect(results[0]).toMatchObject({ source: 'slow', success: false, error: 'Timeout after 20ms' });
      expect(results[1]).toMatchObject({ source: 'fast', success: true });
    });

    it('respects the pool size', async () => {
      let inFlight = 0;
      let peak = 0;
      const search = async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise(resolve => setTimeout(resolve, 5));
        inFlight--;
        return [];
      };

      const sources = ['a', 'b', 'c', 'd', 'e'].map(key => fakeSource(key, { search }));
      await new AggregationDispatcher(sources, { maxWorkers: 2 }).searchAll('q', 1);

      expect(peak).toBe(2);
    });
  });

  describe('searchSources', () => {
    it('searches only the named sources and ignores unknown keys', async () => {
      const alpha = fakeSource('alpha');
      const beta = fakeSource('beta');

      const results = await new AggregationDispatcher([alpha, beta]).searchSources(
        'q',
        ['BETA', 'nope'],
        3
      );

      expect(results.map(r => r.source)).toEqual(['beta']);
      expect(alpha.search).not.toHaveBeenCalled();
    });

    it('returns nothing when no key matches', async () => {
      const results = await new AggregationDispatcher([fakeSource('alpha')]).searchSources('q', ['zeta'], 3);
      expect(results).toEqual([]);
    });
  });

  describe('scrapeOne', () => {
    it('uses the first source that can handle the URL', async () => {
      const first = fakeSource('first', { domains: ['shop.example'] });
      const second = fakeSource('second', { domains: ['shop.example'] });

      const listing = await new AggregationDispatcher([first, second]).scrapeOne(
        'https://www.shop.example/p/1'
      );

      expect(listing.source).toBe('first');
      expect(second.scrape).not.toHaveBeenCalled();
    });

    it('rejects URLs no source can handle', async () => {
      const dispatcher = new AggregationDispatcher([fakeSource('alpha')]);

      await expect(dispatcher.scrapeOne('https://unknown.example/p/1')).rejects.toBeInstanceOf(
        UnsupportedSourceError
      );
    });
  });

  describe('scrapeBatch', () => {
    it('reports each URL on its own, in input order', async () => {
      const alpha = fakeSource('alpha');
      const beta = fakeSource('beta', {
        scrape: async () => {
          throw new Error('HTTP 404');
        },
      });
      const dispatcher = new AggregationDispatcher([alpha, beta]);

      const results = await dispatcher.scrapeBatch([
        'https://alpha.example/p/1',
        'https://unknown.example/p/2',
        'https://beta.example/p/3',
      ]);

      expect(results).toEqual([
        {
          url: 'https://alpha.example/p/1',
          success: true,
          listing: makeListing({
            source: 'alpha',
            url: 'https://alpha.example/p/1',
            title: 'alpha product',
            price: '₹100',
          }),
        },
        {
          url: 'https://unknown.example/p/2',
          success: false,
          error: 'URL not supported: https://unknown.example/p/2',
        },
        { url: 'https://beta.example/p/3', success: false, error: 'HTTP 404' },
      ]);
    });
  });

  describe('supportedSites', () => {
    it('lists every source in registration order', () => {
      const dispatcher = new AggregationDispatcher([
        fakeSource('alpha'),
        fakeSource('beta', { domains: ['beta.example', 'beta.test'] }),
      ]);

      expect(dispatcher.supportedSites()).toEqual([
        { key: 'alpha', name: 'ALPHA', domains: ['alpha.example'] },
        { key: 'beta', name: 'BETA', domains: ['beta.example', 'beta.test'] },
      ]);
    });

    it('describes built-in sources through their own describe()', () => {
      const dispatcher = new AggregationDispatcher([new AmazonSource()]);

      expect(dispatcher.supportedSites()).toEqual([
        { key: 'amazon', name: 'Amazon', domains: ['amazon.in', 'amazon.com', 'amazon.co.uk', 'amazon.de'] },
      ]);
    });
  });
});
