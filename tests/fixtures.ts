/**
 * Shared test builders
 */

import { vi } from 'vitest';
import type { SourceAdapter } from '../src/aggregation/dispatcher';
import type { NormalizedProduct, RawListing } from '../src/types';

export function makeProduct(overrides: Partial<NormalizedProduct> = {}): NormalizedProduct {
  return {
    url: 'https://shop.example/item',
    title: 'Sample Product',
    canonicalTitle: 'sample product',
    source: 'shop',
    price: 100,
    currency: 'INR',
    ...overrides,
  };
}

export function makeListing(overrides: Partial<RawListing> = {}): RawListing {
  return {
    source: 'shop',
    url: 'https://shop.example/item',
    title: 'Sample Product',
    ...overrides,
  };
}

export interface FakeSourceOptions {
  domains?: string[];
  name?: string;
  search?: (query: string, maxResults: number) => Promise<RawListing[]>;
  scrape?: (url: string) => Promise<RawListing>;
}

/**
 * In-process source: matches its domains by hostname like ProductSource does.
 */
export function fakeSource(key: string, options: FakeSourceOptions = {}) {
  const domains = options.domains ?? [`${key}.example`];
  const defaultSearch = async (_query: string, _maxResults: number): Promise<RawListing[]> => [];

  const name = options.name ?? key.toUpperCase();
  const parseProduct = (_html: string, url: string): RawListing =>
    makeListing({ source: key, url, title: `${key} product`, price: '₹100' });

  const source = {
    key,
    name,
    domains,
    canHandle: (url: string) => {
      try {
        const host = new URL(url).hostname;
        return domains.some(domain => host === domain || host.endsWith(`.${domain}`));
      } catch {
        return false;
      }
    },
    describe: () => ({ key, name, domains: [...domains] }),
    fetchPage: vi.fn(async (url: string) => `<html><body>${url}</body></html>`),
    parseProduct,
    search: vi.fn(options.search ?? defaultSearch),
    scrape: vi.fn(options.scrape ?? (async (url: string) => parseProduct('', url))),
  } satisfies SourceAdapter;

  return source;
}
