/**
 * Pricewise — Product Source Base
 *
 * Abstract base class for all retail sources.
 * Each source provides its domains, a search URL and two parsers; the
 * shared fetch path handles politeness, timeouts and retries.
 */

import type * as cheerio from 'cheerio';
import type { RawListing, SupportedSite } from '../types';
import { logger } from '../lib/logger';
import { ScrapeFailedError, errorMessage } from '../lib/errors';
import { extractJsonLdProduct, loadHtml, metaContent } from './html';

export interface SourceOptions {
  /** Per-request budget. */
  timeoutMs: number;
  /** Extra attempts after the first, for network errors, 429 and 5xx. */
  maxRetries: number;
  /** Base delay; doubles on each retry. */
  backoffMs: number;
  /** Minimum gap between two requests to the same host. */
  siteIntervalMs: number;
  userAgent: string;
  fetchImpl?: typeof fetch;
}

export const DEFAULT_SOURCE_OPTIONS: SourceOptions = {
  timeoutMs: 5_000,
  maxRetries: 3,
  backoffMs: 500,
  siteIntervalMs: 1_000,
  userAgent: 'Pricewise/1.0 (+https://example.com/pricewise-bot)',
};

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

function sleep(ms: number): Promise<void> {
  return ms > 0 ? new Promise(resolve => setTimeout(resolve, ms)) : Promise.resolve();
}

class RetryableFetchError extends Error {}

/**
 * Abstract base class for product sources.
 */
export abstract class ProductSource {
  /** Stable identifier used in API filters and listing `source` fields. */
  abstract readonly key: string;
  /** Display name. */
  abstract readonly name: string;
  abstract readonly domains: readonly string[];

  protected readonly options: SourceOptions;
  protected logger = logger.child({ source: this.constructor.name });

  /** Earliest time the next request to each host may start. */
  private readonly nextSlot = new Map<string, number>();

  constructor(options: Partial<SourceOptions> = {}) {
    this.options = { ...DEFAULT_SOURCE_OPTIONS, ...options };
  }

  /**
   * URL of the site's search results page for `query`.
   */
  abstract searchUrl(query: string): string;

  abstract parseProduct(html: string, url: string): RawListing;

  abstract parseSearchResults(html: string, maxResults: number): RawListing[];

  /**
   * True when the URL's host is one of this source's domains or a subdomain of one.
   */
  canHandle(url: string): boolean {
    let host: string;
    try {
      host = new URL(url).hostname.toLowerCase();
    } catch {
      return false;
    }
    return this.domains.some(domain => host === domain || host.endsWith(`.${domain}`));
  }

  describe(): SupportedSite {
    return { key: this.key, name: this.name, domains: [...this.domains] };
  }

  /**
   * Fetch and parse one product page.
   */
  async scrape(url: string): Promise<RawListing> {
    const html = await this.fetchPage(url);
    const listing = this.parseProduct(html, url);

    if (!listing.title) {
      throw new ScrapeFailedError(url, 'no product title found');
    }

    return listing;
  }

  /**
   * Fetch the search page for `query` and return at most `maxResults` listings.
   * Errors propagate so the dispatcher can record the source as failed.
   */
  async search(query: string, maxResults: number): Promise<RawListing[]> {
    const html = await this.fetchPage(this.searchUrl(query));
    const listings = this.parseSearchResults(html, maxResults).slice(0, maxResults);

    this.logger.debug('Search parsed', { query, listings: listings.length });
    return listings;
  }

  /**
   * GET a page as text.
   */
  async fetchPage(url: string): Promise<string> {
    const host = new URL(url).hostname;
    const fetchImpl = this.options.fetchImpl ?? fetch;
    const attempts = this.options.maxRetries + 1;
    let lastError = 'unknown error';

    for (let attempt = 0; attempt < attempts; attempt++) {
      if (attempt > 0) {
        await sleep(this.options.backoffMs * 2 ** (attempt - 1));
      }
      await this.waitForSlot(host);

      try {
        const response = await fetchImpl(url, {
          headers: {
            'User-Agent': this.options.userAgent,
            Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
            'Accept-Language': 'en-IN,en;q=0.8',
          },
          signal: AbortSignal.timeout(this.options.timeoutMs),
        });

        if (RETRYABLE_STATUS.has(response.status)) {
          throw new RetryableFetchError(`HTTP ${response.status}`);
        }
        if (!response.ok) {
          throw new ScrapeFailedError(url, `HTTP ${response.status}`);
        }

        const body = await response.text();
        this.logger.debug('Fetched page', { url, bytes: body.length, attempt: attempt + 1 });
        return body;
      } catch (error) {
        if (error instanceof ScrapeFailedError) throw error;

        lastError = errorMessage(error);
        this.logger.warn('Fetch attempt failed', {
          url,
          attempt: attempt + 1,
          of: attempts,
          error: lastError,
        });
      }
    }

    throw new ScrapeFailedError(url, lastError);
  }

  /**
   * Reserve the next request slot for `host` and wait for it.
   * The reservation is made before awaiting, so concurrent calls queue up.
   */
  private async waitForSlot(host: string): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot.get(host) ?? 0);
    this.nextSlot.set(host, slot + this.options.siteIntervalMs);

    if (slot > now) {
      this.logger.debug('Waiting for site interval', { host, waitMs: slot - now });
      await sleep(slot - now);
    }
  }

  /**
   * Fields readable from JSON-LD or OpenGraph, used where selectors miss.
   */
  protected structuredFields($: cheerio.CheerioAPI): Partial<RawListing> {
    const product = extractJsonLdProduct($);

    return {
      title: product?.name ?? metaContent($, 'og:title'),
      price: product?.price ?? metaContent($, 'product:price:amount'),
      currency: product?.currency ?? metaContent($, 'product:price:currency'),
      rating: product?.rating,
      reviews: product?.ratingCount,
      imageUrl: product?.image ?? metaContent($, 'og:image'),
      availability: product?.availability,
      description: product?.description ?? metaContent($, 'og:description'),
    };
  }

  protected load(html: string): cheerio.CheerioAPI {
    return loadHtml(html);
  }
}
