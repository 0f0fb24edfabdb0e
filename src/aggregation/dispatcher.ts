/**
 * Pricewise — Aggregation Dispatcher
 *
 * Fans a query out to every registered source (or a batch of URLs out to
 * their matching sources) on a bounded worker pool and fans the results
 * back in. One source failing, throwing or timing out only affects its
 * own slot in the result.
 */

import type { BatchResult, RawListing, SourceResult, SupportedSite } from '../types';
import { logger } from '../lib/logger';
import { UnsupportedSourceError, errorMessage } from '../lib/errors';
import { runPool } from '../lib/pool';

const log = logger.child({ component: 'dispatcher' });

// ============================================================
// TYPES
// ============================================================

/**
 * What the dispatcher needs from a source. ProductSource satisfies it.
 */
export interface SourceAdapter {
  readonly key: string;
  readonly name: string;
  readonly domains: readonly string[];
  canHandle(url: string): boolean;
  describe(): SupportedSite;
  /** GET a page as text. */
  fetchPage(url: string): Promise<string>;
  parseProduct(html: string, url: string): RawListing;
  search(query: string, maxResults: number): Promise<RawListing[]>;
  /** fetchPage then parseProduct. */
  scrape(url: string): Promise<RawListing>;
}

export interface DispatcherConfig {
  /** Pool size (default 5). */
  maxWorkers?: number;
  /** Per-task budget in ms; 0 disables (default 15000). */
  sourceTimeoutMs?: number;
}

const DEFAULT_CONFIG: Required<DispatcherConfig> = {
  maxWorkers: 5,
  sourceTimeoutMs: 15_000,
};

// ============================================================
// DISPATCHER
// ============================================================

export class AggregationDispatcher {
  private readonly sources: readonly SourceAdapter[];
  private readonly config: Required<DispatcherConfig>;

  constructor(sources: readonly SourceAdapter[], config: DispatcherConfig = {}) {
    this.sources = sources;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Search every registered source. Results follow registration order.
   */
  async searchAll(query: string, maxPerSource: number): Promise<SourceResult[]> {
    return this.runSearch(this.sources, query, maxPerSource);
  }

  /**
   * Search only the named sources. Unknown keys are ignored.
   */
  async searchSources(
    query: string,
    sourceKeys: readonly string[],
    maxPerSource: number
  ): Promise<SourceResult[]> {
    const wanted = new Set(sourceKeys.map(key => key.toLowerCase()));
    const selected = this.sources.filter(source => wanted.has(source.key.toLowerCase()));
    return this.runSearch(selected, query, maxPerSource);
  }

  /**
   * Scrape one product URL with the first source that can handle it.
   */
  async scrapeOne(url: string): Promise<RawListing> {
    const source = this.sourceFor(url);
    if (!source) {
      throw new UnsupportedSourceError(url);
    }

    log.info('Scraping product', { source: source.key, url });
    return source.scrape(url);
  }

  /**
   * Scrape many URLs concurrently. Results follow input order; an
   * unsupported or failing URL is reported in its own slot.
   */
  async scrapeBatch(urls: readonly string[]): Promise<BatchResult[]> {
    const settled = await runPool(urls, url => this.scrapeOne(url), {
      concurrency: this.config.maxWorkers,
      taskTimeoutMs: this.config.sourceTimeoutMs,
    });

    const results = settled.map((outcome, index): BatchResult =>
      outcome.ok
        ? { url: urls[index], success: true, listing: outcome.value }
        : { url: urls[index], success: false, error: errorMessage(outcome.error) }
    );

    log.info('Batch scrape completed', {
      total: urls.length,
      succeeded: results.filter(r => r.success).length,
    });

    return results;
  }

  sourceFor(url: string): SourceAdapter | undefined {
    return this.sources.find(source => source.canHandle(url));
  }

  supportedSites(): SupportedSite[] {
    return this.sources.map(source => source.describe());
  }

  private async runSearch(
    sources: readonly SourceAdapter[],
    query: string,
    maxPerSource: number
  ): Promise<SourceResult[]> {
    if (sources.length === 0) {
      log.warn('No sources to search');
      return [];
    }

    const settled = await runPool(sources, source => source.search(query, maxPerSource), {
      concurrency: this.config.maxWorkers,
      taskTimeoutMs: this.config.sourceTimeoutMs,
    });

    const results = settled.map((outcome, index): SourceResult => {
      const source = sources[index].key;

      if (outcome.ok) {
        log.info('Source search completed', {
          source,
          listings: outcome.value.length,
          durationMs: outcome.durationMs,
        });
        return { source, success: true, listings: outcome.value, durationMs: outcome.durationMs };
      }

      const error = errorMessage(outcome.error);
      log.warn('Source search failed', { source, error, durationMs: outcome.durationMs });
      return { source, success: false, listings: [], error, durationMs: outcome.durationMs };
    });

    log.info('Dispatch completed', {
      query,
      sources: results.length,
      failed: results.filter(r => !r.success).length,
    });

    return results;
  }
}
