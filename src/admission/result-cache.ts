/**
 * Pricewise — Result Cache
 *
 * In-memory, TTL- and capacity-bounded memo of finished aggregation results.
 * Expired entries are dropped lazily on read or in bulk by cleanupExpired().
 * At capacity the entry with the oldest creation time is evicted, whether
 * or not it has been read recently.
 */

import type { PageRequest } from '../types';

export interface CacheEntry<V> {
  key: string;
  value: V;
  createdAt: number;
  expiresAt: number;
}

export interface ResultCacheOptions {
  maxSize: number;
  ttlMs: number;
  /** Clock in epoch ms. */
  now?: () => number;
}

export interface CacheStats {
  size: number;
  maxSize: number;
  ttlMs: number;
}

export class ResultCache<V = unknown> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: ResultCacheOptions) {
    if (options.maxSize < 1) {
      throw new RangeError('maxSize must be at least 1');
    }
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() > entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: V, ttlMs: number = this.ttlMs): void {
    if (!this.entries.has(key) && this.entries.size >= this.maxSize) {
      this.evictOldest();
    }

    const createdAt = this.now();
    this.entries.set(key, { key, value, createdAt, expiresAt: createdAt + ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Drop every expired entry. Returns how many were removed.
   */
  cleanupExpired(): number {
    const now = this.now();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (now > entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }

    return removed;
  }

  stats(): CacheStats {
    return { size: this.entries.size, maxSize: this.maxSize, ttlMs: this.ttlMs };
  }

  private evictOldest(): void {
    let oldest: CacheEntry<V> | undefined;

    for (const entry of this.entries.values()) {
      if (!oldest || entry.createdAt < oldest.createdAt) {
        oldest = entry;
      }
    }

    if (oldest) {
      this.entries.delete(oldest.key);
    }
  }
}

/**
 * Fingerprint a search. Queries differing only in case or spacing share
 * an entry; paging, sort and site filter are part of the key.
 */
export function buildSearchCacheKey(
  query: string,
  page: PageRequest,
  sites: readonly string[] = []
): string {
  const normalizedQuery = query.trim().toLowerCase().split(/\s+/).filter(Boolean).join(' ');
  const siteKey = [...sites].map(site => site.toLowerCase()).sort().join(',') || '*';

  return [
    'search',
    normalizedQuery,
    page.page,
    page.perPage,
    page.sortBy,
    page.sortOrder,
    siteKey,
  ].join(':');
}
