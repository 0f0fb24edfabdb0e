/**
 * Pricewise — In-Memory Product Store
 *
 * Used when no database is configured, and by the test suite.
 * Ids are assigned from 1 in insertion order. Records are copied on the
 * way in and out.
 */

import type {
  CatalogPageRequest,
  Page,
  PageRequest,
  PriceSample,
  ProductInput,
  StoreHealth,
  StoreStats,
  StoredProduct,
} from '../types';
import { DEFAULT_HISTORY_LIMIT, applyUpdate, type ProductStore } from './store';
import { paginate, sortCatalog, sortProducts } from './paging';

export interface InMemoryStoreOptions {
  /** Clock in epoch ms. */
  now?: () => number;
}

function copyProduct(product: StoredProduct): StoredProduct {
  return {
    ...product,
    sources: product.sources?.map(source => ({ ...source })),
  };
}

export class InMemoryProductStore implements ProductStore {
  private readonly products = new Map<number, StoredProduct>();
  private readonly idsByUrl = new Map<string, number>();
  private readonly samples: PriceSample[] = [];
  private nextId = 1;
  private readonly now: () => number;

  constructor(options: InMemoryStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async upsertProduct(product: ProductInput): Promise<StoredProduct> {
    const timestamp = new Date(this.now()).toISOString();
    const existingId = this.idsByUrl.get(product.url);
    const existing = existingId === undefined ? undefined : this.products.get(existingId);

    if (existing) {
      const updated: StoredProduct = {
        ...applyUpdate(existing, product),
        id: existing.id,
        createdAt: existing.createdAt,
        updatedAt: timestamp,
      };
      this.products.set(existing.id, copyProduct(updated));

      if (product.price > 0 && product.price !== existing.price) {
        await this.recordPriceSample(existing.id, product.price, product.currency);
      }
      return copyProduct(updated);
    }

    const created: StoredProduct = {
      ...product,
      id: this.nextId++,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.products.set(created.id, copyProduct(created));
    this.idsByUrl.set(created.url, created.id);

    if (product.price > 0) {
      await this.recordPriceSample(created.id, product.price, product.currency);
    }
    return copyProduct(created);
  }

  async getById(id: number): Promise<StoredProduct | null> {
    const product = this.products.get(id);
    return product ? copyProduct(product) : null;
  }

  async getByUrl(url: string): Promise<StoredProduct | null> {
    const id = this.idsByUrl.get(url);
    return id === undefined ? null : this.getById(id);
  }

  async getByIds(ids: readonly number[]): Promise<StoredProduct[]> {
    return ids
      .map(id => this.products.get(id))
      .filter((product): product is StoredProduct => product !== undefined)
      .map(copyProduct);
  }

  async recordPriceSample(productId: number, price: number, currency: string): Promise<PriceSample> {
    const sample: PriceSample = {
      productId,
      price,
      currency,
      recordedAt: new Date(this.now()).toISOString(),
    };
    this.samples.push(sample);
    return { ...sample };
  }

  async getPriceHistory(productId: number, limit: number = DEFAULT_HISTORY_LIMIT): Promise<PriceSample[]> {
    return this.samples
      .filter(sample => sample.productId === productId)
      .reverse()
      .slice(0, limit)
      .map(sample => ({ ...sample }));
  }

  async searchByTitle(query: string, page: PageRequest): Promise<Page<StoredProduct>> {
    const words = query.toLowerCase().split(/\s+/).filter(Boolean);
    if (words.length === 0) {
      return paginate([], page);
    }

    const matches = [...this.products.values()].filter(product => {
      const title = product.title.toLowerCase();
      return words.every(word => title.includes(word));
    });

    const sorted = sortProducts(matches, page.sortBy, page.sortOrder);
    const result = paginate(sorted, page);
    return { ...result, items: result.items.map(copyProduct) };
  }

  async listProducts(page: CatalogPageRequest): Promise<Page<StoredProduct>> {
    const sorted = sortCatalog([...this.products.values()], page.sortBy, page.sortOrder);
    const result = paginate(sorted, page);
    return { ...result, items: result.items.map(copyProduct) };
  }

  async stats(): Promise<StoreStats> {
    const productsBySource: Record<string, number> = {};
    for (const product of this.products.values()) {
      productsBySource[product.source] = (productsBySource[product.source] ?? 0) + 1;
    }

    return {
      totalProducts: this.products.size,
      totalPriceSamples: this.samples.length,
      productsBySource,
    };
  }

  async health(): Promise<StoreHealth> {
    return { healthy: true, latencyMs: 0 };
  }
}
