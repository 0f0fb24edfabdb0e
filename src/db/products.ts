/**
 * Pricewise — Supabase Product Store
 *
 * ProductStore over the `products` and `price_history` tables
 * (see schema.sql). Rows are validated with zod on the way out.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type {
  CatalogPageRequest,
  CatalogSortField,
  Page,
  PageRequest,
  PriceSample,
  ProductInput,
  StoreHealth,
  StoreStats,
  StoredProduct,
} from '../types';
import { DEFAULT_HISTORY_LIMIT, applyUpdate, type ProductStore } from '../catalog/store';
import { paginate } from '../catalog/paging';
import { StoreError, errorMessage } from '../lib/errors';
import { NO_ROWS, handleSupabaseError } from './client';

// ============================================================
// ROW SCHEMAS
// ============================================================

const numeric = z.coerce.number();

const listingSourceSchema = z.object({
  source: z.string(),
  url: z.string(),
  price: numeric,
  availability: z.string().nullish().transform(value => value ?? undefined),
});

const productRowSchema = z.object({
  id: numeric,
  url: z.string(),
  title: z.string(),
  canonical_title: z.string(),
  source: z.string(),
  price: numeric,
  original_price: numeric.nullable(),
  currency: z.string(),
  rating: numeric.nullable(),
  rating_count: numeric.nullable(),
  image_url: z.string().nullable(),
  availability: z.string().nullable(),
  description: z.string().nullable(),
  sources: z.array(listingSourceSchema).nullable(),
  best_price: numeric.nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

const priceRowSchema = z.object({
  product_id: numeric,
  price: numeric,
  currency: z.string(),
  recorded_at: z.string(),
});

type ProductRow = z.infer<typeof productRowSchema>;

function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T[] {
  const result = z.array(schema).safeParse(data ?? []);
  if (!result.success) {
    throw new StoreError(`Unexpected row shape: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new StoreError(`Unexpected row shape: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

function toStoredProduct(row: ProductRow): StoredProduct {
  return {
    id: row.id,
    url: row.url,
    title: row.title,
    canonicalTitle: row.canonical_title,
    source: row.source,
    price: row.price,
    currency: row.currency,
    originalPrice: row.original_price ?? undefined,
    rating: row.rating ?? undefined,
    ratingCount: row.rating_count ?? undefined,
    imageUrl: row.image_url ?? undefined,
    availability: row.availability ?? undefined,
    description: row.description ?? undefined,
    sources: row.sources ?? undefined,
    bestPrice: row.best_price ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toProductColumns(product: ProductInput) {
  return {
    url: product.url,
    title: product.title,
    canonical_title: product.canonicalTitle,
    source: product.source,
    price: product.price,
    original_price: product.originalPrice ?? null,
    currency: product.currency,
    rating: product.rating ?? null,
    rating_count: product.ratingCount ?? null,
    image_url: product.imageUrl ?? null,
    availability: product.availability ?? null,
    description: product.description ?? null,
    sources: product.sources ?? null,
    best_price: product.bestPrice ?? product.price,
  };
}

const SORT_COLUMNS: Record<CatalogSortField, string> = {
  price: 'best_price',
  rating: 'rating',
  updatedAt: 'updated_at',
  createdAt: 'created_at',
};

function toPage(rows: unknown, count: number | null, page: CatalogPageRequest | PageRequest): Page<StoredProduct> {
  const items = parseRows(productRowSchema, rows).map(toStoredProduct);
  const total = count ?? items.length;
  const totalPages = total === 0 ? 0 : Math.ceil(total / page.perPage);

  return {
    items,
    pagination: {
      page: page.page,
      perPage: page.perPage,
      total,
      totalPages,
      hasNext: page.page < totalPages,
      hasPrev: page.page > 1,
    },
  };
}

function toPriceSample(row: z.infer<typeof priceRowSchema>): PriceSample {
  return {
    productId: row.product_id,
    price: row.price,
    currency: row.currency,
    recordedAt: row.recorded_at,
  };
}

// ============================================================
// STORE
// ============================================================

export class SupabaseProductStore implements ProductStore {
  constructor(private readonly client: SupabaseClient) {}

  async upsertProduct(product: ProductInput): Promise<StoredProduct> {
    const existing = await this.getByUrl(product.url);

    if (existing) {
      const columns = toProductColumns(applyUpdate(existing, product));
      const { data, error } = await this.client
        .from('products')
        .update({ ...columns, updated_at: new Date().toISOString() })
        .eq('id', existing.id)
        .select()
        .single();

      if (error) throw handleSupabaseError(error);
      const updated = toStoredProduct(parseRow(productRowSchema, data));

      if (product.price > 0 && product.price !== existing.price) {
        await this.recordPriceSample(updated.id, product.price, product.currency);
      }
      return updated;
    }

    const { data, error } = await this.client
      .from('products')
      .insert(toProductColumns(product))
      .select()
      .single();

    if (error) throw handleSupabaseError(error);
    const created = toStoredProduct(parseRow(productRowSchema, data));

    if (product.price > 0) {
      await this.recordPriceSample(created.id, product.price, product.currency);
    }
    return created;
  }

  async getById(id: number): Promise<StoredProduct | null> {
    const { data, error } = await this.client.from('products').select('*').eq('id', id).single();

    if (error) {
      if (error.code === NO_ROWS) return null;
      throw handleSupabaseError(error);
    }
    return toStoredProduct(parseRow(productRowSchema, data));
  }

  async getByUrl(url: string): Promise<StoredProduct | null> {
    const { data, error } = await this.client.from('products').select('*').eq('url', url).single();

    if (error) {
      if (error.code === NO_ROWS) return null;
      throw handleSupabaseError(error);
    }
    return toStoredProduct(parseRow(productRowSchema, data));
  }

  async getByIds(ids: readonly number[]): Promise<StoredProduct[]> {
    if (ids.length === 0) return [];

    const { data, error } = await this.client.from('products').select('*').in('id', [...ids]);

    if (error) throw handleSupabaseError(error);
    const byId = new Map(parseRows(productRowSchema, data).map(row => [row.id, toStoredProduct(row)]));

    return ids
      .map(id => byId.get(id))
      .filter((product): product is StoredProduct => product !== undefined);
  }

  async recordPriceSample(productId: number, price: number, currency: string): Promise<PriceSample> {
    const { data, error } = await this.client
      .from('price_history')
      .insert({ product_id: productId, price, currency })
      .select()
      .single();

    if (error) throw handleSupabaseError(error);
    return toPriceSample(parseRow(priceRowSchema, data));
  }

  async getPriceHistory(productId: number, limit: number = DEFAULT_HISTORY_LIMIT): Promise<PriceSample[]> {
    const { data, error } = await this.client
      .from('price_history')
      .select('product_id, price, currency, recorded_at')
      .eq('product_id', productId)
      .order('recorded_at', { ascending: false })
      .limit(limit);

    if (error) throw handleSupabaseError(error);
    return parseRows(priceRowSchema, data).map(toPriceSample);
  }

  async searchByTitle(query: string, page: PageRequest): Promise<Page<StoredProduct>> {
    const words = query.toLowerCase().split(/\s+/).filter(Boolean);
    if (words.length === 0) {
      return paginate([], page);
    }

    let request = this.client.from('products').select('*', { count: 'exact' });
    for (const word of words) {
      request = request.ilike('title', `%${word.replace(/[%_]/g, '')}%`);
    }

    const from = (page.page - 1) * page.perPage;
    const { data, error, count } = await request
      .order(SORT_COLUMNS[page.sortBy], {
        ascending: page.sortOrder === 'asc',
        nullsFirst: false,
      })
      .range(from, from + page.perPage - 1);

    if (error) throw handleSupabaseError(error);
    return toPage(data, count, page);
  }

  async listProducts(page: CatalogPageRequest): Promise<Page<StoredProduct>> {
    const from = (page.page - 1) * page.perPage;
    const { data, error, count } = await this.client
      .from('products')
      .select('*', { count: 'exact' })
      .order(SORT_COLUMNS[page.sortBy], {
        ascending: page.sortOrder === 'asc',
        nullsFirst: false,
      })
      .range(from, from + page.perPage - 1);

    if (error) throw handleSupabaseError(error);
    return toPage(data, count, page);
  }

  async stats(): Promise<StoreStats> {
    const [products, samples] = await Promise.all([
      this.client.from('products').select('source'),
      this.client.from('price_history').select('id', { count: 'exact', head: true }),
    ]);

    if (products.error) throw handleSupabaseError(products.error);
    if (samples.error) throw handleSupabaseError(samples.error);

    const rows = parseRows(z.object({ source: z.string() }), products.data);
    const productsBySource: Record<string, number> = {};
    for (const row of rows) {
      productsBySource[row.source] = (productsBySource[row.source] ?? 0) + 1;
    }

    return {
      totalProducts: rows.length,
      totalPriceSamples: samples.count ?? 0,
      productsBySource,
    };
  }

  /**
   * Round-trip a head-only count on `products`.
   */
  async health(): Promise<StoreHealth> {
    const start = Date.now();
    try {
      const { error } = await this.client.from('products').select('id', { count: 'exact', head: true });
      const latencyMs = Date.now() - start;
      return error ? { healthy: false, latencyMs, error: error.message } : { healthy: true, latencyMs };
    } catch (error) {
      return { healthy: false, latencyMs: Date.now() - start, error: errorMessage(error) };
    }
  }
}
