/**
 * Pricewise — Stored Record Serialization
 */

import type { PriceSample, ProductRecord, StoredProduct } from '../types';
import { toProductRecord } from '../aggregation/deduplicator';

export type StoredProductRecord = ProductRecord & {
  id: number;
  created_at: string;
  updated_at: string;
};

export interface PriceSampleRecord {
  price: number;
  currency: string;
  recorded_at: string;
}

/**
 * A stored product in wire form. Products stored from a single scrape get
 * a one-element source list and their own price as best price.
 */
export function toStoredProductRecord(product: StoredProduct): StoredProductRecord {
  const record = toProductRecord({
    ...product,
    sources: product.sources ?? [
      {
        source: product.source,
        url: product.url,
        price: product.price,
        availability: product.availability,
      },
    ],
    bestPrice: product.bestPrice ?? product.price,
  });

  return {
    id: product.id,
    ...record,
    created_at: product.createdAt,
    updated_at: product.updatedAt,
  };
}

export function toPriceSampleRecord(sample: PriceSample): PriceSampleRecord {
  return {
    price: sample.price,
    currency: sample.currency,
    recorded_at: sample.recordedAt,
  };
}
