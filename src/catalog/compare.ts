/**
 * Pricewise — Product Comparison
 *
 * Output uses the API's snake_case field names.
 */

import type { StoredProduct } from '../types';

export interface ComparedProduct {
  id: number;
  title: string;
  source: string;
  url: string;
  price: number;
  original_price: number | null;
  currency: string;
  rating: number | null;
  rating_count: number | null;
  availability: string | null;
  is_best_price: boolean;
  is_best_rating: boolean;
  /** One decimal place; null without a higher original price. */
  discount_percent: number | null;
}

export interface BestValue {
  value: number;
  product_ids: number[];
}

export interface Comparison {
  products: ComparedProduct[];
  best: {
    price?: BestValue;
    rating?: BestValue;
  };
  count: number;
}

function bestBy(
  products: readonly StoredProduct[],
  read: (product: StoredProduct) => number | undefined,
  pick: (...values: number[]) => number
): BestValue | undefined {
  const candidates = products.filter(product => {
    const value = read(product);
    return value !== undefined && value > 0;
  });
  if (candidates.length === 0) return undefined;

  const value = pick(...candidates.map(product => read(product) ?? 0));
  return {
    value,
    product_ids: candidates.filter(product => read(product) === value).map(product => product.id),
  };
}

function discountPercent(price: number, originalPrice: number | undefined): number | null {
  if (!originalPrice || price <= 0 || originalPrice <= price) return null;
  return Math.round(((originalPrice - price) / originalPrice) * 1000) / 10;
}

/**
 * Align products side by side and mark the lowest price and highest rating.
 * Unknown prices (0) and missing ratings never win.
 */
export function compareProducts(products: readonly StoredProduct[]): Comparison {
  const price = bestBy(products, product => product.price, Math.min);
  const rating = bestBy(products, product => product.rating, Math.max);

  return {
    products: products.map(product => ({
      id: product.id,
      title: product.title,
      source: product.source,
      url: product.url,
      price: product.price,
      original_price: product.originalPrice ?? null,
      currency: product.currency,
      rating: product.rating ?? null,
      rating_count: product.ratingCount ?? null,
      availability: product.availability ?? null,
      is_best_price: price?.product_ids.includes(product.id) ?? false,
      is_best_rating: rating?.product_ids.includes(product.id) ?? false,
      discount_percent: discountPercent(product.price, product.originalPrice),
    })),
    best: { price, rating },
    count: products.length,
  };
}
