/**
 * Pricewise — Listing Deduplication
 *
 * Groups listings that describe the same physical product and merges each
 * group into one AggregatedProduct with every contributing source and the
 * lowest observed price.
 */

import type {
  AggregatedProduct,
  ListingSource,
  NormalizedProduct,
  ProductRecord,
} from '../types';
import { titleSimilarity } from './similarity';

export const DEFAULT_MATCH_THRESHOLD = 0.85;

/**
 * Result of a deduplication pass.
 */
export interface DedupResult {
  products: AggregatedProduct[];
  /** Groups with more than one member. */
  groupCount: number;
  /** Listings folded into another listing's record. */
  duplicateCount: number;
  totalProcessed: number;
}

// ============================================================
// GROUPING
// ============================================================

/**
 * Greedy single-pass clustering. Each unassigned product seeds a group and
 * pulls in every later unassigned product whose canonical title is at least
 * `threshold` similar to the seed. Members are never compared to each other,
 * so this is not a transitive closure.
 *
 * Returns index groups of size > 1 in discovery order.
 */
export function findDuplicateGroups(
  products: readonly NormalizedProduct[],
  threshold: number = DEFAULT_MATCH_THRESHOLD
): number[][] {
  const groups: number[][] = [];
  const assigned = new Set<number>();

  for (let i = 0; i < products.length; i++) {
    if (assigned.has(i)) continue;

    const group = [i];
    assigned.add(i);
    const seedTitle = products[i].canonicalTitle;

    for (let j = i + 1; j < products.length; j++) {
      if (assigned.has(j)) continue;

      if (titleSimilarity(seedTitle, products[j].canonicalTitle) >= threshold) {
        group.push(j);
        assigned.add(j);
      }
    }

    if (group.length > 1) {
      groups.push(group);
    }
  }

  return groups;
}

// ============================================================
// MERGING
// ============================================================

function filledFieldCount(product: NormalizedProduct): number {
  return Object.values(product).filter(
    value => value !== undefined && value !== null && value !== ''
  ).length;
}

/**
 * The most complete record wins; review count breaks ties, then input order.
 */
function pickRepresentative(group: readonly NormalizedProduct[]): NormalizedProduct {
  let best = group[0];
  let bestScore: [number, number] = [filledFieldCount(best), best.ratingCount ?? 0];

  for (const candidate of group.slice(1)) {
    const score: [number, number] = [filledFieldCount(candidate), candidate.ratingCount ?? 0];
    if (score[0] > bestScore[0] || (score[0] === bestScore[0] && score[1] > bestScore[1])) {
      best = candidate;
      bestScore = score;
    }
  }

  return best;
}

function toListingSource(product: NormalizedProduct): ListingSource {
  return {
    source: product.source,
    url: product.url,
    price: product.price,
    availability: product.availability,
  };
}

/**
 * Merge `products` according to `groups` (from findDuplicateGroups).
 * Merged groups come first in discovery order, then untouched products in
 * input order. Callers that need a presentation order sort afterwards.
 */
export function mergeDuplicates(
  products: readonly NormalizedProduct[],
  groups: readonly number[][]
): AggregatedProduct[] {
  const result: AggregatedProduct[] = [];
  const merged = new Set<number>();

  for (const group of groups) {
    const members = group.map(index => products[index]);
    const representative = pickRepresentative(members);

    result.push({
      ...representative,
      sources: members.map(toListingSource),
      bestPrice: Math.min(...members.map(member => member.price)),
    });

    for (const index of group) {
      merged.add(index);
    }
  }

  products.forEach((product, index) => {
    if (merged.has(index)) return;
    result.push({
      ...product,
      sources: [toListingSource(product)],
      bestPrice: product.price,
    });
  });

  return result;
}

/**
 * Group and merge in one step.
 */
export function deduplicate(
  products: readonly NormalizedProduct[],
  threshold: number = DEFAULT_MATCH_THRESHOLD
): DedupResult {
  const groups = findDuplicateGroups(products, threshold);
  const merged = mergeDuplicates(products, groups);

  return {
    products: merged,
    groupCount: groups.length,
    duplicateCount: products.length - merged.length,
    totalProcessed: products.length,
  };
}

// ============================================================
// SERIALIZATION
// ============================================================

export function toProductRecord(product: AggregatedProduct): ProductRecord {
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
    sources: product.sources.map(source => ({ ...source })),
    best_price: product.bestPrice,
  };
}
