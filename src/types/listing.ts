/**
 * Pricewise — Listing Types
 *
 * Raw listings as scraped, normalized products, and aggregated products
 * after fuzzy deduplication.
 */

// ============================================================
// RAW LISTING (adapter output)
// ============================================================

/**
 * A listing exactly as a source adapter read it. Every value is the
 * site's own text; nothing is parsed yet.
 */
export interface RawListing {
  source: string;
  url: string;
  title: string;
  price?: string;
  originalPrice?: string;
  currency?: string;
  rating?: string;
  reviews?: string;
  imageUrl?: string;
  availability?: string;
  description?: string;
}

// ============================================================
// NORMALIZED PRODUCT
// ============================================================

export interface NormalizedProduct {
  url: string;
  title: string;
  /** Lowercased, punctuation-free, stopword-filtered title used for matching. */
  canonicalTitle: string;
  source: string;
  /** Always >= 0; 0 when the source price could not be parsed. */
  price: number;
  currency: string;
  originalPrice?: number;
  /** 0-5 scale; undefined when the source rating was missing or unparseable. */
  rating?: number;
  ratingCount?: number;
  imageUrl?: string;
  availability?: string;
  description?: string;
}

// ============================================================
// AGGREGATED PRODUCT
// ============================================================

export interface ListingSource {
  source: string;
  url: string;
  price: number;
  availability?: string;
}

/**
 * One real-world product seen on one or more sites.
 * `bestPrice` is always the minimum of `sources[].price`.
 */
export interface AggregatedProduct extends NormalizedProduct {
  sources: ListingSource[];
  bestPrice: number;
}

/**
 * Flat wire shape for an aggregated product.
 */
export interface ProductRecord {
  url: string;
  title: string;
  canonical_title: string;
  source: string;
  price: number;
  original_price: number | null;
  currency: string;
  rating: number | null;
  rating_count: number | null;
  image_url: string | null;
  availability: string | null;
  description: string | null;
  sources: ListingSource[];
  best_price: number;
}

// ============================================================
// DISPATCH RESULTS
// ============================================================

export type SourceResult =
  | { source: string; success: true; listings: RawListing[]; durationMs: number }
  | { source: string; success: false; listings: []; error: string; durationMs: number };

export type BatchResult =
  | { url: string; success: true; listing: RawListing }
  | { url: string; success: false; error: string };

export interface SupportedSite {
  key: string;
  name: string;
  domains: string[];
}
