/**
 * Pricewise — Listing Normalizer
 *
 * Converts raw listings from every source into the unified
 * NormalizedProduct format: numeric currency-tagged prices, 0-5 ratings,
 * and a canonical title for fuzzy matching.
 *
 * Nothing here throws on bad input. A price that cannot be read becomes 0
 * and a rating that cannot be read is left undefined.
 */

import type { NormalizedProduct, RawListing, SourceResult } from '../types';
import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';

const log = logger.child({ component: 'normalizer' });

export const DEFAULT_CURRENCY = 'INR';

// ============================================================
// PRICE
// ============================================================

/** Checked in this order; the first symbol present wins. */
const CURRENCY_SYMBOLS: ReadonlyArray<readonly [string, string]> = [
  ['₹', 'INR'],
  ['$', 'USD'],
  ['€', 'EUR'],
  ['£', 'GBP'],
  ['¥', 'JPY'],
];

const PRICE_NOISE = /[₹$€£¥,\s]/g;
/** "1299.00", "49" or ".99"; a dot right after a letter ("Rs.") is not a decimal point. */
const NUMERIC_TOKEN = /\d+(?:\.\d+)?|(?<![A-Za-z])\.\d+/;

export interface NormalizedPrice {
  price: number;
  currency: string;
}

export function detectCurrency(value: string, fallback: string = DEFAULT_CURRENCY): string {
  for (const [symbol, code] of CURRENCY_SYMBOLS) {
    if (value.includes(symbol)) {
      return code;
    }
  }
  return fallback;
}

/**
 * Parse a price such as "₹1,299.00" or "$49.99".
 */
export function normalizePrice(
  value: string | number | undefined | null,
  fallbackCurrency: string = DEFAULT_CURRENCY
): NormalizedPrice {
  if (value === undefined || value === null || value === '') {
    return { price: 0, currency: fallbackCurrency };
  }

  if (typeof value === 'number') {
    return {
      price: Number.isFinite(value) && value >= 0 ? value : 0,
      currency: fallbackCurrency,
    };
  }

  const currency = detectCurrency(value, fallbackCurrency);
  const match = value.replace(PRICE_NOISE, '').match(NUMERIC_TOKEN);
  if (!match) {
    return { price: 0, currency };
  }

  const price = Number(match[0]);
  return { price: Number.isFinite(price) ? price : 0, currency };
}

// ============================================================
// RATING
// ============================================================

const PERCENT_RATING = /(\d+(?:\.\d+)?)\s*%/;
const OUT_OF_RATING = /(\d+(?:\.\d+)?)\s*(?:out of|\/)\s*(\d+(?:\.\d+)?)/i;

function clampRating(value: number): number {
  return Math.min(5, Math.max(0, value));
}

/**
 * Bare numbers: (5, 10] is a 10-point scale, anything above 10 is out of
 * range and pinned to 5.
 */
function rescaleBareRating(value: number): number {
  if (value > 5 && value <= 10) {
    return (value / 10) * 5;
  }
  return clampRating(value);
}

/**
 * Standardize a rating to the 0-5 scale.
 * Accepts "4.2", "4.2 out of 5", "8/10", "84%" or a number.
 * Returns undefined when nothing numeric can be read, so a missing rating
 * never looks like a real zero.
 */
export function normalizeRating(value: string | number | undefined | null): number | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? rescaleBareRating(value) : undefined;
  }

  const percent = value.match(PERCENT_RATING);
  if (percent) {
    return clampRating((Number(percent[1]) / 100) * 5);
  }

  const outOf = value.match(OUT_OF_RATING);
  if (outOf) {
    const scale = Number(outOf[2]);
    if (!(scale > 0)) return undefined;
    return clampRating((Number(outOf[1]) / scale) * 5);
  }

  const bare = value.match(NUMERIC_TOKEN);
  if (bare) {
    return rescaleBareRating(Number(bare[0]));
  }

  return undefined;
}

/**
 * Read a review count such as "1,234 ratings" or "(87)".
 */
export function parseRatingCount(value: string | number | undefined | null): number | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : undefined;
  }

  const match = value.replace(/,/g, '').match(/\d+/);
  return match ? Number.parseInt(match[0], 10) : undefined;
}

// ============================================================
// TITLE CANONICALIZATION
// ============================================================

const STOPWORDS: ReadonlySet<string> = new Set([
  'the', 'a', 'an', 'and', 'or', 'for', 'with', 'in', 'on', 'at',
  'new', 'latest', 'original', 'genuine', 'authentic', 'official',
  'pack', 'set', 'combo', 'bundle', 'piece', 'pcs', 'unit',
]);

/** Brand tokens survive the stopword filter even if one ever overlaps it. */
const BRAND_PATTERN =
  /^(apple|samsung|sony|lg|hp|dell|lenovo|asus|acer|msi|nike|adidas|puma|reebok|boat|jbl|bose|sennheiser)$/;

const NON_WORD = /[^\p{L}\p{N}_\s]/gu;

export function canonicalizeTitle(title: string | undefined | null): string {
  if (!title) return '';

  return title
    .toLowerCase()
    .replace(NON_WORD, ' ')
    .split(/\s+/)
    .filter(token => token.length > 0)
    .filter(token => !STOPWORDS.has(token) || BRAND_PATTERN.test(token))
    .join(' ');
}

// ============================================================
// LISTING NORMALIZATION
// ============================================================

function cleanText(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const cleaned = value.split(/\s+/).filter(Boolean).join(' ');
  return cleaned.length > 0 ? cleaned : undefined;
}

function isCurrencyCode(value: string | undefined): value is string {
  return value !== undefined && /^[A-Za-z]{3}$/.test(value.trim());
}

export interface NormalizeOptions {
  /** Used when neither the price text nor the listing names a currency. */
  defaultCurrency?: string;
  /** Overrides the listing's own source label, e.g. with the adapter key. */
  source?: string;
}

/**
 * Normalize one raw listing. Never throws.
 */
export function normalizeListing(
  raw: RawListing,
  options: NormalizeOptions = {}
): NormalizedProduct {
  const fallbackCurrency = isCurrencyCode(raw.currency)
    ? raw.currency.trim().toUpperCase()
    : options.defaultCurrency ?? DEFAULT_CURRENCY;

  const { price, currency } = normalizePrice(raw.price, fallbackCurrency);
  const original = raw.originalPrice ? normalizePrice(raw.originalPrice, currency).price : 0;
  const title = cleanText(raw.title) ?? '';

  return {
    url: raw.url.trim(),
    title,
    canonicalTitle: canonicalizeTitle(title),
    source: options.source ?? raw.source,
    price,
    currency,
    originalPrice: original > 0 ? original : undefined,
    rating: normalizeRating(raw.rating),
    ratingCount: parseRatingCount(raw.reviews),
    imageUrl: cleanText(raw.imageUrl),
    availability: cleanText(raw.availability),
    description: cleanText(raw.description),
  };
}

/**
 * Normalize a batch of listings, skipping any that fail outright.
 */
export function normalizeListings(
  rawListings: RawListing[],
  options: NormalizeOptions = {}
): NormalizedProduct[] {
  const products: NormalizedProduct[] = [];

  for (const raw of rawListings) {
    try {
      products.push(normalizeListing(raw, options));
    } catch (error) {
      log.error('Normalization failed', {
        source: raw.source,
        url: raw.url,
        error: errorMessage(error),
      });
    }
  }

  return products;
}

/**
 * Flatten successful source results into normalized products,
 * labelling each with the key of the source that returned it.
 */
export function normalizeSourceResults(
  results: SourceResult[],
  options: Omit<NormalizeOptions, 'source'> = {}
): NormalizedProduct[] {
  const products: NormalizedProduct[] = [];

  for (const result of results) {
    if (!result.success) continue;
    products.push(...normalizeListings(result.listings, { ...options, source: result.source }));
  }

  return products;
}
