/**
 * Pricewise — HTML Extraction Helpers
 *
 * Shared cheerio helpers. Structured data (JSON-LD, OpenGraph) is tried
 * before site selectors because it changes less often than markup.
 */

import * as cheerio from 'cheerio';

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload);
}

export function firstText($: cheerio.CheerioAPI, selector: string): string | undefined {
  const value = $(selector).first().text().replace(/\s+/g, ' ').trim();
  return value || undefined;
}

export function firstAttr(
  $: cheerio.CheerioAPI,
  selector: string,
  attr: string
): string | undefined {
  const value = $(selector).first().attr(attr)?.trim();
  return value || undefined;
}

/**
 * First non-empty text among several candidate selectors.
 */
export function textFromAny(
  $: cheerio.CheerioAPI,
  selectors: readonly string[]
): string | undefined {
  for (const selector of selectors) {
    const value = firstText($, selector);
    if (value) return value;
  }
  return undefined;
}

export function metaContent($: cheerio.CheerioAPI, property: string): string | undefined {
  return (
    firstAttr($, `meta[property="${property}"]`, 'content') ??
    firstAttr($, `meta[name="${property}"]`, 'content')
  );
}

/**
 * Resolve a possibly relative href against the page it came from.
 */
export function absoluteUrl(href: string | undefined, base: string): string | undefined {
  if (!href) return undefined;
  try {
    return new URL(href, base).toString();
  } catch {
    return undefined;
  }
}

// ============================================================
// JSON-LD
// ============================================================

/**
 * The subset of a schema.org Product we read.
 */
export interface JsonLdProduct {
  name?: string;
  description?: string;
  image?: string;
  price?: string;
  currency?: string;
  availability?: string;
  rating?: string;
  ratingCount?: string;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

function first(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

function hasProductType(node: JsonRecord): boolean {
  const type = node['@type'];
  return type === 'Product' || (Array.isArray(type) && type.includes('Product'));
}

function findProductNode(data: unknown): JsonRecord | undefined {
  if (Array.isArray(data)) {
    for (const item of data) {
      const found = findProductNode(item);
      if (found) return found;
    }
    return undefined;
  }
  if (!isRecord(data)) return undefined;
  if (hasProductType(data)) return data;
  if ('@graph' in data) return findProductNode(data['@graph']);
  return undefined;
}

function toJsonLdProduct(node: JsonRecord): JsonLdProduct {
  const offer = first(node.offers);
  const offerRecord = isRecord(offer) ? offer : {};
  const rating = isRecord(node.aggregateRating) ? node.aggregateRating : {};
  const image = first(node.image);

  // Schema.org availability is a URL such as https://schema.org/InStock
  const availability = asText(offerRecord.availability)?.split('/').pop();

  return {
    name: asText(node.name),
    description: asText(node.description),
    image: isRecord(image) ? asText(image.url) : asText(image),
    price: asText(offerRecord.price) ?? asText(offerRecord.lowPrice),
    currency: asText(offerRecord.priceCurrency),
    availability,
    rating: asText(rating.ratingValue),
    ratingCount: asText(rating.reviewCount) ?? asText(rating.ratingCount),
  };
}

/**
 * First schema.org Product found in any ld+json script, including inside
 * arrays and @graph wrappers. Malformed blocks are skipped.
 */
export function extractJsonLdProduct($: cheerio.CheerioAPI): JsonLdProduct | undefined {
  const scripts = $('script[type="application/ld+json"]').toArray();

  for (const script of scripts) {
    const content = $(script).text();
    if (!content.trim()) continue;

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      continue;
    }

    const node = findProductNode(data);
    if (node) return toJsonLdProduct(node);
  }

  return undefined;
}

// ============================================================
// EMBEDDED STATE
// ============================================================

/**
 * The object literal a page assigns to `window.<name>` in an inline
 * script, e.g. `window.__PRELOADED_STATE__ = {...};`. Undefined when no
 * script assigns it or the assignment is not valid JSON.
 */
export function extractWindowState($: cheerio.CheerioAPI, name: string): unknown {
  const marker = `window.${name}`;

  for (const script of $('script:not([src])').toArray()) {
    const content = $(script).text();
    const at = content.indexOf(marker);
    if (at === -1) continue;

    const start = content.indexOf('{', content.indexOf('=', at + marker.length));
    const end = content.lastIndexOf('}');
    if (start === -1 || end < start) continue;

    try {
      return JSON.parse(content.slice(start, end + 1));
    } catch {
      continue;
    }
  }

  return undefined;
}
