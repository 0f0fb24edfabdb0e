/**
 * Pricewise — Myntra Source
 *
 * Search pages embed their results in `window.__myx`; the product-card
 * markup is the fallback. Product pages prefer JSON-LD.
 */

import { z } from 'zod';
import type { RawListing } from '../types';
import { ProductSource } from './base';
import { absoluteUrl, extractWindowState, firstAttr, firstText, textFromAny } from './html';

const BASE_URL = 'https://www.myntra.com/';

const amount = z.union([z.number(), z.string()]);

const searchStateSchema = z.object({
  searchData: z.object({
    results: z.object({ products: z.array(z.unknown()) }),
  }),
});

const searchItemSchema = z.object({
  landingPageUrl: z.string().min(1),
  brand: z.string().optional(),
  product: z.string().optional(),
  price: amount.optional(),
  mrp: amount.optional(),
  rating: z.number().optional(),
  ratingCount: z.number().optional(),
  searchImage: z.string().optional(),
});

function joinTitle(...parts: Array<string | undefined>): string {
  return parts.filter(Boolean).join(' ').trim();
}

export class MyntraSource extends ProductSource {
  readonly key = 'myntra';
  readonly name = 'Myntra';
  readonly domains = ['myntra.com'];

  /** Search is path based: "running shoes" → /running-shoes */
  searchUrl(query: string): string {
    return `${BASE_URL}${encodeURIComponent(query.trim().toLowerCase().replace(/\s+/g, '-'))}`;
  }

  parseProduct(html: string, url: string): RawListing {
    const $ = this.load(html);
    const structured = this.structuredFields($);

    return {
      source: this.key,
      url,
      title: structured.title ?? joinTitle(firstText($, 'h1.pdp-title'), firstText($, 'h1.pdp-name')),
      price: structured.price ?? textFromAny($, ['span.pdp-price', 'span.pdp-discountedPrice']),
      originalPrice: firstText($, 'span.pdp-mrp'),
      currency: structured.currency ?? 'INR',
      rating: structured.rating ?? firstText($, 'div.index-overallRating'),
      reviews: structured.reviews,
      imageUrl: structured.imageUrl ?? firstAttr($, 'img.image-grid-image', 'src'),
      availability: structured.availability ?? 'In Stock',
      description: structured.description,
    };
  }

  parseSearchResults(html: string, maxResults: number): RawListing[] {
    const $ = this.load(html);
    const fromState = this.parseSearchState(extractWindowState($, '__myx'), maxResults);
    if (fromState.length > 0) {
      return fromState;
    }

    const listings: RawListing[] = [];
    for (const card of $('li.product-base').toArray()) {
      if (listings.length >= maxResults) break;

      const $card = $(card);
      const url = absoluteUrl($card.find('a[href]').first().attr('href'), BASE_URL);
      const title = joinTitle(
        $card.find('h3.product-brand').first().text().trim(),
        $card.find('h4.product-product').first().text().trim()
      );
      if (!url || !title) continue;

      const price =
        $card.find('span.product-discountedPrice').first().text().trim() ||
        $card.find('span.product-price').first().text().trim();

      listings.push({
        source: this.key,
        url,
        title,
        price: price || undefined,
        originalPrice: $card.find('span.product-strike').first().text().trim() || undefined,
        currency: 'INR',
        rating: $card.find('span.product-ratingsContainer').first().text().match(/\d+(?:\.\d+)?/)?.[0],
        imageUrl: $card.find('img').first().attr('src'),
      });
    }

    return listings;
  }

  private parseSearchState(state: unknown, maxResults: number): RawListing[] {
    const parsed = searchStateSchema.safeParse(state);
    if (!parsed.success) {
      return [];
    }

    const listings: RawListing[] = [];
    for (const entry of parsed.data.searchData.results.products) {
      if (listings.length >= maxResults) break;

      const item = searchItemSchema.safeParse(entry);
      if (!item.success) {
        this.logger.debug('Skipping unreadable search item', { issue: item.error.issues[0]?.message });
        continue;
      }

      const { data } = item;
      const title = joinTitle(data.brand, data.product);
      const url = absoluteUrl(data.landingPageUrl, BASE_URL);
      if (!url || !title) continue;

      listings.push({
        source: this.key,
        url,
        title,
        price: data.price === undefined ? undefined : String(data.price),
        originalPrice: data.mrp ? String(data.mrp) : undefined,
        currency: 'INR',
        rating: data.rating ? String(data.rating) : undefined,
        reviews: data.ratingCount ? String(data.ratingCount) : undefined,
        imageUrl: data.searchImage || undefined,
      });
    }

    return listings;
  }
}
