/**
 * Pricewise — Ajio Source
 */

import { z } from 'zod';
import type { RawListing } from '../types';
import { ProductSource } from './base';
import { absoluteUrl, extractWindowState, firstAttr, firstText } from './html';

const BASE_URL = 'https://www.ajio.com';

const priceData = z.object({ value: z.union([z.number(), z.string()]) });

const gridStateSchema = z.object({
  grid: z.object({ entities: z.array(z.unknown()) }),
});

const gridItemSchema = z.object({
  url: z.string().min(1),
  brandName: z.string().optional(),
  name: z.string().optional(),
  price: priceData.optional(),
  wasPriceData: priceData.nullish(),
  rating: z.union([z.number(), z.string()]).nullish(),
  images: z.array(z.object({ url: z.string() })).optional(),
});

function joinTitle(...parts: Array<string | undefined>): string {
  return parts.filter(Boolean).join(' ').trim();
}

export class AjioSource extends ProductSource {
  readonly key = 'ajio';
  readonly name = 'Ajio';
  readonly domains = ['ajio.com'];

  searchUrl(query: string): string {
    return `${BASE_URL}/search/?text=${encodeURIComponent(query)}`;
  }

  parseProduct(html: string, url: string): RawListing {
    const $ = this.load(html);
    const structured = this.structuredFields($);

    return {
      source: this.key,
      url,
      title: structured.title ?? joinTitle(firstText($, 'h2.brand-name'), firstText($, 'h1.prod-name')),
      price: structured.price ?? firstText($, 'div.prod-sp'),
      originalPrice: firstText($, 'span.prod-cp'),
      currency: structured.currency ?? 'INR',
      rating: structured.rating ?? firstText($, 'span.rating')?.match(/\d+(?:\.\d+)?/)?.[0],
      reviews: structured.reviews,
      imageUrl:
        structured.imageUrl ??
        firstAttr($, 'img.rilrtl-lazy-img', 'src') ??
        firstAttr($, 'img.rilrtl-lazy-img', 'data-src'),
      availability: structured.availability ?? 'In Stock',
      description: structured.description,
    };
  }

  parseSearchResults(html: string, maxResults: number): RawListing[] {
    const $ = this.load(html);
    const fromState = this.parseGridState(extractWindowState($, '__PRELOADED_STATE__'), maxResults);
    if (fromState.length > 0) {
      return fromState;
    }

    const listings: RawListing[] = [];
    for (const card of $('div.item').toArray()) {
      if (listings.length >= maxResults) break;

      const $card = $(card);
      const url = absoluteUrl($card.find('a[href]').first().attr('href'), BASE_URL);
      const title =
        joinTitle($card.find('div.brand').first().text().trim(), $card.find('div.name').first().text().trim()) ||
        $card.find('img[alt]').first().attr('alt')?.trim();
      if (!url || !title) continue;

      const $image = $card.find('img').first();
      listings.push({
        source: this.key,
        url,
        title,
        price: $card.find('span.price').first().text().trim() || undefined,
        originalPrice: $card.find('span.orginal-price').first().text().trim() || undefined,
        currency: 'INR',
        imageUrl: $image.attr('src') ?? $image.attr('data-src'),
      });
    }

    return listings;
  }

  private parseGridState(state: unknown, maxResults: number): RawListing[] {
    const parsed = gridStateSchema.safeParse(state);
    if (!parsed.success) {
      return [];
    }

    const listings: RawListing[] = [];
    for (const entry of parsed.data.grid.entities) {
      if (listings.length >= maxResults) break;

      const item = gridItemSchema.safeParse(entry);
      if (!item.success) {
        this.logger.debug('Skipping unreadable grid item', { issue: item.error.issues[0]?.message });
        continue;
      }

      const { data } = item;
      const title = joinTitle(data.brandName, data.name);
      const url = absoluteUrl(data.url, BASE_URL);
      if (!url || !title) continue;

      listings.push({
        source: this.key,
        url,
        title,
        price: data.price ? String(data.price.value) : undefined,
        originalPrice: data.wasPriceData ? String(data.wasPriceData.value) : undefined,
        currency: 'INR',
        rating: data.rating ? String(data.rating) : undefined,
        imageUrl: data.images?.[0]?.url,
      });
    }

    return listings;
  }
}
