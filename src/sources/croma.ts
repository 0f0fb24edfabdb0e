/**
 * Pricewise — Croma Source
 *
 * Croma product pages carry a JSON-LD Product block, which is preferred
 * over the rendered markup.
 */

import type { RawListing } from '../types';
import { ProductSource } from './base';
import { absoluteUrl, firstAttr, textFromAny } from './html';

export class CromaSource extends ProductSource {
  readonly key = 'croma';
  readonly name = 'Croma';
  readonly domains = ['croma.com'];

  searchUrl(query: string): string {
    return `https://www.croma.com/searchB?q=${encodeURIComponent(query)}%3Arelevance`;
  }

  parseProduct(html: string, url: string): RawListing {
    const $ = this.load(html);
    const structured = this.structuredFields($);

    return {
      source: this.key,
      url,
      title: structured.title ?? textFromAny($, ['h1.pd-title', 'h1']) ?? '',
      price: structured.price ?? textFromAny($, ['span.pdp-price', 'span.amount']),
      originalPrice: textFromAny($, ['span.old-price']),
      currency: structured.currency ?? 'INR',
      rating: structured.rating ?? textFromAny($, ['span.rating-value']),
      reviews: structured.reviews,
      imageUrl: structured.imageUrl ?? firstAttr($, 'img.product-image', 'src'),
      availability:
        structured.availability ??
        (/out of stock/i.test($('body').text()) ? 'Out of Stock' : 'In Stock'),
      description: structured.description,
    };
  }

  parseSearchResults(html: string, maxResults: number): RawListing[] {
    const $ = this.load(html);
    const listings: RawListing[] = [];

    for (const card of $('li.product-item').toArray()) {
      if (listings.length >= maxResults) break;

      const $card = $(card);
      const url = absoluteUrl($card.find('a[href]').first().attr('href'), 'https://www.croma.com');
      const title =
        $card.find('h3').first().text().replace(/\s+/g, ' ').trim() ||
        $card.find('img[alt]').first().attr('alt')?.trim();
      if (!url || !title) continue;

      listings.push({
        source: this.key,
        url,
        title,
        price: $card.find('span.amount').first().text().trim() || undefined,
        originalPrice: $card.find('span.old-price').first().text().trim() || undefined,
        currency: 'INR',
        rating: $card.find('span.rating').first().text().trim() || undefined,
        imageUrl: $card.find('img').first().attr('src'),
      });
    }

    return listings;
  }
}
