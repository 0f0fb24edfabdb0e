/**
 * Pricewise — Flipkart Source
 *
 * Flipkart generates its class names, so search parsing keys off
 * data-id cards and links to /p/ product pages instead.
 */

import type { RawListing } from '../types';
import { ProductSource } from './base';
import { absoluteUrl, firstAttr, textFromAny } from './html';

const RUPEE_AMOUNT = /₹\s*[\d,]+(?:\.\d+)?/g;

export class FlipkartSource extends ProductSource {
  readonly key = 'flipkart';
  readonly name = 'Flipkart';
  readonly domains = ['flipkart.com'];

  searchUrl(query: string): string {
    return `https://www.flipkart.com/search?q=${encodeURIComponent(query)}`;
  }

  parseProduct(html: string, url: string): RawListing {
    const $ = this.load(html);
    const structured = this.structuredFields($);

    const outOfStock = $('div._16FRp0').length > 0;

    return {
      source: this.key,
      url,
      title: textFromAny($, ['span.VU-ZEz', 'span.B_NuCI', 'h1']) ?? structured.title ?? '',
      price: textFromAny($, ['div.Nx9bqj', 'div._30jeq3']) ?? structured.price,
      originalPrice: textFromAny($, ['div.yRaY8j', 'div._3I9_wc']),
      currency: structured.currency ?? 'INR',
      rating: textFromAny($, ['div.XQDdHH', 'div._3LWZlK']) ?? structured.rating,
      reviews: textFromAny($, ['span.Wphh3N', 'span._2_R_DZ']) ?? structured.reviews,
      imageUrl: firstAttr($, 'img.DByuf4', 'src') ?? structured.imageUrl,
      availability: outOfStock ? 'Out of Stock' : structured.availability ?? 'In Stock',
      description: structured.description,
    };
  }

  parseSearchResults(html: string, maxResults: number): RawListing[] {
    const $ = this.load(html);
    const listings: RawListing[] = [];

    for (const card of $('div[data-id]').toArray()) {
      if (listings.length >= maxResults) break;

      const $card = $(card);
      const link = $card.find('a[href*="/p/"]').first();
      const url = absoluteUrl(link.attr('href'), 'https://www.flipkart.com');
      const title =
        $card.find('img[alt]').first().attr('alt')?.trim() ||
        link.attr('title')?.trim() ||
        link.text().replace(/\s+/g, ' ').trim();
      if (!url || !title) continue;

      // First rupee amount is the selling price, a second one the struck-out MRP
      const amounts = $card.text().match(RUPEE_AMOUNT) ?? [];

      listings.push({
        source: this.key,
        url,
        title,
        price: amounts[0],
        originalPrice: amounts[1],
        currency: 'INR',
        rating: $card.find('div.XQDdHH, div._3LWZlK').first().text().trim() || undefined,
        imageUrl: $card.find('img').first().attr('src'),
      });
    }

    return listings;
  }
}
