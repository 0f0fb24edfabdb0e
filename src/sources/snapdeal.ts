/**
 * Pricewise — Snapdeal Source
 */

import type { RawListing } from '../types';
import { ProductSource } from './base';
import { absoluteUrl, firstAttr, firstText } from './html';

/** Star widths are percentages, e.g. "width:84%". */
const STAR_WIDTH = /width:\s*(\d+(?:\.\d+)?)%/;

export class SnapdealSource extends ProductSource {
  readonly key = 'snapdeal';
  readonly name = 'Snapdeal';
  readonly domains = ['snapdeal.com'];

  searchUrl(query: string): string {
    return `https://www.snapdeal.com/search?keyword=${encodeURIComponent(query)}`;
  }

  parseProduct(html: string, url: string): RawListing {
    const $ = this.load(html);
    const structured = this.structuredFields($);

    return {
      source: this.key,
      url,
      title: firstText($, 'h1.pdp-e-i-head') ?? structured.title ?? '',
      price: firstText($, 'span.payBlkBig') ?? structured.price,
      originalPrice: firstText($, 'span.pdpCutPrice'),
      currency: structured.currency ?? 'INR',
      rating: firstText($, 'span.avrg-rating') ?? structured.rating,
      reviews: firstText($, 'span.total-rating') ?? structured.reviews,
      imageUrl: firstAttr($, 'img#bx-slider-left-image-main', 'src') ?? structured.imageUrl,
      availability: $('div.sold-out-err').length > 0 ? 'Out of Stock' : 'In Stock',
      description: structured.description,
    };
  }

  parseSearchResults(html: string, maxResults: number): RawListing[] {
    const $ = this.load(html);
    const listings: RawListing[] = [];

    for (const card of $('div.product-tuple-listing').toArray()) {
      if (listings.length >= maxResults) break;

      const $card = $(card);
      const url = absoluteUrl(
        $card.find('a.dp-widget-link').first().attr('href') ?? $card.find('a[href]').first().attr('href'),
        'https://www.snapdeal.com'
      );
      const title =
        $card.find('p.product-title').first().text().trim() ||
        $card.find('img[alt]').first().attr('alt')?.trim();
      if (!url || !title) continue;

      const starWidth = $card.find('div.filled-stars').first().attr('style')?.match(STAR_WIDTH);

      listings.push({
        source: this.key,
        url,
        title,
        price: $card.find('span.product-price').first().text().trim() || undefined,
        originalPrice: $card.find('span.product-desc-price').first().text().trim() || undefined,
        currency: 'INR',
        rating: starWidth ? `${starWidth[1]}%` : undefined,
        reviews: $card.find('p.product-rating-count').first().text().trim() || undefined,
        imageUrl:
          $card.find('img').first().attr('src') ?? $card.find('img').first().attr('data-src'),
      });
    }

    return listings;
  }
}
