/**
 * Pricewise — Amazon Source
 *
 * Product pages use stable element ids (#productTitle, #landingImage).
 * Search cards are marked with data-component-type="s-search-result".
 */

import type { RawListing } from '../types';
import { ProductSource } from './base';
import { absoluteUrl, firstAttr, firstText, textFromAny } from './html';

const CURRENCY_BY_HOST: ReadonlyArray<readonly [string, string]> = [
  ['amazon.in', 'INR'],
  ['amazon.co.uk', 'GBP'],
  ['amazon.de', 'EUR'],
  ['amazon.com', 'USD'],
];

export class AmazonSource extends ProductSource {
  readonly key = 'amazon';
  readonly name = 'Amazon';
  readonly domains = ['amazon.in', 'amazon.com', 'amazon.co.uk', 'amazon.de'];

  searchUrl(query: string): string {
    return `https://www.amazon.in/s?k=${encodeURIComponent(query)}`;
  }

  parseProduct(html: string, url: string): RawListing {
    const $ = this.load(html);
    const structured = this.structuredFields($);

    const bullets = $('#feature-bullets li')
      .toArray()
      .map(item => $(item).text().replace(/\s+/g, ' ').trim())
      .filter(Boolean)
      .slice(0, 5);

    return {
      source: this.key,
      url,
      title: firstText($, '#productTitle') ?? structured.title ?? '',
      price:
        textFromAny($, ['.a-price .a-offscreen', '.a-price-whole', '#priceblock_ourprice']) ??
        structured.price,
      originalPrice: firstText($, '.a-price[data-a-strike="true"] .a-offscreen'),
      currency: currencyForUrl(url),
      rating: firstText($, '#acrPopover .a-icon-alt') ?? firstText($, '.a-icon-alt') ?? structured.rating,
      reviews: firstText($, '#acrCustomerReviewText') ?? structured.reviews,
      imageUrl: firstAttr($, '#landingImage', 'src') ?? structured.imageUrl,
      availability: firstText($, '#availability') ?? structured.availability,
      description: bullets.length > 0 ? bullets.join(' | ') : structured.description,
    };
  }

  parseSearchResults(html: string, maxResults: number): RawListing[] {
    const $ = this.load(html);
    const listings: RawListing[] = [];

    for (const card of $('div[data-component-type="s-search-result"]').toArray()) {
      if (listings.length >= maxResults) break;

      const $card = $(card);
      const title = $card.find('h2').first().text().replace(/\s+/g, ' ').trim();
      const url = absoluteUrl($card.find('h2 a, a.a-link-normal').first().attr('href'), 'https://www.amazon.in');
      if (!title || !url) continue;

      listings.push({
        source: this.key,
        url,
        title,
        price: $card.find('.a-price-whole').first().text().trim() || undefined,
        originalPrice:
          $card.find('.a-price[data-a-strike="true"] .a-offscreen').first().text().trim() || undefined,
        currency: 'INR',
        rating: $card.find('.a-icon-alt').first().text().trim() || undefined,
        reviews: $card.find('span.a-size-base.s-underline-text').first().text().trim() || undefined,
        imageUrl: $card.find('img.s-image').first().attr('src'),
      });
    }

    return listings;
  }
}

function currencyForUrl(url: string): string | undefined {
  let host: string;
  try {
    host = new URL(url).hostname;
  } catch {
    return undefined;
  }
  return CURRENCY_BY_HOST.find(([domain]) => host === domain || host.endsWith(`.${domain}`))?.[1];
}
