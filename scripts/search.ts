/**
 * Pricewise — Search Script
 *
 * Runs one aggregation (dispatch → normalize → dedup) for a query and
 * prints the merged products. Nothing is stored.
 *
 * Usage:
 *   npm run search -- "boat airdopes 141"
 *   npm run search -- "iphone 15" --max 5 --sites amazon,flipkart
 *   npm run search -- "usb c cable" --threshold 0.9
 */

import 'dotenv/config';
import { loadConfig } from '../src/lib/config';
import { logger } from '../src/lib/logger';
import { errorMessage } from '../src/lib/errors';
import { createDispatcher } from '../src/server/services';
import { normalizeSourceResults } from '../src/aggregation/normalizer';
import { deduplicate } from '../src/aggregation/deduplicator';
import { sortProducts } from '../src/catalog/paging';

// ============================================================
// CONFIGURATION
// ============================================================

interface SearchOptions {
  query: string;
  maxPerSource?: number;
  sites: string[];
  threshold?: number;
}

function parseArgs(): SearchOptions {
  const args = process.argv.slice(2);
  const options: SearchOptions = { query: '', sites: [] };
  const words: string[] = [];

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--max' && args[i + 1]) {
      options.maxPerSource = parseInt(args[i + 1], 10);
      i++;
    } else if (args[i] === '--sites' && args[i + 1]) {
      options.sites = args[i + 1].split(',').map(site => site.trim()).filter(Boolean);
      i++;
    } else if (args[i] === '--threshold' && args[i + 1]) {
      options.threshold = parseFloat(args[i + 1]);
      i++;
    } else {
      words.push(args[i]);
    }
  }

  options.query = words.join(' ').trim();
  return options;
}

// ============================================================
// MAIN
// ============================================================

async function runSearch() {
  const options = parseArgs();
  if (!options.query) {
    console.error('Usage: npm run search -- "<query>" [--max N] [--sites a,b] [--threshold 0.85]');
    process.exit(1);
  }

  const config = loadConfig();
  const dispatcher = createDispatcher(config);
  const maxPerSource = options.maxPerSource ?? config.dispatch.maxResultsPerSource;
  const threshold = options.threshold ?? config.fuzzyMatchThreshold;

  console.log('\n' + '='.repeat(60));
  console.log('PRICEWISE SEARCH');
  console.log('='.repeat(60));
  console.log(`Query: ${options.query}`);
  console.log(`Sites: ${options.sites.length > 0 ? options.sites.join(', ') : 'all'}`);
  console.log(`Max per source: ${maxPerSource}`);
  console.log(`Match threshold: ${threshold}`);
  console.log('='.repeat(60) + '\n');

  const startTime = Date.now();

  try {
    const results =
      options.sites.length > 0
        ? await dispatcher.searchSources(options.query, options.sites, maxPerSource)
        : await dispatcher.searchAll(options.query, maxPerSource);

    for (const result of results) {
      const status = result.success ? `${result.listings.length} listings` : `failed: ${result.error}`;
      console.log(`  ${result.source.padEnd(10)} ${status} (${result.durationMs}ms)`);
    }

    const normalized = normalizeSourceResults(results, { defaultCurrency: config.defaultCurrency });
    const dedup = deduplicate(normalized, threshold);
    const products = sortProducts(dedup.products, 'price', 'asc');

    console.log('');
    for (const product of products) {
      const where = product.sources.map(source => source.source).join(', ');
      console.log(`  ${product.currency} ${product.bestPrice.toFixed(2).padStart(10)}  ${product.title}  [${where}]`);
    }

    const duration = ((Date.now() - startTime) / 1000).toFixed(2);
    console.log('\n' + '='.repeat(60));
    console.log('SEARCH COMPLETE');
    console.log('='.repeat(60));
    console.log(`Duration: ${duration}s`);
    console.log(`Listings: ${normalized.length}`);
    console.log(`Products after merge: ${products.length} (${dedup.duplicateCount} duplicates merged)`);
    console.log('='.repeat(60) + '\n');
  } catch (error) {
    logger.error('Search failed', { error: errorMessage(error) });
    console.error('\nSearch failed:', errorMessage(error));
    process.exit(1);
  }
}

void runSearch();
