/**
 * Pricewise — Product Sources
 */

import type { ProductSource, SourceOptions } from './base';
import { AmazonSource } from './amazon';
import { FlipkartSource } from './flipkart';
import { SnapdealSource } from './snapdeal';
import { CromaSource } from './croma';
import { MyntraSource } from './myntra';
import { AjioSource } from './ajio';

export { ProductSource, DEFAULT_SOURCE_OPTIONS } from './base';
export type { SourceOptions } from './base';
export { AmazonSource } from './amazon';
export { FlipkartSource } from './flipkart';
export { SnapdealSource } from './snapdeal';
export { CromaSource } from './croma';
export { MyntraSource } from './myntra';
export { AjioSource } from './ajio';

/**
 * Every built-in source, in registration order. URL scraping picks the
 * first source whose domains match, so order matters only for overlaps.
 */
export function createDefaultSources(options: Partial<SourceOptions> = {}): ProductSource[] {
  return [
    new AmazonSource(options),
    new FlipkartSource(options),
    new SnapdealSource(options),
    new CromaSource(options),
    new MyntraSource(options),
    new AjioSource(options),
  ];
}
