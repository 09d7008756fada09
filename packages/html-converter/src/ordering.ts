/**
 * Total orders for the tags emitted at one boundary.
 *
 * Both orders are fully specified down to the markup strings so that the same
 * input always yields byte-identical HTML, regardless of annotation order.
 * Closing tags mirror opening tags: when ranges nest, tags opened last at a
 * shared offset are closed first.
 */

import type { SpanInfo } from './types.js';

/** Code-unit comparison, independent of locale. */
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order for spans opening at the same offset: the span that ends last opens
 * first, then opening tag ascending, then closing tag ascending.
 */
export function compareForOpeningTags(a: SpanInfo, b: SpanInfo): number {
  return b.end - a.end || compareStrings(a.openingTag, b.openingTag) || compareStrings(a.closingTag, b.closingTag);
}

/**
 * Order for spans closing at the same offset: the span that started last
 * closes first, then opening tag descending, then closing tag descending.
 */
export function compareForClosingTags(a: SpanInfo, b: SpanInfo): number {
  return b.start - a.start || compareStrings(b.openingTag, a.openingTag) || compareStrings(b.closingTag, a.closingTag);
}
