/** Resolved markup for one annotation, plus the range it covers. */
export interface SpanInfo {
  readonly start: number;
  readonly end: number;
  readonly openingTag: string;
  readonly closingTag: string;
}

/**
 * Spans starting (`added`) and ending (`removed`) at one text offset.
 *
 * Each list is sorted in emission order: `removed` by closing order, `added`
 * by opening order.
 */
export interface SpanTransition {
  readonly offset: number;
  readonly added: readonly SpanInfo[];
  readonly removed: readonly SpanInfo[];
}

/** Output of a conversion: an HTML fragment and the style rules it relies on. */
export interface HtmlAndCss {
  readonly html: string;
  /**
   * Selector → declaration, e.g. `'.bg_42,.bg_42 *'` → `'background-color:rgba(0,0,42,0.000);'`.
   * Declarations are `property:value;` fragments.
   */
  readonly css: Readonly<Record<string, string>>;
}
