import type { AnnotatedText } from '@annotext/contracts';
import { convertLog } from '@annotext/common/debug-log';
import { collectBackgroundCss } from './background-css.js';
import { escapeTextContent } from './escape.js';
import { findSpanTransitions } from './transitions.js';
import type { HtmlAndCss } from './types.js';

/**
 * Converts annotated text into an HTML fragment plus the CSS rules it needs.
 *
 * All text content is HTML-escaped and line breaks become `<br>`.
 *
 * Overlapping (crossing) annotation ranges are not repaired: they produce
 * overlapping tags, which lenient renderers such as browser web views display
 * the same way the annotations would render natively.
 *
 * @param text - Plain text (escaped only), annotated text, or nothing.
 * @param densityScale - Device pixels per CSS px. Must be positive.
 *
 * @example
 * ```typescript
 * const { html } = convertToHtml(
 *   { text: 'Hello world', annotations: [{ kind: { type: 'style', style: 'bold' }, start: 0, end: 5 }] },
 *   2,
 * );
 * // html === '<b>Hello</b> world'
 * ```
 */
export function convertToHtml(text: string | AnnotatedText | null | undefined, densityScale: number): HtmlAndCss {
  if (text == null) {
    return { html: '', css: {} };
  }
  if (typeof text === 'string') {
    return { html: escapeTextContent(text), css: {} };
  }

  const css = collectBackgroundCss(text.annotations);
  const transitions = findSpanTransitions(text.annotations, densityScale);
  convertLog(`[convertToHtml] ${transitions.length} transitions for ${text.annotations.length} annotations`);

  let html = '';
  let previousOffset = 0;
  for (const transition of transitions) {
    html += escapeTextContent(text.text.slice(previousOffset, transition.offset));
    for (const span of transition.removed) {
      html += span.closingTag;
    }
    for (const span of transition.added) {
      html += span.openingTag;
    }
    previousOffset = transition.offset;
  }
  html += escapeTextContent(text.text.slice(previousOffset));

  return { html, css };
}
