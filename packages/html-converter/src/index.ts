/**
 * @annotext/html-converter
 *
 * Turns positionally annotated text into an HTML fragment and companion CSS
 * for display in a web view.
 */

export { convertToHtml } from './convert.js';
export { collectBackgroundCss } from './background-css.js';
export { findSpanTransitions } from './transitions.js';
export { compareForClosingTags, compareForOpeningTags } from './ordering.js';
export { BACKGROUND_CLASS_PREFIX, backgroundColorClassName, getClosingTag, getOpeningTag } from './markup.js';
export { escapeTextContent } from './escape.js';
export { ConverterInvariantError, type ConverterInvariantErrorCode } from './errors.js';
export type { HtmlAndCss, SpanInfo, SpanTransition } from './types.js';
export type { AnnotatedText, Annotation, AnnotationKind } from '@annotext/contracts';
