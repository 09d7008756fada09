import { escapeHtml } from '@annotext/common/html-escape';

// `&#13;&#10;` (CRLF) or a lone `&#10;` as produced by escapeHtml.
const ESCAPED_NEWLINE_PATTERN = /(&#13;)?&#10;/g;

/**
 * Escapes a slice of source text and turns each line break into `<br>`.
 *
 * Must be applied exactly once per slice; the output is not safe to escape again.
 */
export function escapeTextContent(text: string): string {
  return escapeHtml(text).replace(ESCAPED_NEWLINE_PATTERN, '<br>');
}
