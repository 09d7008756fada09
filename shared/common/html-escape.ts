/**
 * HTML escaping for text that is placed between tags of a generated fragment.
 *
 * The output is plain ASCII: markup-significant characters become named
 * entities, and everything outside the printable ASCII range becomes a decimal
 * numeric character reference. Line breaks therefore survive as `&#10;`
 * (and `&#13;&#10;` for CRLF), which callers can match and rewrite.
 *
 * Runs of spaces are preserved by emitting `&nbsp;` for every space that is
 * followed by another space, so a renderer that collapses whitespace still
 * shows the original width.
 */

const REPLACEMENT_CHARACTER = 0xfffd;

/**
 * Escapes `text` for use as HTML text content.
 *
 * @example
 * ```typescript
 * escapeHtml('a < b\n'); // 'a &lt; b&#10;'
 * escapeHtml('x  y'); // 'x&nbsp; y'
 * ```
 */
export function escapeHtml(text: string): string {
  let out = '';
  const end = text.length;

  for (let i = 0; i < end; i++) {
    const c = text.charCodeAt(i);

    if (c === 0x3c) {
      out += '&lt;';
    } else if (c === 0x3e) {
      out += '&gt;';
    } else if (c === 0x26) {
      out += '&amp;';
    } else if (c >= 0xd800 && c <= 0xdfff) {
      const next = i + 1 < end ? text.charCodeAt(i + 1) : -1;
      if (c < 0xdc00 && next >= 0xdc00 && next <= 0xdfff) {
        i++;
        const codePoint = 0x10000 + ((c - 0xd800) << 10) + (next - 0xdc00);
        out += `&#${codePoint};`;
      } else {
        out += `&#${REPLACEMENT_CHARACTER};`;
      }
    } else if (c > 0x7e || c < 0x20) {
      out += `&#${c};`;
    } else if (c === 0x20) {
      while (i + 1 < end && text.charCodeAt(i + 1) === 0x20) {
        out += '&nbsp;';
        i++;
      }
      out += ' ';
    } else {
      out += text[i];
    }
  }

  return out;
}
