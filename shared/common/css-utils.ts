/**
 * CSS formatting helpers shared by the converter and its hosts.
 */

/**
 * A 32-bit ARGB color packed into one integer (`0xAARRGGBB`).
 *
 * Signed and unsigned spellings of the same bits (`-65536` and `0xffff0000`)
 * denote the same color; use {@link normalizePackedColor} before comparing or
 * printing one.
 */
export type PackedColor = number;

/** Returns the signed 32-bit value of a packed color, e.g. `0xffffff00` → `-256`. */
export function normalizePackedColor(color: PackedColor): number {
  return color | 0;
}

/**
 * Formats a packed ARGB color as a CSS `rgba()` value.
 *
 * The alpha channel is written as a fraction of 255 with three decimals.
 *
 * @example
 * ```typescript
 * toCssRgba(0xff00ff00); // 'rgba(0,255,0,1.000)'
 * toCssRgba(0x80000000); // 'rgba(0,0,0,0.502)'
 * ```
 */
export function toCssRgba(color: PackedColor): string {
  const argb = normalizePackedColor(color);
  const alpha = (argb >>> 24) & 0xff;
  const red = (argb >>> 16) & 0xff;
  const green = (argb >>> 8) & 0xff;
  const blue = argb & 0xff;
  return `rgba(${red},${green},${blue},${(alpha / 255).toFixed(3)})`;
}

/**
 * Builds a selector matching every element carrying `className` and all of their descendants.
 */
export function cssAllClassDescendantsSelector(className: string): string {
  return `.${className},.${className} *`;
}

/**
 * Renders selector → declaration pairs as style-sheet text, one rule per line.
 *
 * Declarations are expected to be `property:value;` fragments and are copied as-is.
 */
export function renderCssRuleSets(ruleSets: Readonly<Record<string, string>>): string {
  return Object.entries(ruleSets)
    .map(([selector, declaration]) => `${selector}{${declaration}}`)
    .join('\n');
}
