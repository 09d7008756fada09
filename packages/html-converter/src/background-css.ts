import { cssAllClassDescendantsSelector, normalizePackedColor, toCssRgba } from '@annotext/common/css-utils';
import type { Annotation } from '@annotext/contracts';
import { backgroundColorClassName } from './markup.js';

/**
 * Builds one rule per distinct background color.
 *
 * The color is carried by a class on the wrapping element rather than inline,
 * and the rule targets the element and all of its descendants so that nested
 * elements are tinted too.
 */
export function collectBackgroundCss(annotations: readonly Annotation[]): Record<string, string> {
  const colors = new Set<number>();
  for (const { kind } of annotations) {
    if (kind.type === 'backgroundColor') {
      colors.add(normalizePackedColor(kind.color));
    }
  }

  const ruleSets: Record<string, string> = {};
  for (const color of colors) {
    ruleSets[cssAllClassDescendantsSelector(backgroundColorClassName(color))] = `background-color:${toCssRgba(color)};`;
  }
  return ruleSets;
}
