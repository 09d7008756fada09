import { normalizePackedColor, toCssRgba } from '@annotext/common/css-utils';
import type {
  AbsoluteSizeKind,
  AnnotationKind,
  RubyKind,
  StyleKind,
  TextEmphasisMark,
  TextEmphasisPosition,
} from '@annotext/contracts';
import { escapeTextContent } from './escape.js';

const SPAN_CLOSE = '</span>';

/** Class prefix of elements carrying a background color; see {@link backgroundColorClassName}. */
export const BACKGROUND_CLASS_PREFIX = 'bg_';

export function backgroundColorClassName(color: number): string {
  return `${BACKGROUND_CLASS_PREFIX}${normalizePackedColor(color)}`;
}

const TEXT_EMPHASIS_STYLES: Record<TextEmphasisMark, string> = {
  filledCircle: 'filled circle',
  filledDot: 'filled dot',
  filledSesame: 'filled sesame',
  openCircle: 'open circle',
  openDot: 'open dot',
  openSesame: 'open sesame',
  // TODO: `auto` should become filled sesame in vertical writing modes and filled circle otherwise.
  auto: 'unset',
  unknown: 'unset',
};

// Positions that are not recognized are treated as `before`.
const TEXT_EMPHASIS_POSITIONS: Record<TextEmphasisPosition, string> = {
  before: 'over right',
  after: 'under left',
  outside: 'over right',
  unknown: 'over right',
};

// Bold opens first, so it closes last.
const STYLE_TAGS: Partial<Record<StyleKind['style'], readonly [string, string]>> = {
  bold: ['<b>', '</b>'],
  italic: ['<i>', '</i>'],
  boldItalic: ['<b><i>', '</i></b>'],
};

const RUBY_POSITIONS: Record<RubyKind['position'], string> = {
  over: 'over',
  under: 'under',
  unknown: 'unset',
};

/**
 * Returns the markup that opens an annotation, or `undefined` when the kind
 * renders nothing (unknown kinds, `normal` style, a font family without a name).
 *
 * @param densityScale - Device pixels per CSS px, used for non density-independent sizes.
 */
export function getOpeningTag(kind: AnnotationKind, densityScale: number): string | undefined {
  switch (kind.type) {
    case 'strikethrough':
      return "<span style='text-decoration:line-through;'>";
    case 'foregroundColor':
      return `<span style='color:${toCssRgba(kind.color)};'>`;
    case 'backgroundColor':
      return `<span class='${backgroundColorClassName(kind.color)}'>`;
    case 'textCombineUpright':
      return "<span style='text-combine-upright:all;'>";
    case 'absoluteSize':
      return `<span style='font-size:${toCssPx(kind, densityScale).toFixed(2)}px;'>`;
    case 'relativeSize':
      return `<span style='font-size:${(kind.scale * 100).toFixed(2)}%;'>`;
    case 'fontFamily':
      return kind.family != null ? `<span style='font-family:"${kind.family}";'>` : undefined;
    case 'style':
      return lookup(STYLE_TAGS, kind.style)?.[0];
    case 'ruby': {
      const position = lookup(RUBY_POSITIONS, kind.position);
      return position !== undefined ? `<ruby style='ruby-position:${position};'>` : undefined;
    }
    case 'underline':
      return '<u>';
    case 'textEmphasis': {
      const style = lookup(TEXT_EMPHASIS_STYLES, kind.mark) ?? 'unset';
      const position = lookup(TEXT_EMPHASIS_POSITIONS, kind.position) ?? 'over right';
      return (
        `<span style='-webkit-text-emphasis-style: ${style}; text-emphasis-style: ${style}; ` +
        `-webkit-text-emphasis-position: ${position}; text-emphasis-position: ${position};'>`
      );
    }
    default:
      return undefined;
  }
}

/**
 * Returns the markup that closes an annotation. Ruby is the one kind whose
 * closing markup carries text: the escaped annotation text in an `<rt>` element.
 */
export function getClosingTag(kind: AnnotationKind): string | undefined {
  switch (kind.type) {
    case 'strikethrough':
    case 'foregroundColor':
    case 'backgroundColor':
    case 'textCombineUpright':
    case 'absoluteSize':
    case 'relativeSize':
    case 'textEmphasis':
      return SPAN_CLOSE;
    case 'fontFamily':
      return kind.family != null ? SPAN_CLOSE : undefined;
    case 'style':
      return lookup(STYLE_TAGS, kind.style)?.[1];
    case 'ruby':
      return `<rt>${escapeTextContent(kind.rubyText)}</rt></ruby>`;
    case 'underline':
      return '</u>';
    default:
      return undefined;
  }
}

function toCssPx(kind: AbsoluteSizeKind, densityScale: number): number {
  return kind.densityIndependent ? kind.size : kind.size / densityScale;
}

/** Table lookup that tolerates values outside the declared union. */
function lookup<K extends string, V>(table: Partial<Record<K, V>>, key: K): V | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}
