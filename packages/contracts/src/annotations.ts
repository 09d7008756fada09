import type { PackedColor } from '@annotext/common/css-utils';

export type { PackedColor };

// ---------------------------------------------------------------------------
// Literal sets
// ---------------------------------------------------------------------------

export const ANNOTATION_TYPES = [
  'strikethrough',
  'foregroundColor',
  'backgroundColor',
  'textCombineUpright',
  'absoluteSize',
  'relativeSize',
  'fontFamily',
  'style',
  'ruby',
  'underline',
  'textEmphasis',
] as const;
export type AnnotationType = (typeof ANNOTATION_TYPES)[number];

/** Font style values. `normal` is accepted but renders no markup. */
export const STYLE_VARIANTS = ['normal', 'bold', 'italic', 'boldItalic'] as const;
export type StyleVariant = (typeof STYLE_VARIANTS)[number];

export const RUBY_POSITIONS = ['over', 'under', 'unknown'] as const;
export type RubyPosition = (typeof RUBY_POSITIONS)[number];

export const TEXT_EMPHASIS_MARKS = [
  'filledCircle',
  'filledDot',
  'filledSesame',
  'openCircle',
  'openDot',
  'openSesame',
  'auto',
  'unknown',
] as const;
export type TextEmphasisMark = (typeof TEXT_EMPHASIS_MARKS)[number];

export const TEXT_EMPHASIS_POSITIONS = ['before', 'after', 'outside', 'unknown'] as const;
export type TextEmphasisPosition = (typeof TEXT_EMPHASIS_POSITIONS)[number];

// ---------------------------------------------------------------------------
// Annotation kinds
// ---------------------------------------------------------------------------

export type StrikethroughKind = { type: 'strikethrough' };

export type ForegroundColorKind = { type: 'foregroundColor'; color: PackedColor };

export type BackgroundColorKind = { type: 'backgroundColor'; color: PackedColor };

/** Horizontal text set upright inside vertical text (tate-chu-yoko). */
export type TextCombineUprightKind = { type: 'textCombineUpright' };

export type AbsoluteSizeKind = {
  type: 'absoluteSize';
  size: number;
  /** When false, `size` is in device pixels and is divided by the density scale. */
  densityIndependent: boolean;
};

export type RelativeSizeKind = {
  type: 'relativeSize';
  /** Multiplier of the surrounding font size; `1.5` renders as `150.00%`. */
  scale: number;
};

export type FontFamilyKind = { type: 'fontFamily'; family?: string | null };

export type StyleKind = { type: 'style'; style: StyleVariant };

export type RubyKind = { type: 'ruby'; position: RubyPosition; rubyText: string };

export type UnderlineKind = { type: 'underline' };

export type TextEmphasisKind = {
  type: 'textEmphasis';
  mark: TextEmphasisMark;
  position: TextEmphasisPosition;
};

export type AnnotationKind =
  | StrikethroughKind
  | ForegroundColorKind
  | BackgroundColorKind
  | TextCombineUprightKind
  | AbsoluteSizeKind
  | RelativeSizeKind
  | FontFamilyKind
  | StyleKind
  | RubyKind
  | UnderlineKind
  | TextEmphasisKind;

// ---------------------------------------------------------------------------
// Annotated text
// ---------------------------------------------------------------------------

/**
 * A style applied to the half-open range `[start, end)` of a text.
 *
 * Offsets are UTF-16 code-unit indices. Ranges of different annotations may
 * touch, nest or cross.
 */
export interface Annotation {
  kind: AnnotationKind;
  start: number;
  end: number;
}

export interface AnnotatedText {
  text: string;
  annotations: readonly Annotation[];
}

export function isAnnotationType(value: unknown): value is AnnotationType {
  return typeof value === 'string' && (ANNOTATION_TYPES as readonly string[]).includes(value);
}
