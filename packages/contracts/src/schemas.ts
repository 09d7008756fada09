import { z } from 'zod';
import { convertLog } from '@annotext/common/debug-log';
import {
  RUBY_POSITIONS,
  STYLE_VARIANTS,
  TEXT_EMPHASIS_MARKS,
  TEXT_EMPHASIS_POSITIONS,
  isAnnotationType,
  type AnnotatedText,
  type Annotation,
  type AnnotationKind,
} from './annotations.js';
import { AnnotationValidationError, type AnnotationValidationErrorCode } from './errors.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const offsetSchema = z.number().int().nonnegative();

/** Accepts both the signed and unsigned 32-bit spelling of an ARGB value. */
export const packedColorSchema = z.number().int().min(-0x80000000).max(0xffffffff);

// The family name is written into a quoted style attribute as-is.
const fontFamilyNameSchema = z.string().regex(/^[^'"<>]*$/, 'Font family must not contain quotes or angle brackets');

export const annotationKindSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('strikethrough') }),
  z.object({ type: z.literal('foregroundColor'), color: packedColorSchema }),
  z.object({ type: z.literal('backgroundColor'), color: packedColorSchema }),
  z.object({ type: z.literal('textCombineUpright') }),
  z.object({
    type: z.literal('absoluteSize'),
    size: z.number().finite(),
    densityIndependent: z.boolean(),
  }),
  z.object({ type: z.literal('relativeSize'), scale: z.number().finite() }),
  z.object({ type: z.literal('fontFamily'), family: fontFamilyNameSchema.nullable().optional() }),
  z.object({ type: z.literal('style'), style: z.enum(STYLE_VARIANTS) }),
  z.object({ type: z.literal('ruby'), position: z.enum(RUBY_POSITIONS), rubyText: z.string() }),
  z.object({ type: z.literal('underline') }),
  z.object({
    type: z.literal('textEmphasis'),
    mark: z.enum(TEXT_EMPHASIS_MARKS),
    position: z.enum(TEXT_EMPHASIS_POSITIONS),
  }),
]);

/**
 * Envelope shape only: kinds are checked one by one so that unrecognized
 * types can be dropped instead of failing the whole payload.
 */
const annotatedTextSchema = z.object({
  text: z.string(),
  annotations: z.array(
    z.object({
      kind: z.object({ type: z.string() }).passthrough(),
      start: offsetSchema,
      end: offsetSchema,
    }),
  ),
});

export const densityScaleSchema = z.number().finite().positive();

const convertRequestSchema = z.object({
  text: z.union([z.string(), z.record(z.unknown())]).nullable().optional(),
  densityScale: z.unknown(),
});

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export interface ConvertRequest {
  text: string | AnnotatedText | null;
  densityScale: number;
}

/**
 * Validates an annotated-text payload received from outside the process.
 *
 * - Annotations whose `kind.type` is not recognized are dropped.
 * - Recognized kinds must carry a valid payload.
 * - Every range must satisfy `0 <= start <= end <= text.length`.
 *
 * @throws AnnotationValidationError
 */
export function parseAnnotatedText(input: unknown): AnnotatedText {
  const parsed = annotatedTextSchema.safeParse(input);
  if (!parsed.success) {
    throw fromZodError('INVALID_INPUT', 'Invalid annotated text', parsed.error);
  }

  const { text } = parsed.data;
  const annotations: Annotation[] = [];

  for (const [index, raw] of parsed.data.annotations.entries()) {
    if (!isAnnotationType(raw.kind.type)) {
      convertLog(`[parseAnnotatedText] Dropping annotation ${index} with unrecognized type "${raw.kind.type}"`);
      continue;
    }

    const kind = annotationKindSchema.safeParse(raw.kind);
    if (!kind.success) {
      throw fromZodError('INVALID_INPUT', `Invalid "${raw.kind.type}" annotation at index ${index}`, kind.error);
    }

    if (raw.start > raw.end || raw.end > text.length) {
      throw new AnnotationValidationError(
        'INVALID_RANGE',
        `Annotation ${index} range [${raw.start}, ${raw.end}) is outside text of length ${text.length}.`,
        { index, start: raw.start, end: raw.end, length: text.length },
      );
    }

    const resolvedKind: AnnotationKind = kind.data;
    annotations.push({ kind: resolvedKind, start: raw.start, end: raw.end });
  }

  return { text, annotations };
}

/**
 * Validates a full conversion request: the (optional) text and a positive,
 * finite density scale.
 *
 * @throws AnnotationValidationError
 */
export function parseConvertRequest(input: unknown): ConvertRequest {
  const parsed = convertRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw fromZodError('INVALID_INPUT', 'Invalid convert request', parsed.error);
  }

  const densityScale = densityScaleSchema.safeParse(parsed.data.densityScale);
  if (!densityScale.success) {
    throw fromZodError('INVALID_DENSITY_SCALE', 'densityScale must be a positive finite number', densityScale.error);
  }

  const { text } = parsed.data;
  if (text == null) {
    return { text: null, densityScale: densityScale.data };
  }
  if (typeof text === 'string') {
    return { text, densityScale: densityScale.data };
  }
  return { text: parseAnnotatedText(text), densityScale: densityScale.data };
}

function fromZodError(code: AnnotationValidationErrorCode, context: string, error: z.ZodError): AnnotationValidationError {
  const issue = error.issues[0];
  const path = issue ? issue.path.join('.') : '';
  const reason = issue ? issue.message : 'Unknown validation failure';
  const message = path ? `${context}: ${path}: ${reason}` : `${context}: ${reason}`;
  return new AnnotationValidationError(code, message, { path, issue: reason });
}
