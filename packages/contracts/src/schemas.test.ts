import { afterEach, describe, expect, it, vi } from 'vitest';
import { parseAnnotatedText, parseConvertRequest } from './schemas.js';
import { AnnotationValidationError } from './errors.js';

function captureError(fn: () => unknown): AnnotationValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AnnotationValidationError) return error;
    throw error;
  }
  throw new Error('expected an AnnotationValidationError');
}

describe('parseAnnotatedText', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('accepts text without annotations', () => {
    expect(parseAnnotatedText({ text: 'plain', annotations: [] })).toEqual({ text: 'plain', annotations: [] });
  });

  it('parses every recognized kind', () => {
    const kinds = [
      { type: 'strikethrough' },
      { type: 'foregroundColor', color: 0xff00ff00 },
      { type: 'backgroundColor', color: -16777216 },
      { type: 'textCombineUpright' },
      { type: 'absoluteSize', size: 20, densityIndependent: false },
      { type: 'relativeSize', scale: 1.5 },
      { type: 'fontFamily', family: 'serif' },
      { type: 'fontFamily', family: null },
      { type: 'style', style: 'boldItalic' },
      { type: 'ruby', position: 'over', rubyText: 'T' },
      { type: 'underline' },
      { type: 'textEmphasis', mark: 'openSesame', position: 'after' },
    ];
    const input = { text: 'abc', annotations: kinds.map((kind) => ({ kind, start: 0, end: 3 })) };

    const result = parseAnnotatedText(input);

    expect(result.annotations.map((annotation) => annotation.kind)).toEqual(kinds);
  });

  it('strips unknown payload fields from recognized kinds', () => {
    const result = parseAnnotatedText({
      text: 'abc',
      annotations: [{ kind: { type: 'underline', extra: true }, start: 0, end: 1 }],
    });
    expect(result.annotations).toEqual([{ kind: { type: 'underline' }, start: 0, end: 1 }]);
  });

  it('drops annotations with an unrecognized type', () => {
    const result = parseAnnotatedText({
      text: 'abc',
      annotations: [
        { kind: { type: 'blink' }, start: 0, end: 1 },
        { kind: { type: 'underline' }, start: 1, end: 2 },
      ],
    });
    expect(result.annotations).toEqual([{ kind: { type: 'underline' }, start: 1, end: 2 }]);
  });

  it('logs dropped annotations when debugging is enabled', () => {
    vi.stubEnv('ANNOTEXT_DEBUG_CONVERT', '1');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    parseAnnotatedText({ text: 'abc', annotations: [{ kind: { type: 'blink' }, start: 0, end: 1 }] });

    expect(log).toHaveBeenCalledWith('[parseAnnotatedText] Dropping annotation 0 with unrecognized type "blink"');
  });

  it('accepts empty and full-length ranges', () => {
    const result = parseAnnotatedText({
      text: 'abc',
      annotations: [
        { kind: { type: 'underline' }, start: 3, end: 3 },
        { kind: { type: 'underline' }, start: 0, end: 3 },
      ],
    });
    expect(result.annotations).toHaveLength(2);
  });

  it('rejects non-object input', () => {
    expect(captureError(() => parseAnnotatedText('abc')).code).toBe('INVALID_INPUT');
    expect(captureError(() => parseAnnotatedText(null)).code).toBe('INVALID_INPUT');
  });

  it('rejects non-integer offsets', () => {
    const error = captureError(() =>
      parseAnnotatedText({ text: 'abc', annotations: [{ kind: { type: 'underline' }, start: 0.5, end: 1 }] }),
    );
    expect(error.code).toBe('INVALID_INPUT');
    expect(error.details?.path).toBe('annotations.0.start');
  });

  it('rejects a recognized kind with an invalid payload', () => {
    const error = captureError(() =>
      parseAnnotatedText({ text: 'abc', annotations: [{ kind: { type: 'style', style: 'heavy' }, start: 0, end: 1 }] }),
    );
    expect(error.code).toBe('INVALID_INPUT');
    expect(error.details?.path).toBe('style');
    expect(error.message).toContain('Invalid "style" annotation at index 0');
  });

  it.each([`Bob's Font`, 'Say "Hi"', 'a<b', 'a>b'])('rejects font family %j', (family) => {
    const error = captureError(() =>
      parseAnnotatedText({ text: 'abc', annotations: [{ kind: { type: 'fontFamily', family }, start: 0, end: 1 }] }),
    );
    expect(error.code).toBe('INVALID_INPUT');
    expect(error.details).toEqual({
      path: 'family',
      issue: 'Font family must not contain quotes or angle brackets',
    });
  });

  it('accepts font family names with spaces and commas', () => {
    const result = parseAnnotatedText({
      text: 'abc',
      annotations: [{ kind: { type: 'fontFamily', family: 'Noto Sans JP, sans-serif' }, start: 0, end: 1 }],
    });
    expect(result.annotations[0]?.kind).toEqual({ type: 'fontFamily', family: 'Noto Sans JP, sans-serif' });
  });

  it('rejects colors outside the 32-bit range', () => {
    const error = captureError(() =>
      parseAnnotatedText({
        text: 'abc',
        annotations: [{ kind: { type: 'foregroundColor', color: 0x100000000 }, start: 0, end: 1 }],
      }),
    );
    expect(error.code).toBe('INVALID_INPUT');
    expect(error.details?.path).toBe('color');
  });

  it('rejects a range whose start is after its end', () => {
    const error = captureError(() =>
      parseAnnotatedText({ text: 'abc', annotations: [{ kind: { type: 'underline' }, start: 2, end: 1 }] }),
    );
    expect(error.code).toBe('INVALID_RANGE');
    expect(error.details).toEqual({ index: 0, start: 2, end: 1, length: 3 });
  });

  it('rejects a range past the end of the text', () => {
    const error = captureError(() =>
      parseAnnotatedText({ text: 'abc', annotations: [{ kind: { type: 'underline' }, start: 0, end: 4 }] }),
    );
    expect(error.code).toBe('INVALID_RANGE');
    expect(error.message).toBe('Annotation 0 range [0, 4) is outside text of length 3.');
  });
});

describe('parseConvertRequest', () => {
  it('returns null text when text is absent or null', () => {
    expect(parseConvertRequest({ densityScale: 2 })).toEqual({ text: null, densityScale: 2 });
    expect(parseConvertRequest({ text: null, densityScale: 2 })).toEqual({ text: null, densityScale: 2 });
  });

  it('passes plain strings through', () => {
    expect(parseConvertRequest({ text: 'hi', densityScale: 1 })).toEqual({ text: 'hi', densityScale: 1 });
  });

  it('parses annotated text', () => {
    const request = parseConvertRequest({
      text: { text: 'hi', annotations: [{ kind: { type: 'underline' }, start: 0, end: 2 }] },
      densityScale: 3,
    });
    expect(request).toEqual({
      text: { text: 'hi', annotations: [{ kind: { type: 'underline' }, start: 0, end: 2 }] },
      densityScale: 3,
    });
  });

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY, '2'])('rejects densityScale %s', (densityScale) => {
    const error = captureError(() => parseConvertRequest({ text: 'hi', densityScale }));
    expect(error.code).toBe('INVALID_DENSITY_SCALE');
    expect(error.message).toContain('densityScale must be a positive finite number');
  });

  it('rejects text of the wrong type', () => {
    expect(captureError(() => parseConvertRequest({ text: 42, densityScale: 1 })).code).toBe('INVALID_INPUT');
    expect(captureError(() => parseConvertRequest({ text: ['a'], densityScale: 1 })).code).toBe('INVALID_INPUT');
  });

  it('rejects non-object requests', () => {
    expect(captureError(() => parseConvertRequest(undefined)).code).toBe('INVALID_INPUT');
  });
});
