import { describe, expect, it } from 'vitest';
import { ConverterInvariantError } from './errors.js';

describe('ConverterInvariantError', () => {
  it('carries a code and details', () => {
    const error = new ConverterInvariantError('MISSING_CLOSING_TAG', 'missing', { type: 'underline' });

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ConverterInvariantError);
    expect(error.name).toBe('ConverterInvariantError');
    expect(error.code).toBe('MISSING_CLOSING_TAG');
    expect(error.details).toEqual({ type: 'underline' });
  });
});
