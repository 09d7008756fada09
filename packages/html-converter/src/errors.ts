export type ConverterInvariantErrorCode = 'MISSING_CLOSING_TAG';

/**
 * Thrown when the converter's own tables disagree with each other.
 *
 * This never reflects bad input: it means a kind was given an opening tag
 * without a matching closing tag.
 */
export class ConverterInvariantError extends Error {
  readonly code: ConverterInvariantErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ConverterInvariantErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ConverterInvariantError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, ConverterInvariantError.prototype);
  }
}
