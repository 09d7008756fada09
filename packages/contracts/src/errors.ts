export type AnnotationValidationErrorCode = 'INVALID_INPUT' | 'INVALID_RANGE' | 'INVALID_DENSITY_SCALE';

/**
 * Thrown by the annotated-text parsers when a payload is rejected.
 *
 * `code` names the failed check and `details` carries the offending path or
 * range; hosts that relay the failure back over a message channel should
 * switch on `code`, since the class identity does not survive serialization.
 */
export class AnnotationValidationError extends Error {
  readonly code: AnnotationValidationErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: AnnotationValidationErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AnnotationValidationError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, AnnotationValidationError.prototype);
  }
}
