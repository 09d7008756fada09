/**
 * @annotext/contracts
 *
 * Data model for positionally annotated text, plus the zod-backed parsers used
 * where annotated text arrives from outside the process.
 */

export * from './annotations.js';
export { AnnotationValidationError, type AnnotationValidationErrorCode } from './errors.js';
export {
  annotationKindSchema,
  densityScaleSchema,
  packedColorSchema,
  parseAnnotatedText,
  parseConvertRequest,
  type ConvertRequest,
} from './schemas.js';
