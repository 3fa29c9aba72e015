/**
 * Barrel exports for the signature module.
 *
 * Annotation constructors for declaring step signatures, the analyzer that
 * turns them into a StepInterface, and the value checks used for parameters.
 */

// Annotations
export { generic, context, parameterObject, outputs, hasDefault } from './annotations.js';
export type {
  GenericAnnotation,
  ContextAnnotation,
  ParameterObjectAnnotation,
  TypeAnnotation,
  OutputsAnnotation,
  ReturnAnnotation,
  ParameterKind,
  ParameterDescriptor,
  StepSignature,
} from './annotations.js';

// Analyzer
export {
  SINGLE_RETURN_OUT_NAME,
  analyzeSignature,
  parseReturnAnnotation,
  resolveTypeAnnotation,
} from './signature-analyzer.js';
export type { InputDescriptor, LegacyParameter, StepInterface } from './signature-analyzer.js';

// Value checks
export {
  isAssignable,
  isJsonValue,
  isPlainObject,
  matchesType,
  validateParameterValue,
} from './value-checker.js';
export type { JsonValue } from './value-checker.js';
