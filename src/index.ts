// Declared types
export type {
  ScalarKind,
  ScalarType,
  UnionType,
  NamedType,
  NoneType,
  AnyType,
  DeclaredType,
} from './types/declared-type.js';
export {
  ANY,
  NONE,
  named,
  scalar,
  union,
  types,
  typeKey,
  typeFromKey,
  typeOfValue,
  lookupKeys,
} from './types/declared-type.js';

// Errors
export {
  StepGraphError,
  StepInterfaceError,
  InputValidationError,
  DuplicateInvocationError,
  AmbiguousOrderingError,
  UnknownInvocationError,
  PipelineCycleError,
  PipelineBuildError,
  MissingInputError,
  MissingStepParameterError,
  UnknownSettingError,
  MaterializerRequiredError,
  MaterializerNotFoundError,
  ArtifactStoreMismatchError,
  InvalidExternalArtifactError,
  ArtifactUriConflictError,
} from './errors/step-graph-errors.js';

// Signature analysis
export * from './signature/index.js';

// Configuration
export * from './config/index.js';

// Artifacts
export * from './artifacts/index.js';

// Materializers
export * from './materializers/index.js';

// Caching
export * from './caching/index.js';

// Steps
export * from './steps/index.js';

// Pipelines
export * from './pipeline/index.js';

// Logging
export * from './logging/index.js';
