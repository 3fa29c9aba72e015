// ============================================================================
// Step graph error taxonomy
// ============================================================================
// Every failure raised while declaring steps, building a pipeline graph or
// finalizing step configurations. All of them are fatal to the operation
// that raised them; nothing in the core retries.

/**
 * Base class for all errors raised by the step graph engine.
 */
export class StepGraphError extends Error {
  override name = 'StepGraphError';

  constructor(message: string, cause?: unknown) {
    super(message);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

// ----------------------------------------------------------------------------
// Declaration
// ----------------------------------------------------------------------------

/**
 * Malformed step interface or wrong use of it: variadic parameters, missing
 * annotations, duplicate context or parameter-object parameters, missing
 * return annotation, wrong call arguments or invalid configuration values.
 */
export class StepInterfaceError extends StepGraphError {
  override name = 'StepInterfaceError';
}

/**
 * A parameter value that does not match its declared type or cannot be
 * represented as JSON.
 */
export class InputValidationError extends StepInterfaceError {
  override name = 'InputValidationError';

  constructor(
    message: string,
    public readonly stepName: string,
    public readonly inputName: string,
  ) {
    super(message);
  }
}

// ----------------------------------------------------------------------------
// Graph construction
// ----------------------------------------------------------------------------

export class DuplicateInvocationError extends StepGraphError {
  override name = 'DuplicateInvocationError';

  constructor(public readonly invocationId: string) {
    super(
      `Invocation ID "${invocationId}" is already used in this pipeline. ` +
      'Pass a different `id` or allow a numeric suffix.',
    );
  }
}

export class AmbiguousOrderingError extends StepGraphError {
  override name = 'AmbiguousOrderingError';

  constructor(public readonly stepName: string) {
    super(
      `Step "${stepName}" is invoked more than once while ordering hints ` +
      'set with `.after(...)` involve it. Ordering hints are only allowed ' +
      'for steps that are invoked exactly once.',
    );
  }
}

export class UnknownInvocationError extends StepGraphError {
  override name = 'UnknownInvocationError';

  constructor(public readonly invocationId: string, context: string) {
    super(`Unknown invocation "${invocationId}" ${context}.`);
  }
}

export class PipelineCycleError extends StepGraphError {
  override name = 'PipelineCycleError';

  constructor(public readonly cycle: readonly string[]) {
    super(`Circular dependency detected between invocations: ${cycle.join(' -> ')}`);
  }
}

export class PipelineBuildError extends StepGraphError {
  override name = 'PipelineBuildError';
}

// ----------------------------------------------------------------------------
// Configuration finalization
// ----------------------------------------------------------------------------

export class MissingInputError extends StepGraphError {
  override name = 'MissingInputError';

  constructor(
    public readonly stepName: string,
    public readonly inputName: string,
    message = `Missing input "${inputName}" for step "${stepName}". Pass it as an ` +
      'artifact, an external artifact or a parameter.',
  ) {
    super(message);
  }
}

/**
 * Required fields of a step's parameter object that received no value.
 */
export class MissingStepParameterError extends MissingInputError {
  override name = 'MissingStepParameterError';

  constructor(
    stepName: string,
    parameterName: string,
    public readonly missingKeys: readonly string[],
  ) {
    super(
      stepName,
      parameterName,
      `Missing values for parameters [${missingKeys.join(', ')}] of step ` +
      `"${stepName}". Set them with \`configure({ parameters })\` or give ` +
      'them defaults in the parameter schema.',
    );
  }
}

export class UnknownSettingError extends StepGraphError {
  override name = 'UnknownSettingError';

  constructor(public readonly keys: readonly string[], message?: string) {
    super(message ?? `Unknown configuration keys: ${keys.join(', ')}`);
  }
}

// ----------------------------------------------------------------------------
// Type resolution
// ----------------------------------------------------------------------------

export class MaterializerRequiredError extends StepGraphError {
  override name = 'MaterializerRequiredError';

  constructor(public readonly stepName: string, public readonly outputName: string) {
    super(
      `Output "${outputName}" of step "${stepName}" is declared as \`any\`. ` +
      'An explicit materializer is required for such outputs.',
    );
  }
}

export class MaterializerNotFoundError extends StepGraphError {
  override name = 'MaterializerNotFoundError';

  constructor(
    message: string,
    public readonly typeDescription: string,
    public readonly outputName?: string,
  ) {
    super(message);
  }
}

// ----------------------------------------------------------------------------
// Artifacts
// ----------------------------------------------------------------------------

export class ArtifactStoreMismatchError extends StepGraphError {
  override name = 'ArtifactStoreMismatchError';

  constructor(
    public readonly artifactId: string,
    public readonly expectedStoreId: string,
    public readonly actualStoreId: string,
  ) {
    super(
      `Artifact "${artifactId}" lives in artifact store "${actualStoreId}", ` +
      `but the active run uses artifact store "${expectedStoreId}".`,
    );
  }
}

export class InvalidExternalArtifactError extends StepGraphError {
  override name = 'InvalidExternalArtifactError';
}

export class ArtifactUriConflictError extends StepGraphError {
  override name = 'ArtifactUriConflictError';

  constructor(public readonly uri: string) {
    super(`Artifact URI already exists: ${uri}`);
  }
}
