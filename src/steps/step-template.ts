/**
 * Step templates: named, reusable units of computation with a typed
 * interface.
 *
 * A template is declared once with `defineStep`. Its interface is analyzed
 * at declaration time; its base configuration changes only through
 * `configure()`. Invoking it inside a pipeline build adds a node to that
 * build's graph; `run()` calls the implementation directly.
 */

import { ExternalArtifact } from '../artifacts/external-artifact.js';
import { StepArtifact } from '../artifacts/step-artifact.js';
import { computeCachingParameters } from '../caching/fingerprint.js';
import { mergeConfiguration } from '../config/configuration-merge.js';
import {
  createPartialConfiguration,
  freezeSnapshot,
  type ArtifactConfiguration,
  type ConfigurationUpdate,
  type PartialStepConfiguration,
  type StepConfiguration,
} from '../config/step-configuration.js';
import {
  InputValidationError,
  MissingInputError,
  StepInterfaceError,
  UnknownSettingError,
} from '../errors/step-graph-errors.js';
import { getLogger } from '../logging/logger.js';
import { materializerRegistry, type MaterializerRegistry } from '../materializers/materializer-registry.js';
import { resolveMaterializerSource, resolveOutputMaterializers } from '../materializers/materializer-resolver.js';
import type { MaterializerSpecifier } from '../materializers/types.js';
import type { StepSignature } from '../signature/annotations.js';
import { analyzeSignature, type StepInterface } from '../signature/signature-analyzer.js';
import { matchesType, validateParameterValue } from '../signature/value-checker.js';
import { typeKey } from '../types/declared-type.js';
import type { InvocationRequest } from '../pipeline/pipeline-build.js';
import { bindCallArguments, type StepArgs } from './call-arguments.js';
import { defaultParameterValue, finalizeLegacyParameters, finalizeParameters } from './parameters.js';

const logger = getLogger('step-template');

// ============================================================================
// Types
// ============================================================================

/** A hook identifier, or a named function whose name identifies it. */
export type HookSpecifier = string | ((...args: never[]) => unknown);

export type OutputMaterializerValue = MaterializerSpecifier | readonly MaterializerSpecifier[];

/**
 * One materializer (or list) for every output, or a mapping from output
 * name to its materializer(s).
 */
export type OutputMaterializers =
  | OutputMaterializerValue
  | Readonly<Record<string, OutputMaterializerValue>>;

export interface StepConfigureOptions {
  enableCache?: boolean;
  enableArtifactMetadata?: boolean;
  enableArtifactVisualization?: boolean;
  experimentTracker?: string;
  stepOperator?: string;
  parameters?: Readonly<Record<string, unknown>>;
  outputMaterializers?: OutputMaterializers;
  settings?: Readonly<Record<string, Readonly<Record<string, unknown>>>>;
  extra?: Readonly<Record<string, unknown>>;
  onFailure?: HookSpecifier;
  onSuccess?: HookSpecifier;
}

const CONFIGURE_OPTION_KEYS: ReadonlySet<string> = new Set([
  'enableCache',
  'enableArtifactMetadata',
  'enableArtifactVisualization',
  'experimentTracker',
  'stepOperator',
  'parameters',
  'outputMaterializers',
  'settings',
  'extra',
  'onFailure',
  'onSuccess',
]);

export interface ConfigureBehavior {
  /** Deep-merge into the current configuration (default: true) */
  merge?: boolean;
}

export type StepEntrypoint<TResult> = (args: Record<string, unknown>) => TResult;

export interface StepDefinition<TResult> extends StepConfigureOptions {
  name: string;
  signature: StepSignature;
  entrypoint: StepEntrypoint<TResult>;
  /** Source text hashed into the caching fingerprint (default: entrypoint source) */
  source?: string;
  registry?: MaterializerRegistry;
}

export interface InvokeOptions {
  /** Custom invocation ID; disables suffixing unless `allowSuffix` is set */
  id?: string;
  /** Invocation IDs that must run before this one */
  after?: string | readonly string[];
  allowSuffix?: boolean;
}

/** The part of a pipeline build a template talks to when invoked. */
export interface InvocationTarget {
  readonly id: string;
  readonly allowSuffix: boolean;
  addInvocation(request: InvocationRequest): string;
}

export interface StepInvocationHandle {
  readonly invocationId: string;
  readonly outputs: Readonly<Record<string, StepArtifact>>;
  /** Output by name; without a name, the only output of the step */
  output(name?: string): StepArtifact;
}

export interface ConfigurationFinalizationRequest {
  configuration: PartialStepConfiguration;
  inputArtifacts: Readonly<Record<string, StepArtifact>>;
  externalArtifactIds: Readonly<Record<string, string>>;
  registry: MaterializerRegistry;
}

// ============================================================================
// Helpers
// ============================================================================

function isSpecifierList(value: unknown): value is readonly MaterializerSpecifier[] {
  return Array.isArray(value);
}

function resolveHookSource(hook: HookSpecifier, kind: string, stepName: string): string {
  const source = typeof hook === 'string' ? hook : hook.name;
  if (source.length === 0) {
    throw new StepInterfaceError(
      `The ${kind} hook of step '${stepName}' must be a hook identifier or a named function.`,
    );
  }
  return source;
}

function createHandle(
  stepName: string,
  invocationId: string,
  outputs: Readonly<Record<string, StepArtifact>>,
): StepInvocationHandle {
  return Object.freeze({
    invocationId,
    outputs,
    output(name?: string): StepArtifact {
      if (name === undefined) {
        const [only, ...rest] = Object.values(outputs);
        if (only === undefined || rest.length > 0) {
          throw new StepInterfaceError(
            `Step '${stepName}' declares ${Object.keys(outputs).length} outputs; ` +
            'pass the name of the output to use.',
          );
        }
        return only;
      }
      const artifact = outputs[name];
      if (!artifact) {
        throw new StepInterfaceError(`Step '${stepName}' has no output '${name}'.`);
      }
      return artifact;
    },
  });
}

// ============================================================================
// StepTemplate
// ============================================================================

export class StepTemplate<TResult = unknown> {
  readonly name: string;
  readonly interface: StepInterface;
  readonly sourceCode: string;
  readonly registry: MaterializerRegistry;
  private readonly entrypoint: StepEntrypoint<TResult>;
  private readonly upstream = new Set<StepTemplate>();
  private currentConfiguration: PartialStepConfiguration;

  /**
   * @throws {StepInterfaceError} When the signature is malformed or the
   *   initial configuration is invalid
   */
  constructor(definition: StepDefinition<TResult>) {
    const {
      name,
      signature,
      entrypoint,
      source,
      registry,
      enableCache: explicitCache,
      enableArtifactMetadata,
      enableArtifactVisualization,
      ...options
    } = definition;

    this.name = name;
    this.interface = analyzeSignature(signature, name);
    this.entrypoint = entrypoint;
    this.sourceCode = source ?? entrypoint.toString();
    this.registry = registry ?? materializerRegistry;

    let enableCache = explicitCache;
    if (enableCache === undefined && this.interface.hasContext) {
      // The context reaches outside the step's inputs
      enableCache = false;
      logger.debug(`Step '${name}': Step context required and caching not explicitly enabled.`);
    }
    logger.debug(`Step '${name}': Caching ${enableCache === false ? 'disabled' : 'enabled'}.`);

    this.currentConfiguration = createPartialConfiguration(name, {
      enableCache,
      enableArtifactMetadata,
      enableArtifactVisualization,
    });
    this.configure(options);
  }

  get configuration(): PartialStepConfiguration {
    return this.currentConfiguration;
  }

  /** Templates that must run before this one, set with `after()`. */
  get upstreamSteps(): ReadonlySet<StepTemplate> {
    return this.upstream;
  }

  /**
   * Ordering hint: this step runs after `step`. Only valid while this
   * template (and `step`) are invoked once per pipeline.
   */
  after(step: StepTemplate): void {
    this.upstream.add(step);
  }

  // --------------------------------------------------------------------------
  // Configuration
  // --------------------------------------------------------------------------

  /**
   * Apply configuration options to the template's base configuration.
   *
   * @throws {UnknownSettingError} On unknown option or setting keys
   * @throws {StepInterfaceError} On parameters or output materializers that
   *   do not fit the step interface
   */
  configure(options: StepConfigureOptions, behavior: ConfigureBehavior = {}): this {
    const unknownKeys = Object.keys(options).filter((key) => !CONFIGURE_OPTION_KEYS.has(key));
    if (unknownKeys.length > 0) {
      throw new UnknownSettingError(unknownKeys);
    }

    const update: ConfigurationUpdate = {};
    if (options.enableCache !== undefined) update.enableCache = options.enableCache;
    if (options.enableArtifactMetadata !== undefined) {
      update.enableArtifactMetadata = options.enableArtifactMetadata;
    }
    if (options.enableArtifactVisualization !== undefined) {
      update.enableArtifactVisualization = options.enableArtifactVisualization;
    }
    if (options.experimentTracker !== undefined) update.experimentTracker = options.experimentTracker;
    if (options.stepOperator !== undefined) update.stepOperator = options.stepOperator;
    if (options.parameters !== undefined) {
      this.validateParameters(options.parameters);
      update.parameters = { ...options.parameters };
    }
    if (options.outputMaterializers !== undefined) {
      update.outputs = this.normalizeOutputMaterializers(options.outputMaterializers);
    }
    if (options.settings !== undefined) update.settings = { ...options.settings };
    if (options.extra !== undefined) update.extra = { ...options.extra };
    if (options.onFailure !== undefined) {
      update.failureHookSource = resolveHookSource(options.onFailure, 'failure', this.name);
    }
    if (options.onSuccess !== undefined) {
      update.successHookSource = resolveHookSource(options.onSuccess, 'success', this.name);
    }

    const deep = behavior.merge ?? true;
    this.currentConfiguration = mergeConfiguration(this.currentConfiguration, update, { deep });
    logger.debug(`Step '${this.name}': Configuration updated (merge: ${deep}).`);
    return this;
  }

  private validateParameters(parameters: Readonly<Record<string, unknown>>): void {
    for (const [key, value] of Object.entries(parameters)) {
      const input = this.interface.inputs[key];
      if (input) {
        validateParameterValue(this.name, input, value);
      } else if (!this.interface.legacyParameter) {
        throw new StepInterfaceError(
          `Can't set parameter '${key}' for step '${this.name}': it is not an ` +
          'input of the step and the step declares no parameter object.',
        );
      }
    }
  }

  private normalizeOutputMaterializers(
    value: OutputMaterializers,
  ): Record<string, { materializerSource: string[] }> {
    const outputs: Record<string, { materializerSource: string[] }> = {};
    const toSources = (specifiers: OutputMaterializerValue, outputName: string): string[] => {
      const list = isSpecifierList(specifiers) ? specifiers : [specifiers];
      const context = `output '${outputName}' of step '${this.name}'`;
      return list.map((specifier) => resolveMaterializerSource(specifier, this.registry, context));
    };

    if (typeof value === 'string' || typeof value === 'function' || isSpecifierList(value)) {
      for (const outputName of Object.keys(this.interface.outputs)) {
        outputs[outputName] = { materializerSource: toSources(value, outputName) };
      }
      return outputs;
    }

    const allowed = Object.keys(this.interface.outputs);
    for (const [outputName, specifiers] of Object.entries(value)) {
      if (!allowed.includes(outputName)) {
        throw new StepInterfaceError(
          `Got unexpected materializers for non-existent output '${outputName}' ` +
          `in step '${this.name}'. Only materializers for the outputs ` +
          `[${allowed.join(', ')}] of this step can be registered.`,
        );
      }
      outputs[outputName] = { materializerSource: toSources(specifiers, outputName) };
    }
    return outputs;
  }

  // --------------------------------------------------------------------------
  // Calling
  // --------------------------------------------------------------------------

  /**
   * Add an invocation of this step to a pipeline build.
   *
   * @returns Handle carrying the invocation ID and one artifact per output
   */
  invoke(build: InvocationTarget, args: StepArgs = {}, options: InvokeOptions = {}): StepInvocationHandle {
    const bound = bindCallArguments(this.name, this.interface, this.configuration.parameters, args);

    const upstreamSteps = new Set<string>();
    for (const artifact of Object.values(bound.inputArtifacts)) {
      upstreamSteps.add(artifact.invocationId);
    }
    const after = typeof options.after === 'string' ? [options.after] : options.after ?? [];
    for (const id of after) {
      upstreamSteps.add(id);
    }

    const invocationId = build.addInvocation({
      template: this,
      inputArtifacts: bound.inputArtifacts,
      externalArtifacts: bound.externalArtifacts,
      parameters: bound.parameters,
      upstreamSteps,
      customId: options.id,
      allowSuffix: options.allowSuffix ?? (options.id === undefined ? build.allowSuffix : false),
    });

    const outputs: Record<string, StepArtifact> = {};
    for (const [outputName, type] of Object.entries(this.interface.outputs)) {
      outputs[outputName] = new StepArtifact(build.id, invocationId, outputName, type);
    }
    return createHandle(this.name, invocationId, Object.freeze(outputs));
  }

  /**
   * Call the step implementation directly, outside any pipeline build.
   *
   * @param context - Passed as the step-context argument, when declared
   * @throws {MissingInputError} When an input without default gets no value
   * @throws {InputValidationError} When a value does not match its input
   */
  run(args: StepArgs = {}, context?: unknown): TResult {
    const legacy = this.interface.legacyParameter;
    for (const key of Object.keys(args)) {
      if (!Object.prototype.hasOwnProperty.call(this.interface.inputs, key) && key !== legacy?.name) {
        throw new StepInterfaceError(`Wrong arguments when calling step '${this.name}': unexpected input '${key}'.`);
      }
    }

    const callArgs: Record<string, unknown> = {};
    for (const input of Object.values(this.interface.inputs)) {
      const passed = args[input.name];
      const value = passed === undefined && input.hasDefault ? input.default : passed;
      if (value === undefined) {
        throw new MissingInputError(this.name, input.name);
      }
      if (value instanceof StepArtifact || value instanceof ExternalArtifact) {
        throw new StepInterfaceError(
          `Artifact passed for input '${input.name}' of step '${this.name}' outside ` +
          'a pipeline build.',
        );
      }
      if (!matchesType(input.type, value)) {
        throw new InputValidationError(
          `Value for input '${input.name}' of step '${this.name}' does not match ` +
          `declared type \`${typeKey(input.type)}\`.`,
          this.name,
          input.name,
        );
      }
      callArgs[input.name] = value;
    }

    if (legacy) {
      const passed = args[legacy.name];
      if (passed === undefined) {
        callArgs[legacy.name] = finalizeLegacyParameters(this.name, legacy, this.configuration.parameters);
      } else {
        const result = legacy.schema.safeParse(passed);
        if (!result.success) {
          throw new StepInterfaceError(`Invalid parameters '${legacy.name}' for step '${this.name}'.`);
        }
        callArgs[legacy.name] = result.data;
      }
    }

    if (this.interface.contextParameter) {
      callArgs[this.interface.contextParameter] = context;
    }

    return this.entrypoint(callArgs);
  }

  // --------------------------------------------------------------------------
  // Finalization
  // --------------------------------------------------------------------------

  /**
   * Produce the immutable configuration of one invocation: resolved output
   * materializers, final parameters, bound-input check and caching
   * parameters. Inputs left unbound take their declared default.
   *
   * @throws {MaterializerRequiredError} For `any` outputs without an explicit
   *   materializer
   * @throws {MaterializerNotFoundError} For output types without a
   *   registered materializer
   * @throws {MissingInputError} For inputs without artifact, parameter or
   *   default
   */
  finalizeConfiguration(request: ConfigurationFinalizationRequest): StepConfiguration {
    const { configuration, registry } = request;

    const outputs: Record<string, ArtifactConfiguration> = {};
    for (const [outputName, declaredType] of Object.entries(this.interface.outputs)) {
      outputs[outputName] = {
        materializerSource: resolveOutputMaterializers({
          stepName: this.name,
          outputName,
          declaredType,
          explicitSources: configuration.outputs[outputName]?.materializerSource ?? [],
          registry,
        }),
      };
    }

    const parameters = finalizeParameters(this.name, this.interface, configuration.parameters);

    for (const input of Object.values(this.interface.inputs)) {
      if (
        input.name in request.inputArtifacts ||
        input.name in request.externalArtifactIds ||
        input.name in parameters
      ) {
        continue;
      }
      if (!input.hasDefault) {
        throw new MissingInputError(this.name, input.name);
      }
      parameters[input.name] = defaultParameterValue(this.name, input);
    }

    const cachingParameters = computeCachingParameters({
      stepSource: this.sourceCode,
      outputs,
      registry,
    });

    return freezeSnapshot<StepConfiguration>({
      ...configuration,
      parameters,
      outputs,
      cachingParameters,
      externalInputArtifacts: { ...request.externalArtifactIds },
    });
  }
}

/**
 * Declare a step template.
 *
 * @example
 * const trainer = defineStep({
 *   name: 'trainer',
 *   signature: {
 *     parameters: [
 *       { name: 'data', annotation: types.array },
 *       { name: 'epochs', annotation: types.integer, default: 3 },
 *     ],
 *     returns: types.named('Model'),
 *   },
 *   entrypoint: ({ data, epochs }) => train(data, epochs),
 * });
 */
export function defineStep<TResult>(definition: StepDefinition<TResult>): StepTemplate<TResult> {
  return new StepTemplate(definition);
}
