/**
 * One use of a step template as a node of a pipeline build.
 *
 * Holds the bound artifacts and parameters of the call and the upstream
 * invocation IDs derived from it. Finalization turns the node into an
 * immutable StepConfiguration.
 */

import type { FinalizationDeps } from '../artifacts/collaborators.js';
import type { ExternalArtifact } from '../artifacts/external-artifact.js';
import type { StepArtifact } from '../artifacts/step-artifact.js';
import { mergeConfiguration } from '../config/configuration-merge.js';
import { DEFAULT_ENGINE_CONFIG } from '../config/engine-config.js';
import type { StepConfiguration } from '../config/step-configuration.js';
import { AmbiguousOrderingError, InputValidationError } from '../errors/step-graph-errors.js';
import { isAssignable } from '../signature/value-checker.js';
import type { StepTemplate } from '../steps/step-template.js';
import { typeKey, type DeclaredType } from '../types/declared-type.js';

/** Read access to the other invocations of the same build. */
export interface InvocationLookup {
  invocationsOf(template: StepTemplate): readonly StepInvocation[];
}

export interface StepInvocationInit {
  id: string;
  template: StepTemplate;
  inputArtifacts: Readonly<Record<string, StepArtifact>>;
  externalArtifacts: Readonly<Record<string, ExternalArtifact>>;
  parameters: Readonly<Record<string, unknown>>;
  upstreamSteps: ReadonlySet<string>;
}

export class StepInvocation {
  readonly id: string;
  readonly template: StepTemplate;
  readonly inputArtifacts: Readonly<Record<string, StepArtifact>>;
  readonly externalArtifacts: Readonly<Record<string, ExternalArtifact>>;
  readonly parameters: Readonly<Record<string, unknown>>;
  /** Upstream IDs from input artifacts and explicit `after` IDs */
  readonly invocationUpstreamSteps: ReadonlySet<string>;
  private readonly build: InvocationLookup;
  private finalized: StepConfiguration | null = null;

  constructor(init: StepInvocationInit, build: InvocationLookup) {
    this.id = init.id;
    this.template = init.template;
    this.inputArtifacts = Object.freeze({ ...init.inputArtifacts });
    this.externalArtifacts = Object.freeze({ ...init.externalArtifacts });
    this.parameters = Object.freeze({ ...init.parameters });
    this.invocationUpstreamSteps = new Set(init.upstreamSteps);
    this.build = build;
  }

  /**
   * All upstream invocation IDs: artifact owners, explicit IDs and the
   * invocations of templates named in the template's ordering hints.
   *
   * @throws {AmbiguousOrderingError} See resolveTemplateUpstream
   */
  get upstreamSteps(): ReadonlySet<string> {
    return new Set([...this.invocationUpstreamSteps, ...this.resolveTemplateUpstream()]);
  }

  /**
   * Map the template's ordering hints to invocation IDs.
   *
   * @throws {AmbiguousOrderingError} When the template carries ordering
   *   hints but is invoked more than once, or a hinted template is invoked
   *   more than once
   */
  resolveTemplateUpstream(): Set<string> {
    const upstream = new Set<string>();
    if (this.template.upstreamSteps.size === 0) {
      return upstream;
    }

    if (this.build.invocationsOf(this.template).length > 1) {
      throw new AmbiguousOrderingError(this.template.name);
    }

    for (const step of this.template.upstreamSteps) {
      const invocations = this.build.invocationsOf(step);
      if (invocations.length > 1) {
        throw new AmbiguousOrderingError(step.name);
      }
      for (const invocation of invocations) {
        upstream.add(invocation.id);
      }
    }
    return upstream;
  }

  /**
   * Finalize this invocation's configuration.
   *
   * Steps, in order: re-validate upstream resolution, replace the template's
   * parameters with the invocation's, check artifact input types, upload
   * pending external artifacts, then delegate to the template's
   * finalization (materializers, parameters, bound inputs, caching). A
   * finalized invocation returns the same configuration on later calls.
   */
  async finalize(deps: FinalizationDeps): Promise<StepConfiguration> {
    if (this.finalized) {
      return this.finalized;
    }

    this.resolveTemplateUpstream();

    const configuration = Object.keys(this.parameters).length > 0
      ? mergeConfiguration(
        this.template.configuration,
        { parameters: { ...this.parameters } },
        { deep: false },
      )
      : this.template.configuration;

    for (const [inputName, artifact] of Object.entries(this.inputArtifacts)) {
      this.checkInputType(inputName, artifact.type);
    }
    for (const [inputName, artifact] of Object.entries(this.externalArtifacts)) {
      const input = this.template.interface.inputs[inputName];
      if (input && !(await artifact.fitsType(input.type, deps.metadataStore))) {
        throw this.wrongInputType(inputName, await artifact.resolveType(deps.metadataStore), input.type);
      }
    }

    const registry = deps.registry ?? this.template.registry;
    const externalArtifactIds: Record<string, string> = {};
    for (const [inputName, artifact] of Object.entries(this.externalArtifacts)) {
      externalArtifactIds[inputName] = await artifact.upload({
        artifactStore: deps.artifactStore,
        metadataStore: deps.metadataStore,
        runContext: deps.runContext,
        registry,
        externalArtifactsDir: deps.externalArtifactsDir ?? DEFAULT_ENGINE_CONFIG.externalArtifactsDir,
      });
    }

    this.finalized = this.template.finalizeConfiguration({
      configuration,
      inputArtifacts: this.inputArtifacts,
      externalArtifactIds,
      registry,
    });
    return this.finalized;
  }

  private checkInputType(inputName: string, artifactType: DeclaredType): void {
    const input = this.template.interface.inputs[inputName];
    if (input && !isAssignable(artifactType, input.type)) {
      throw this.wrongInputType(inputName, artifactType, input.type);
    }
  }

  private wrongInputType(
    inputName: string,
    artifactType: DeclaredType,
    inputType: DeclaredType,
  ): InputValidationError {
    return new InputValidationError(
      `Wrong input type (\`${typeKey(artifactType)}\`) for input '${inputName}' ` +
      `of invocation '${this.id}'. The input should be of type ` +
      `\`${typeKey(inputType)}\`.`,
      this.template.name,
      inputName,
    );
  }
}
