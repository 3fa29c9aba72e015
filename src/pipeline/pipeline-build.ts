/**
 * Pipeline build: the invocation graph of one pipeline under construction.
 *
 * Graph construction is synchronous. `addInvocation` registers nodes and
 * only accepts upstream IDs that are already registered, so artifact and
 * explicit edges never close a cycle; ordering hints on templates are
 * resolved at finalization, where a cycle they create is reported.
 */

import { randomUUID } from 'crypto';
import type { FinalizationDeps } from '../artifacts/collaborators.js';
import type { ExternalArtifact } from '../artifacts/external-artifact.js';
import type { StepArtifact } from '../artifacts/step-artifact.js';
import { DEFAULT_ENGINE_CONFIG } from '../config/engine-config.js';
import type { StepConfiguration } from '../config/step-configuration.js';
import {
  DuplicateInvocationError,
  PipelineBuildError,
  PipelineCycleError,
  UnknownInvocationError,
} from '../errors/step-graph-errors.js';
import { getLogger } from '../logging/logger.js';
import type { StepTemplate } from '../steps/step-template.js';
import { InvocationDAG } from './invocation-dag.js';
import { StepInvocation, type InvocationLookup } from './step-invocation.js';

const logger = getLogger('pipeline-build');

// ============================================================================
// Types
// ============================================================================

export interface InvocationRequest {
  template: StepTemplate;
  inputArtifacts: Readonly<Record<string, StepArtifact>>;
  externalArtifacts: Readonly<Record<string, ExternalArtifact>>;
  parameters: Readonly<Record<string, unknown>>;
  /** Upstream invocation IDs from artifacts and explicit `after` IDs */
  upstreamSteps: ReadonlySet<string>;
  customId?: string;
  allowSuffix: boolean;
}

export interface PipelineBuildOptions {
  name: string;
  /** Suffix default for invocations without a custom ID (default: true) */
  allowSuffix?: boolean;
  /** Upload scope default for external artifacts */
  externalArtifactsDir?: string;
}

export interface FinalizedInvocation {
  readonly id: string;
  readonly stepName: string;
  readonly configuration: StepConfiguration;
  readonly upstreamSteps: readonly string[];
}

// ============================================================================
// Finalized graph
// ============================================================================

/**
 * Immutable result of a pipeline build, handed to the orchestrator.
 */
export class PipelineInvocationGraph {
  readonly invocations: readonly FinalizedInvocation[];
  private readonly byId: ReadonlyMap<string, FinalizedInvocation>;
  private readonly dag: InvocationDAG;

  constructor(readonly name: string, invocations: readonly FinalizedInvocation[]) {
    this.invocations = Object.freeze(invocations.map((invocation) => Object.freeze({
      ...invocation,
      upstreamSteps: Object.freeze([...invocation.upstreamSteps]),
    })));
    this.byId = new Map(this.invocations.map((invocation) => [invocation.id, invocation]));
    this.dag = InvocationDAG.fromUpstream(
      this.invocations.map((invocation) => ({ id: invocation.id, upstream: invocation.upstreamSteps })),
    );
    Object.freeze(this);
  }

  get ids(): string[] {
    return this.invocations.map((invocation) => invocation.id);
  }

  get(id: string): FinalizedInvocation | undefined {
    return this.byId.get(id);
  }

  topologicalOrder(): string[] {
    const order = this.dag.detectCycles();
    return order.hasCycle ? [] : order.topologicalOrder;
  }

  /** Invocations whose upstream invocations are all in `completed`. */
  readySteps(completed: Iterable<string> = []): string[] {
    return this.dag.getReadySteps(new Set(completed));
  }
}

// ============================================================================
// PipelineBuild
// ============================================================================

export class PipelineBuild implements InvocationLookup {
  /** Identifies artifacts produced by invocations of this build */
  readonly id = randomUUID();
  readonly name: string;
  readonly allowSuffix: boolean;
  readonly externalArtifactsDir: string;
  private readonly steps = new Map<string, StepInvocation>();
  private ended = false;

  constructor(options: PipelineBuildOptions) {
    this.name = options.name;
    this.allowSuffix = options.allowSuffix ?? DEFAULT_ENGINE_CONFIG.allowSuffix;
    this.externalArtifactsDir = options.externalArtifactsDir ?? DEFAULT_ENGINE_CONFIG.externalArtifactsDir;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  get invocations(): StepInvocation[] {
    return [...this.steps.values()];
  }

  getInvocation(id: string): StepInvocation | undefined {
    return this.steps.get(id);
  }

  invocationsOf(template: StepTemplate): StepInvocation[] {
    return this.invocations.filter((invocation) => invocation.template === template);
  }

  /**
   * Register an invocation and return its ID.
   *
   * Without a custom ID the template name is the base ID. A taken ID gets
   * the first free numeric suffix (`_2`, `_3`, ...) when suffixing is
   * allowed.
   *
   * @throws {DuplicateInvocationError} When the ID is taken and suffixing
   *   is not allowed
   * @throws {UnknownInvocationError} When an upstream ID is not registered
   * @throws {PipelineBuildError} When the build has ended or an input
   *   artifact belongs to another build
   */
  addInvocation(request: InvocationRequest): string {
    if (this.ended) {
      throw new PipelineBuildError(
        `Pipeline build "${this.name}" has ended; no more steps can be added.`,
      );
    }

    for (const [inputName, artifact] of Object.entries(request.inputArtifacts)) {
      if (artifact.buildId !== this.id) {
        throw new PipelineBuildError(
          `Input '${inputName}' of step '${request.template.name}' is an output ` +
          `of another pipeline build.`,
        );
      }
    }

    for (const upstream of request.upstreamSteps) {
      if (!this.steps.has(upstream)) {
        throw new UnknownInvocationError(upstream, `named as upstream of step '${request.template.name}'`);
      }
    }

    const invocationId = this.computeInvocationId(
      request.customId || request.template.name,
      request.allowSuffix,
    );

    this.steps.set(invocationId, new StepInvocation({
      id: invocationId,
      template: request.template,
      inputArtifacts: request.inputArtifacts,
      externalArtifacts: request.externalArtifacts,
      parameters: request.parameters,
      upstreamSteps: request.upstreamSteps,
    }, this));
    logger.debug(`Added invocation '${invocationId}' of step '${request.template.name}'.`);
    return invocationId;
  }

  private computeInvocationId(baseId: string, allowSuffix: boolean): string {
    if (!this.steps.has(baseId)) {
      return baseId;
    }
    if (!allowSuffix) {
      throw new DuplicateInvocationError(baseId);
    }
    let suffix = 2;
    while (this.steps.has(`${baseId}_${suffix}`)) {
      suffix++;
    }
    return `${baseId}_${suffix}`;
  }

  /** Stop accepting invocations. */
  end(): void {
    this.ended = true;
  }

  /**
   * End the build and finalize every invocation in registration order.
   *
   * Upstream resolution and cycle detection run before any invocation is
   * finalized, so an invalid graph uploads nothing.
   *
   * @throws {AmbiguousOrderingError} For ordering hints on templates
   *   invoked more than once
   * @throws {PipelineCycleError} When ordering hints close a cycle
   */
  async finalize(deps: FinalizationDeps): Promise<PipelineInvocationGraph> {
    this.end();

    const nodes = this.invocations.map((invocation) => ({
      id: invocation.id,
      upstream: [...invocation.upstreamSteps],
    }));
    const cycles = InvocationDAG.fromUpstream(nodes).detectCycles();
    if (cycles.hasCycle) {
      throw new PipelineCycleError(cycles.cycle);
    }

    const finalizationDeps: FinalizationDeps = {
      ...deps,
      externalArtifactsDir: deps.externalArtifactsDir ?? this.externalArtifactsDir,
    };

    const finalized: FinalizedInvocation[] = [];
    for (const [index, invocation] of this.invocations.entries()) {
      const configuration = await invocation.finalize(finalizationDeps);
      finalized.push({
        id: invocation.id,
        stepName: invocation.template.name,
        configuration,
        upstreamSteps: nodes[index]?.upstream ?? [],
      });
    }

    logger.info(`Finalized pipeline "${this.name}" with ${finalized.length} step(s).`);
    return new PipelineInvocationGraph(this.name, finalized);
  }
}
