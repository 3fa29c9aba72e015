/**
 * Scoped pipeline builds.
 *
 * `buildPipeline` owns the process-wide active build: it is set before the
 * connect function runs and cleared on every exit path, including failed
 * finalization. A second build while one is active is rejected.
 */

import type { FinalizationDeps } from '../artifacts/collaborators.js';
import { loadEngineConfig } from '../config/engine-config.js';
import { PipelineBuildError } from '../errors/step-graph-errors.js';
import { PipelineBuild, type PipelineInvocationGraph } from './pipeline-build.js';

/** Wires step invocations into a build. Must not suspend. */
export type ConnectFunction = (build: PipelineBuild) => void;

export interface BuildPipelineOptions {
  name: string;
  /** Suffix default for invocations without a custom ID (default: engine config) */
  allowSuffix?: boolean;
}

let activeBuild: PipelineBuild | null = null;

/** The build currently being constructed, if any. */
export function getActiveBuild(): PipelineBuild | null {
  return activeBuild;
}

/**
 * Run `connect` against a fresh build, then finalize it.
 *
 * @throws {PipelineBuildError} When another build is active or `connect`
 *   returns a promise
 */
export async function buildPipeline(
  options: BuildPipelineOptions,
  connect: ConnectFunction,
  deps: FinalizationDeps,
): Promise<PipelineInvocationGraph> {
  if (activeBuild) {
    throw new PipelineBuildError(
      `Cannot build pipeline "${options.name}" while pipeline "${activeBuild.name}" is being built.`,
    );
  }

  const config = loadEngineConfig();
  const build = new PipelineBuild({
    name: options.name,
    allowSuffix: options.allowSuffix ?? config.allowSuffix,
    externalArtifactsDir: config.externalArtifactsDir,
  });

  activeBuild = build;
  try {
    const result: unknown = connect(build);
    if (result instanceof Promise) {
      throw new PipelineBuildError(
        `The connect function of pipeline "${options.name}" must add its steps synchronously.`,
      );
    }
    build.end();
    return await build.finalize(deps);
  } finally {
    activeBuild = null;
  }
}

/**
 * A named pipeline definition that can be compiled repeatedly.
 */
export class Pipeline {
  constructor(
    readonly name: string,
    private readonly connect: ConnectFunction,
    private readonly options: Omit<BuildPipelineOptions, 'name'> = {},
  ) {}

  compile(deps: FinalizationDeps): Promise<PipelineInvocationGraph> {
    return buildPipeline({ ...this.options, name: this.name }, this.connect, deps);
  }
}

export function definePipeline(
  name: string,
  connect: ConnectFunction,
  options: Omit<BuildPipelineOptions, 'name'> = {},
): Pipeline {
  return new Pipeline(name, connect, options);
}
