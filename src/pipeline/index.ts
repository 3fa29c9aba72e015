/**
 * Barrel exports for the pipeline module.
 *
 * Graph construction (PipelineBuild, StepInvocation), the scoped build
 * entry points, the finalized graph handed to orchestrators and its
 * Mermaid rendering.
 */

// Build
export { PipelineBuild, PipelineInvocationGraph } from './pipeline-build.js';
export type {
  InvocationRequest,
  PipelineBuildOptions,
  FinalizedInvocation,
} from './pipeline-build.js';

// Invocations
export { StepInvocation } from './step-invocation.js';
export type { InvocationLookup, StepInvocationInit } from './step-invocation.js';

// DAG
export { InvocationDAG } from './invocation-dag.js';
export type { InvocationNode, InvocationOrder } from './invocation-dag.js';

// Scoped builds
export { buildPipeline, definePipeline, getActiveBuild, Pipeline } from './pipeline.js';
export type { BuildPipelineOptions, ConnectFunction } from './pipeline.js';

// Rendering
export { renderInvocationGraph } from './graph-renderer.js';
