/**
 * Mermaid graph renderer for finalized pipelines.
 *
 * Pure function that generates Mermaid graph TD syntax from a
 * PipelineInvocationGraph.
 */

import type { PipelineInvocationGraph } from './pipeline-build.js';

const PLAIN_NODE_ID = /^[A-Za-z0-9_]+$/;

/**
 * Mermaid reference for an invocation. IDs outside `[A-Za-z0-9_]`, and the
 * keyword `end`, get a positional node key and the ID as quoted label.
 */
function nodeRef(id: string, index: number): string {
  if (PLAIN_NODE_ID.test(id) && id.toLowerCase() !== 'end') {
    return id;
  }
  const label = id.replace(/"/g, '#quot;');
  return `invocation_${index}["${label}"]`;
}

/**
 * Render a Mermaid graph TD diagram of a pipeline.
 *
 * - Upstream relations as `upstream --> invocation` edges, in topological
 *   order of the downstream invocation
 * - Invocations without any edge as isolated nodes
 *
 * @returns Mermaid-formatted string
 */
export function renderInvocationGraph(graph: PipelineInvocationGraph): string {
  const lines: string[] = ['graph TD'];

  if (graph.invocations.length === 0) {
    lines.push('  %% No steps found');
    return lines.join('\n');
  }

  const refs = new Map(graph.invocations.map((invocation, index) => [invocation.id, nodeRef(invocation.id, index)]));
  const ref = (id: string): string => refs.get(id) ?? nodeRef(id, refs.size);

  const connected = new Set<string>();
  const edges: string[] = [];
  for (const id of graph.topologicalOrder()) {
    for (const upstream of graph.get(id)?.upstreamSteps ?? []) {
      edges.push(`  ${ref(upstream)} --> ${ref(id)}`);
      connected.add(upstream);
      connected.add(id);
    }
  }

  if (edges.length > 0) {
    lines.push('  %% Step dependencies');
    lines.push(...edges);
  }

  for (const invocation of graph.invocations) {
    if (!connected.has(invocation.id)) {
      lines.push(`  ${ref(invocation.id)}`);
    }
  }

  return lines.join('\n');
}
