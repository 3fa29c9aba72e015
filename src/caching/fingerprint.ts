/**
 * Caching fingerprint for a step invocation.
 *
 * The fingerprint captures code identity only: the step implementation's
 * source and, per output, the sources of its resolved materializers in
 * resolution order. Parameter values and upstream artifacts are combined
 * with it by the orchestrator, outside this module.
 */

import { createHash } from 'crypto';
import { loadMaterializer } from '../materializers/materializer-resolver.js';
import type { MaterializerRegistry } from '../materializers/materializer-registry.js';

/** Fingerprint key holding the hash of the step implementation source. */
export const STEP_SOURCE_PARAMETER_NAME = 'step_source';

/** Suffix of the per-output materializer fingerprint keys. */
export const MATERIALIZER_SOURCE_SUFFIX = '_materializer_source';

/** A function or class whose source text identifies it. */
export type SourceObject =
  | ((...args: never[]) => unknown)
  | (abstract new (...args: never[]) => unknown);

/**
 * Hash the source text of a function or class.
 *
 * Functions and classes are hashed through `toString()`, which returns
 * their source text as written.
 */
export function hashSourceCode(source: string | SourceObject): string {
  const text = typeof source === 'string' ? source : source.toString();
  return createHash('sha256').update(text).digest('hex');
}

export interface FingerprintRequest {
  /** Step implementation source text */
  stepSource: string;
  /** Output name → resolved materializer identifiers, in resolution order */
  outputs: Readonly<Record<string, { readonly materializerSource?: readonly string[] }>>;
  registry: MaterializerRegistry;
}

/**
 * Compute the caching parameters for a step.
 *
 * The mapping always starts with `step_source`, followed by one
 * `<output>_materializer_source` entry per output that has at least one
 * materializer, in output order.
 *
 * @throws {MaterializerNotFoundError} When a materializer identifier cannot
 *   be loaded
 */
export function computeCachingParameters(request: FingerprintRequest): Record<string, string> {
  const parameters: Record<string, string> = {
    [STEP_SOURCE_PARAMETER_NAME]: hashSourceCode(request.stepSource),
  };

  for (const [name, output] of Object.entries(request.outputs)) {
    const sources = output.materializerSource ?? [];
    if (sources.length === 0) continue;

    const hash = createHash('sha256');
    for (const source of sources) {
      const materializer = loadMaterializer(source, request.registry);
      hash.update(hashSourceCode(materializer));
    }
    parameters[`${name}${MATERIALIZER_SOURCE_SUFFIX}`] = hash.digest('hex');
  }

  return parameters;
}
