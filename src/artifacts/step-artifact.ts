/**
 * In-graph artifact reference: one declared output of one invocation in a
 * pipeline build. Returned when a step is invoked inside a build and passed
 * as an input to later invocations.
 */

import type { DeclaredType } from '../types/declared-type.js';

export class StepArtifact {
  readonly kind = 'in-graph' as const;

  constructor(
    readonly buildId: string,
    readonly invocationId: string,
    readonly outputName: string,
    readonly type: DeclaredType,
  ) {
    Object.freeze(this);
  }
}
