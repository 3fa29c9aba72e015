/**
 * Barrel exports for the artifacts module.
 */

import { ExternalArtifact } from './external-artifact.js';
import { StepArtifact } from './step-artifact.js';

export { ArtifactRecordRequestSchema, ArtifactRecordSchema } from './collaborators.js';
export type {
  ArtifactRecordRequest,
  ArtifactRecord,
  ArtifactStore,
  MetadataStore,
  RunContext,
  FinalizationDeps,
} from './collaborators.js';

export { ExternalArtifact, StepArtifact };
export { fetchArtifactRecord } from './external-artifact.js';
export type { ExternalArtifactOptions, UploadDeps } from './external-artifact.js';

/** An in-graph or external artifact reference. */
export type ArtifactReference = StepArtifact | ExternalArtifact;

export function isArtifactReference(value: unknown): value is ArtifactReference {
  return value instanceof StepArtifact || value instanceof ExternalArtifact;
}
