/**
 * Interfaces of the collaborators the engine talks to while finalizing a
 * pipeline: the artifact store, the metadata store and the active run
 * context. Implementations live outside this package.
 *
 * Artifact records coming back from a metadata store are validated with a
 * Zod schema (passthrough, so stores may return extra fields).
 */

import { z } from 'zod';
import type { MaterializerRegistry } from '../materializers/materializer-registry.js';

// ============================================================================
// Artifact records
// ============================================================================

export const ArtifactRecordRequestSchema = z.object({
  name: z.string(),
  /** Artifact kind reported by the materializer */
  type: z.string(),
  uri: z.string(),
  /** Materializer source identifier */
  materializer: z.string(),
  /** Type key of the stored value */
  dataType: z.string(),
  user: z.string(),
  workspace: z.string(),
  artifactStoreId: z.string(),
}).passthrough();

export const ArtifactRecordSchema = ArtifactRecordRequestSchema.extend({
  id: z.string(),
}).passthrough();

export type ArtifactRecordRequest = z.infer<typeof ArtifactRecordRequestSchema>;
export type ArtifactRecord = z.infer<typeof ArtifactRecordSchema>;

// ============================================================================
// Collaborators
// ============================================================================

export interface ArtifactStore {
  /** Location for a new artifact `name` inside `scope` */
  allocateLocation(scope: string, name: string): Promise<string>;
  exists(uri: string): Promise<boolean>;
  makeDirectory(uri: string): Promise<void>;
}

export interface MetadataStore {
  /** Persist a new artifact record and return its identifier */
  createArtifactRecord(record: ArtifactRecordRequest): Promise<string>;
  getArtifactRecord(id: string): Promise<unknown>;
}

/** Identifiers of the active user, workspace and artifact store. */
export interface RunContext {
  userId: string;
  workspaceId: string;
  artifactStoreId: string;
}

/**
 * Everything finalization needs beyond the graph itself.
 */
export interface FinalizationDeps {
  artifactStore: ArtifactStore;
  metadataStore: MetadataStore;
  runContext: RunContext;
  /** Default: the process-wide materializer registry */
  registry?: MaterializerRegistry;
  /** Artifact-store scope for uploads. Default: engine config value */
  externalArtifactsDir?: string;
}
