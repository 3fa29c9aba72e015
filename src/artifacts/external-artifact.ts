/**
 * External artifact reference: a value supplied from outside the graph, or
 * the identifier of an artifact that already exists in the metadata store.
 *
 * A value-backed reference is uploaded the first time its invocation is
 * finalized (pending → resolved) and only references the stored artifact
 * afterwards. An identifier-backed reference is checked once against the
 * active artifact store. Both transitions happen at most once, including
 * when finalization is requested concurrently.
 */

import { randomUUID } from 'crypto';
import {
  ArtifactStoreMismatchError,
  ArtifactUriConflictError,
  InvalidExternalArtifactError,
  MaterializerNotFoundError,
} from '../errors/step-graph-errors.js';
import { getLogger } from '../logging/logger.js';
import { loadMaterializer } from '../materializers/materializer-resolver.js';
import type { MaterializerRegistry } from '../materializers/materializer-registry.js';
import { isMaterializerClass, type MaterializerClass, type MaterializerSpecifier } from '../materializers/types.js';
import { isAssignable, matchesType } from '../signature/value-checker.js';
import { ANY, typeFromKey, typeKey, typeOfValue, type DeclaredType } from '../types/declared-type.js';
import { ArtifactRecordSchema, type ArtifactRecord, type ArtifactStore, type MetadataStore, type RunContext } from './collaborators.js';

const logger = getLogger('external-artifact');

export interface ExternalArtifactOptions {
  value?: unknown;
  id?: string;
  materializer?: MaterializerSpecifier;
  skipTypeChecking?: boolean;
}

export interface UploadDeps {
  artifactStore: ArtifactStore;
  metadataStore: MetadataStore;
  runContext: RunContext;
  registry: MaterializerRegistry;
  externalArtifactsDir: string;
}

type ExternalArtifactState =
  | { status: 'pending'; value: unknown }
  | { status: 'resolved'; id: string; verified: boolean; dataType?: DeclaredType };

/**
 * Read and validate an artifact record from the metadata store.
 */
export async function fetchArtifactRecord(
  metadataStore: MetadataStore,
  id: string,
): Promise<ArtifactRecord> {
  const raw = await metadataStore.getArtifactRecord(id);
  const result = ArtifactRecordSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidExternalArtifactError(
      `Metadata store returned an invalid record for artifact "${id}":\n${errors.join('\n')}`,
    );
  }
  return result.data;
}

export class ExternalArtifact {
  readonly kind = 'external' as const;
  readonly materializer: MaterializerSpecifier | undefined;
  readonly skipTypeChecking: boolean;
  private state: ExternalArtifactState;
  private inflight: Promise<string> | null = null;
  private record: ArtifactRecord | null = null;

  /**
   * @throws {InvalidExternalArtifactError} Unless exactly one of `value`
   *   and `id` is given
   */
  constructor(options: ExternalArtifactOptions) {
    const hasValue = options.value !== undefined;
    const hasId = options.id !== undefined;
    if (hasValue && hasId) {
      throw new InvalidExternalArtifactError('Only a value or an ID is allowed for an external artifact.');
    }
    if (!hasValue && !hasId) {
      throw new InvalidExternalArtifactError('Either a value or an ID is required for an external artifact.');
    }

    this.state = options.id !== undefined
      ? { status: 'resolved', id: options.id, verified: false }
      : { status: 'pending', value: options.value };
    this.materializer = options.materializer;
    this.skipTypeChecking = options.skipTypeChecking ?? false;
  }

  /** Identifier of the referenced artifact, once known. */
  get id(): string | undefined {
    return this.state.status === 'resolved' ? this.state.id : undefined;
  }

  get isResolved(): boolean {
    return this.state.status === 'resolved';
  }

  /**
   * Data type of the referenced artifact, used for input type checks.
   *
   * The metadata store is read at most once per reference; an uploaded
   * value keeps the type it was recorded with.
   */
  async resolveType(metadataStore: MetadataStore): Promise<DeclaredType> {
    if (this.skipTypeChecking) {
      return ANY;
    }
    const state = this.state;
    if (state.status === 'pending') {
      return typeOfValue(state.value);
    }
    if (state.dataType) {
      return state.dataType;
    }
    const record = await this.loadRecord(metadataStore, state.id);
    return typeFromKey(record.dataType);
  }

  /**
   * Whether the referenced data fits an input of type `target`. A pending
   * value is checked against the type itself, so guards of named types
   * apply.
   */
  async fitsType(target: DeclaredType, metadataStore: MetadataStore): Promise<boolean> {
    if (this.skipTypeChecking) {
      return true;
    }
    if (this.state.status === 'pending') {
      return matchesType(target, this.state.value);
    }
    return isAssignable(await this.resolveType(metadataStore), target);
  }

  /**
   * Resolve this reference to an artifact identifier.
   *
   * Pending: persist the value through its materializer, register the
   * artifact and switch to the new identifier. Resolved: verify once that
   * the artifact belongs to the active artifact store. Later calls return
   * the identifier without touching any collaborator.
   *
   * @throws {MaterializerNotFoundError} When no materializer handles the value
   * @throws {ArtifactStoreMismatchError} When a referenced artifact lives in
   *   another artifact store
   */
  upload(deps: UploadDeps): Promise<string> {
    if (this.state.status === 'resolved' && this.state.verified) {
      return Promise.resolve(this.state.id);
    }
    if (!this.inflight) {
      this.inflight = this.transition(deps).finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async transition(deps: UploadDeps): Promise<string> {
    const state = this.state;

    if (state.status === 'resolved') {
      const record = await this.loadRecord(deps.metadataStore, state.id);
      if (record.artifactStoreId !== deps.runContext.artifactStoreId) {
        throw new ArtifactStoreMismatchError(
          state.id,
          deps.runContext.artifactStoreId,
          record.artifactStoreId,
        );
      }
      this.state = {
        status: 'resolved',
        id: state.id,
        verified: true,
        dataType: state.dataType ?? typeFromKey(record.dataType),
      };
      return state.id;
    }

    logger.info('Uploading external artifact.');
    const materializerClass = this.getMaterializer(state.value, deps.registry);
    const { artifactStore, metadataStore, runContext } = deps;

    const artifactName = `external_${randomUUID()}`;
    const uri = await artifactStore.allocateLocation(deps.externalArtifactsDir, artifactName);
    if (await artifactStore.exists(uri)) {
      throw new ArtifactUriConflictError(uri);
    }
    await artifactStore.makeDirectory(uri);

    const materializer = new materializerClass(uri);
    await materializer.save(state.value);

    const dataType = typeOfValue(state.value);
    const id = await metadataStore.createArtifactRecord({
      name: artifactName,
      type: materializerClass.artifactType,
      uri,
      materializer: materializerClass.identifier,
      dataType: typeKey(dataType),
      user: runContext.userId,
      workspace: runContext.workspaceId,
      artifactStoreId: runContext.artifactStoreId,
    });

    // The stored artifact replaces the value so later finalizations do not upload again
    this.state = { status: 'resolved', id, verified: true, dataType };
    return id;
  }

  private async loadRecord(metadataStore: MetadataStore, id: string): Promise<ArtifactRecord> {
    if (this.record && this.record.id === id) {
      return this.record;
    }
    const record = await fetchArtifactRecord(metadataStore, id);
    this.record = record;
    return record;
  }

  private getMaterializer(value: unknown, registry: MaterializerRegistry): MaterializerClass {
    if (this.materializer !== undefined) {
      if (typeof this.materializer === 'string') {
        return loadMaterializer(this.materializer, registry);
      }
      if (isMaterializerClass(this.materializer)) {
        return this.materializer;
      }
    }

    const valueType = typeOfValue(value);
    const materializer = registry.lookup(valueType);
    if (!materializer) {
      const description = typeKey(valueType);
      throw new MaterializerNotFoundError(
        `Unable to find materializer for type \`${description}\`. Either set a ` +
        'materializer for the external artifact with ' +
        '`new ExternalArtifact({ value, materializer })` or register a default ' +
        'materializer for the type.',
        description,
      );
    }
    return materializer;
  }
}
