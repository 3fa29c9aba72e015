/**
 * In-process collaborators for tests.
 *
 * The artifact store and metadata store keep everything in memory and
 * record every call, so tests can assert how often the engine touched
 * them. Materializer classes come from a factory so each test gets its own
 * list of saved values.
 */

import type {
  ArtifactRecord,
  ArtifactRecordRequest,
  ArtifactStore,
  FinalizationDeps,
  MetadataStore,
  RunContext,
} from '../artifacts/collaborators.js';
import { MaterializerRegistry } from '../materializers/materializer-registry.js';
import type { MaterializerClass } from '../materializers/types.js';

export interface RecordedCall {
  method: string;
  args: unknown[];
}

export const RUN_CONTEXT: RunContext = {
  userId: 'user-1',
  workspaceId: 'workspace-1',
  artifactStoreId: 'store-1',
};

// ============================================================================
// Stores
// ============================================================================

export class InMemoryArtifactStore implements ArtifactStore {
  readonly calls: RecordedCall[] = [];
  readonly directories = new Set<string>();

  constructor(readonly root = 'memory://artifacts') {}

  allocateLocation(scope: string, name: string): Promise<string> {
    this.calls.push({ method: 'allocateLocation', args: [scope, name] });
    return Promise.resolve(`${this.root}/${scope}/${name}`);
  }

  exists(uri: string): Promise<boolean> {
    this.calls.push({ method: 'exists', args: [uri] });
    return Promise.resolve(this.directories.has(uri));
  }

  makeDirectory(uri: string): Promise<void> {
    this.calls.push({ method: 'makeDirectory', args: [uri] });
    this.directories.add(uri);
    return Promise.resolve();
  }

  count(method: string): number {
    return this.calls.filter((call) => call.method === method).length;
  }
}

export class InMemoryMetadataStore implements MetadataStore {
  readonly calls: RecordedCall[] = [];
  readonly records = new Map<string, ArtifactRecord>();
  private nextId = 1;

  createArtifactRecord(record: ArtifactRecordRequest): Promise<string> {
    this.calls.push({ method: 'createArtifactRecord', args: [record] });
    const id = `artifact-${this.nextId++}`;
    this.records.set(id, { ...record, id });
    return Promise.resolve(id);
  }

  getArtifactRecord(id: string): Promise<unknown> {
    this.calls.push({ method: 'getArtifactRecord', args: [id] });
    const record = this.records.get(id);
    if (!record) {
      return Promise.reject(new Error(`Unknown artifact ${id}`));
    }
    return Promise.resolve(record);
  }

  /** Store a record as if another run had created it. */
  seed(record: ArtifactRecord): void {
    this.records.set(record.id, record);
  }

  count(method: string): number {
    return this.calls.filter((call) => call.method === method).length;
  }
}

// ============================================================================
// Materializers
// ============================================================================

export interface SavedValue {
  uri: string;
  data: unknown;
}

export interface TestMaterializerClass extends MaterializerClass {
  readonly saved: SavedValue[];
}

export function createMaterializer(
  identifier: string,
  associatedTypes: readonly string[],
  artifactType = 'data',
): TestMaterializerClass {
  const saved: SavedValue[] = [];
  return class TestMaterializer {
    static readonly identifier = identifier;
    static readonly associatedTypes = associatedTypes;
    static readonly artifactType = artifactType;
    static readonly saved = saved;

    constructor(readonly uri: string) {}

    save(data: unknown): Promise<void> {
      saved.push({ uri: this.uri, data });
      return Promise.resolve();
    }
  };
}

export interface TestEnvironment {
  registry: MaterializerRegistry;
  artifactStore: InMemoryArtifactStore;
  metadataStore: InMemoryMetadataStore;
  materializers: {
    string: TestMaterializerClass;
    number: TestMaterializerClass;
    object: TestMaterializerClass;
    none: TestMaterializerClass;
  };
  deps: FinalizationDeps;
}

/**
 * Fresh registry with materializers for `string`, `number`, `object`,
 * `array` and `null`, plus empty stores.
 */
export function createTestEnvironment(): TestEnvironment {
  const registry = new MaterializerRegistry();
  const materializers = {
    string: createMaterializer('test.StringMaterializer', ['string']),
    number: createMaterializer('test.NumberMaterializer', ['number']),
    object: createMaterializer('test.JsonMaterializer', ['object', 'array']),
    none: createMaterializer('test.NoneMaterializer', ['null']),
  };
  for (const materializer of Object.values(materializers)) {
    registry.register(materializer);
  }

  const artifactStore = new InMemoryArtifactStore();
  const metadataStore = new InMemoryMetadataStore();
  return {
    registry,
    artifactStore,
    metadataStore,
    materializers,
    deps: { artifactStore, metadataStore, runContext: RUN_CONTEXT, registry },
  };
}
