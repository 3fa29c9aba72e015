/**
 * Materializer contract as seen by the step graph engine.
 *
 * A materializer is a class: its static fields identify it and list the
 * data types it handles, and an instance bound to a storage URI persists a
 * value. Serialization formats belong to the implementations, not here.
 */

export interface Materializer {
  save(data: unknown): Promise<void>;
}

export interface MaterializerClass {
  new (uri: string): Materializer;
  /** Stable source identifier, e.g. `materializers.json.JsonMaterializer` */
  readonly identifier: string;
  /** Type keys this materializer handles by default */
  readonly associatedTypes: readonly string[];
  /** Artifact kind recorded in the metadata store, e.g. `data` or `model` */
  readonly artifactType: string;
}

/** An explicit materializer: a class, or the identifier of a known one. */
export type MaterializerSpecifier = string | MaterializerClass;

/**
 * Check whether a value has the shape of a materializer class.
 */
export function isMaterializerClass(value: unknown): value is MaterializerClass {
  if (typeof value !== 'function') return false;
  const identifier: unknown = Reflect.get(value, 'identifier');
  const associatedTypes: unknown = Reflect.get(value, 'associatedTypes');
  const artifactType: unknown = Reflect.get(value, 'artifactType');
  const prototype: unknown = Reflect.get(value, 'prototype');
  return (
    typeof identifier === 'string' &&
    identifier.length > 0 &&
    Array.isArray(associatedTypes) &&
    associatedTypes.every((type) => typeof type === 'string') &&
    typeof artifactType === 'string' &&
    typeof prototype === 'object' &&
    prototype !== null &&
    typeof Reflect.get(prototype, 'save') === 'function'
  );
}
