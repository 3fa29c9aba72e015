/**
 * Layered configuration merging.
 *
 * `deep: false` replaces every field the update sets, mappings included.
 * `deep: true` replaces scalar fields and merges mapping fields key by key,
 * recursing into nested plain objects (per-output materializer entries merge
 * per output name, then per key inside the output). Arrays are values, not
 * mappings: they are replaced.
 *
 * The base is never modified; the result is a new frozen snapshot.
 */

import { isPlainObject } from '../signature/value-checker.js';
import { validateSettingKeys } from './setting-keys.js';
import {
  freezeSnapshot,
  parseConfigurationUpdate,
  type ConfigurationUpdate,
  type PartialArtifactConfiguration,
  type PartialStepConfiguration,
} from './step-configuration.js';

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export interface MergeOptions {
  deep: boolean;
}

/**
 * Recursively update a mapping. Keys of `update` win; nested plain objects
 * present on both sides are merged instead of replaced.
 */
export function recursiveUpdate(
  original: Readonly<Record<string, unknown>>,
  update: Readonly<Record<string, unknown>>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...original };
  for (const [key, value] of Object.entries(update)) {
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value)
      ? recursiveUpdate(existing, value)
      : value;
  }
  return result;
}

function mergeMapping<V>(
  base: Readonly<Record<string, V>>,
  update: Readonly<Record<string, V>> | undefined,
  deep: boolean,
  mergeValue: (existing: V, incoming: V) => V,
): Readonly<Record<string, V>> {
  if (update === undefined) {
    return { ...base };
  }
  if (!deep) {
    return { ...update };
  }
  const result: Record<string, V> = { ...base };
  for (const [key, value] of Object.entries(update)) {
    const existing = result[key];
    result[key] = existing === undefined ? value : mergeValue(existing, value);
  }
  return result;
}

function mergeUnknown(existing: unknown, incoming: unknown): unknown {
  return isPlainObject(existing) && isPlainObject(incoming)
    ? recursiveUpdate(existing, incoming)
    : incoming;
}

function mergeOutput(
  existing: PartialArtifactConfiguration,
  incoming: PartialArtifactConfiguration,
): PartialArtifactConfiguration {
  return incoming.materializerSource === undefined ? existing : { ...existing, ...incoming };
}

/**
 * Apply a configuration update to a base configuration.
 *
 * Works on partial and finalized configurations alike and always returns a
 * partial configuration; finalization is a separate step.
 *
 * @throws {UnknownSettingError} When the update holds unknown configuration
 *   keys or unknown setting keys
 */
export function mergeConfiguration(
  base: PartialStepConfiguration,
  patch: ConfigurationUpdate,
  options: MergeOptions,
): PartialStepConfiguration {
  const { deep } = options;
  const update = parseConfigurationUpdate(patch);
  if (update.settings) {
    validateSettingKeys(Object.keys(update.settings));
  }

  const merged: Mutable<PartialStepConfiguration> = {
    name: base.name,
    parameters: mergeMapping(base.parameters, update.parameters, deep, mergeUnknown),
    settings: mergeMapping(
      base.settings,
      update.settings,
      deep,
      (existing, incoming) => recursiveUpdate(existing, incoming),
    ),
    extra: mergeMapping(base.extra, update.extra, deep, mergeUnknown),
    outputs: mergeMapping(base.outputs, update.outputs, deep, mergeOutput),
  };

  const enableCache = update.enableCache ?? base.enableCache;
  if (enableCache !== undefined) merged.enableCache = enableCache;
  const enableArtifactMetadata = update.enableArtifactMetadata ?? base.enableArtifactMetadata;
  if (enableArtifactMetadata !== undefined) merged.enableArtifactMetadata = enableArtifactMetadata;
  const enableArtifactVisualization =
    update.enableArtifactVisualization ?? base.enableArtifactVisualization;
  if (enableArtifactVisualization !== undefined) {
    merged.enableArtifactVisualization = enableArtifactVisualization;
  }
  const experimentTracker = update.experimentTracker ?? base.experimentTracker;
  if (experimentTracker !== undefined) merged.experimentTracker = experimentTracker;
  const stepOperator = update.stepOperator ?? base.stepOperator;
  if (stepOperator !== undefined) merged.stepOperator = stepOperator;
  const failureHookSource = update.failureHookSource ?? base.failureHookSource;
  if (failureHookSource !== undefined) merged.failureHookSource = failureHookSource;
  const successHookSource = update.successHookSource ?? base.successHookSource;
  if (successHookSource !== undefined) merged.successHookSource = successHookSource;

  return freezeSnapshot(merged);
}
