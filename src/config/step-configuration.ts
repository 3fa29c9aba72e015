/**
 * Step configuration model.
 *
 * Defines the shapes a step's configuration passes through:
 * - PartialStepConfiguration: what a step template carries while it is
 *   being declared and configured
 * - ConfigurationUpdate: a patch consumed by a single merge (Zod-validated;
 *   unknown keys are rejected)
 * - StepConfiguration: the finalized snapshot handed to the orchestrator
 *
 * All configurations are frozen snapshots; updates produce new objects.
 */

import { z } from 'zod';
import { StepInterfaceError, UnknownSettingError } from '../errors/step-graph-errors.js';
import type { JsonValue } from '../signature/value-checker.js';

// ============================================================================
// ConfigurationUpdate
// ============================================================================

export const ArtifactConfigurationUpdateSchema = z.object({
  materializerSource: z.array(z.string()).readonly().optional(),
}).strict();

/**
 * Schema for a configuration patch.
 *
 * Strict: a key outside this set is an unknown setting, not a field to
 * carry along.
 */
export const ConfigurationUpdateSchema = z.object({
  enableCache: z.boolean().optional(),
  enableArtifactMetadata: z.boolean().optional(),
  enableArtifactVisualization: z.boolean().optional(),
  experimentTracker: z.string().optional(),
  stepOperator: z.string().optional(),
  parameters: z.record(z.string(), z.unknown()).optional(),
  settings: z.record(z.string(), z.record(z.string(), z.unknown())).optional(),
  extra: z.record(z.string(), z.unknown()).optional(),
  outputs: z.record(z.string(), ArtifactConfigurationUpdateSchema).optional(),
  failureHookSource: z.string().optional(),
  successHookSource: z.string().optional(),
}).strict();

export type ConfigurationUpdate = z.infer<typeof ConfigurationUpdateSchema>;

// ============================================================================
// Step configurations
// ============================================================================

export interface PartialArtifactConfiguration {
  readonly materializerSource?: readonly string[];
}

export interface ArtifactConfiguration {
  readonly materializerSource: readonly string[];
}

export interface PartialStepConfiguration {
  readonly name: string;
  readonly enableCache?: boolean;
  readonly enableArtifactMetadata?: boolean;
  readonly enableArtifactVisualization?: boolean;
  readonly experimentTracker?: string;
  readonly stepOperator?: string;
  readonly parameters: Readonly<Record<string, unknown>>;
  readonly settings: Readonly<Record<string, Readonly<Record<string, unknown>>>>;
  readonly extra: Readonly<Record<string, unknown>>;
  readonly outputs: Readonly<Record<string, PartialArtifactConfiguration>>;
  readonly failureHookSource?: string;
  readonly successHookSource?: string;
}

export interface StepConfiguration extends PartialStepConfiguration {
  readonly parameters: Readonly<Record<string, JsonValue>>;
  readonly outputs: Readonly<Record<string, ArtifactConfiguration>>;
  /** Caching fingerprint material, in a stable key order */
  readonly cachingParameters: Readonly<Record<string, string>>;
  /** Input name → identifier of the external artifact bound to it */
  readonly externalInputArtifacts: Readonly<Record<string, string>>;
}

/**
 * Empty configuration for a newly declared step.
 */
export function createPartialConfiguration(
  name: string,
  flags: Pick<PartialStepConfiguration, 'enableCache' | 'enableArtifactMetadata' | 'enableArtifactVisualization'> = {},
): PartialStepConfiguration {
  return freezeSnapshot({
    name,
    ...(flags.enableCache !== undefined ? { enableCache: flags.enableCache } : {}),
    ...(flags.enableArtifactMetadata !== undefined
      ? { enableArtifactMetadata: flags.enableArtifactMetadata }
      : {}),
    ...(flags.enableArtifactVisualization !== undefined
      ? { enableArtifactVisualization: flags.enableArtifactVisualization }
      : {}),
    parameters: {},
    settings: {},
    extra: {},
    outputs: {},
  });
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Validate a raw configuration patch.
 *
 * @throws {UnknownSettingError} When the patch holds keys outside the
 *   configuration model
 * @throws {StepInterfaceError} When a known key holds a value of the wrong
 *   shape
 */
export function parseConfigurationUpdate(raw: unknown): ConfigurationUpdate {
  const result = ConfigurationUpdateSchema.safeParse(raw);
  if (result.success) {
    return copyUpdate(result.data);
  }

  const unknownKeys: string[] = [];
  for (const issue of result.error.issues) {
    if (issue.code === 'unrecognized_keys') {
      const prefix = issue.path.length > 0 ? `${issue.path.join('.')}.` : '';
      unknownKeys.push(...issue.keys.map((key) => `${prefix}${key}`));
    }
  }
  if (unknownKeys.length > 0) {
    throw new UnknownSettingError(unknownKeys);
  }

  const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  throw new StepInterfaceError(`Invalid configuration update:\n${errors.join('\n')}`);
}

/**
 * Detach an update from caller-owned nested values.
 */
function copyUpdate(update: ConfigurationUpdate): ConfigurationUpdate {
  const copy: ConfigurationUpdate = { ...update };
  if (update.parameters) copy.parameters = copyRecord(update.parameters);
  if (update.extra) copy.extra = copyRecord(update.extra);
  if (update.settings) {
    const settings: Record<string, Record<string, unknown>> = {};
    for (const [key, value] of Object.entries(update.settings)) {
      settings[key] = copyRecord(value);
    }
    copy.settings = settings;
  }
  if (update.outputs) {
    const outputs: Record<string, PartialArtifactConfiguration> = {};
    for (const [name, output] of Object.entries(update.outputs)) {
      outputs[name] = output.materializerSource
        ? { materializerSource: [...output.materializerSource] }
        : {};
    }
    copy.outputs = outputs;
  }
  return copy;
}

// ============================================================================
// Snapshot helpers
// ============================================================================

function isContainer(value: unknown): value is Record<string, unknown> | unknown[] {
  if (Array.isArray(value)) return true;
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Copy plain objects and arrays recursively. Class instances and other
 * values are kept by reference.
 */
export function copyPlain(value: unknown): unknown {
  if (!isContainer(value)) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(copyPlain);
  }
  const copy: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    copy[key] = copyPlain(item);
  }
  return copy;
}

/**
 * Copy every value of a mapping with copyPlain.
 */
export function copyRecord(record: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const copy: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(record)) {
    copy[key] = copyPlain(item);
  }
  return copy;
}

/**
 * Freeze plain objects and arrays recursively, in place.
 *
 * Only call this on objects the engine built itself (merge results and
 * finalized configurations), never on caller-owned values.
 */
export function freezeSnapshot<T>(value: T): T {
  if (isContainer(value) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) {
      freezeSnapshot(item);
    }
  }
  return value;
}
