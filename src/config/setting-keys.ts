/**
 * Setting-key namespace.
 *
 * A settings key is either a general key that applies to every step, or a
 * stack-component key `<component>.<flavor>` addressing one component
 * flavor, e.g. `orchestrator.kubernetes` or `step_operator.sagemaker`.
 */

import { z } from 'zod';
import { UnknownSettingError } from '../errors/step-graph-errors.js';

export const GeneralSettingKeySchema = z.enum(['docker', 'resources']);

export const StackComponentTypeSchema = z.enum([
  'orchestrator',
  'step_operator',
  'experiment_tracker',
  'artifact_store',
  'container_registry',
  'data_validator',
  'model_deployer',
  'alerter',
  'annotator',
  'feature_store',
  'image_builder',
  'model_registry',
]);

export type StackComponentType = z.infer<typeof StackComponentTypeSchema>;

const FLAVOR_PATTERN = /^[a-z][a-z0-9_]*$/;

export function isGeneralSettingKey(key: string): boolean {
  return GeneralSettingKeySchema.safeParse(key).success;
}

export function isStackComponentSettingKey(key: string): boolean {
  const parts = key.split('.');
  if (parts.length !== 2) return false;
  const [component, flavor] = parts;
  return StackComponentTypeSchema.safeParse(component).success && FLAVOR_PATTERN.test(flavor);
}

export function isValidSettingKey(key: string): boolean {
  return isGeneralSettingKey(key) || isStackComponentSettingKey(key);
}

/**
 * @throws {UnknownSettingError} Naming every invalid key
 */
export function validateSettingKeys(keys: readonly string[]): void {
  const invalid = keys.filter((key) => !isValidSettingKey(key));
  if (invalid.length > 0) {
    throw new UnknownSettingError(
      invalid,
      `Invalid setting keys: ${invalid.join(', ')}. Settings keys must be one of ` +
      `[${GeneralSettingKeySchema.options.join(', ')}] or have the form ` +
      '`<component_type>.<flavor>`.',
    );
  }
}
