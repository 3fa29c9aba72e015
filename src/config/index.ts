/**
 * Barrel exports for the config module.
 */

// Step configuration model
export {
  ArtifactConfigurationUpdateSchema,
  ConfigurationUpdateSchema,
  createPartialConfiguration,
  parseConfigurationUpdate,
} from './step-configuration.js';
export type {
  ConfigurationUpdate,
  PartialArtifactConfiguration,
  ArtifactConfiguration,
  PartialStepConfiguration,
  StepConfiguration,
} from './step-configuration.js';

// Merge
export { mergeConfiguration, recursiveUpdate } from './configuration-merge.js';
export type { MergeOptions } from './configuration-merge.js';

// Setting keys
export {
  GeneralSettingKeySchema,
  StackComponentTypeSchema,
  isGeneralSettingKey,
  isStackComponentSettingKey,
  isValidSettingKey,
  validateSettingKeys,
} from './setting-keys.js';
export type { StackComponentType } from './setting-keys.js';

// Engine config
export {
  EngineConfigSchema,
  EngineConfigError,
  DEFAULT_ENGINE_CONFIG,
  ENGINE_ENV_VARS,
  loadEngineConfig,
} from './engine-config.js';
export type { EngineConfig } from './engine-config.js';
