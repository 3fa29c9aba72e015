/**
 * Barrel exports for the steps module.
 */

export { StepTemplate, defineStep } from './step-template.js';
export type {
  HookSpecifier,
  OutputMaterializers,
  OutputMaterializerValue,
  StepConfigureOptions,
  ConfigureBehavior,
  StepEntrypoint,
  StepDefinition,
  InvokeOptions,
  InvocationTarget,
  StepInvocationHandle,
  ConfigurationFinalizationRequest,
} from './step-template.js';

export { bindCallArguments } from './call-arguments.js';
export type { StepArgs, BoundCallArguments } from './call-arguments.js';

export { finalizeLegacyParameters, finalizeParameters, isPassthroughSchema } from './parameters.js';
