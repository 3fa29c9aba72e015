/**
 * Binding of call arguments for a step invoked inside a pipeline build.
 *
 * Arguments are keyed by input name. Each bound value is classified as an
 * in-graph artifact, an external artifact or a parameter. Only values the
 * caller passed are bound: declared defaults are applied at finalization,
 * to inputs that are still unbound, so they never displace parameters set
 * through `configure()`. A value for the parameter object is checked
 * against its schema and bound as a parameter under its name.
 */

import { ExternalArtifact } from '../artifacts/external-artifact.js';
import { StepArtifact } from '../artifacts/step-artifact.js';
import { StepInterfaceError } from '../errors/step-graph-errors.js';
import { getLogger } from '../logging/logger.js';
import type { StepInterface } from '../signature/signature-analyzer.js';
import { validateParameterValue } from '../signature/value-checker.js';

const logger = getLogger('step-call');

export type StepArgs = Readonly<Record<string, unknown>>;

export interface BoundCallArguments {
  inputArtifacts: Record<string, StepArtifact>;
  externalArtifacts: Record<string, ExternalArtifact>;
  parameters: Record<string, unknown>;
}

/**
 * @throws {StepInterfaceError} On an argument that names no declared input
 * @throws {InputValidationError} On a parameter value that does not fit its
 *   input
 */
export function bindCallArguments(
  stepName: string,
  stepInterface: StepInterface,
  configuredParameters: Readonly<Record<string, unknown>>,
  args: StepArgs,
): BoundCallArguments {
  const legacy = stepInterface.legacyParameter;
  const unexpected = Object.keys(args).filter(
    (key) => !Object.prototype.hasOwnProperty.call(stepInterface.inputs, key) && key !== legacy?.name,
  );
  if (unexpected.length > 0) {
    throw new StepInterfaceError(
      `Wrong arguments when calling step '${stepName}': unexpected input(s) ` +
      `${unexpected.map((key) => `'${key}'`).join(', ')}.`,
    );
  }

  const bound: BoundCallArguments = { inputArtifacts: {}, externalArtifacts: {}, parameters: {} };

  for (const input of Object.values(stepInterface.inputs)) {
    const value = args[input.name];
    if (value === undefined) continue;

    if (value instanceof StepArtifact) {
      bound.inputArtifacts[input.name] = value;
      if (Object.prototype.hasOwnProperty.call(configuredParameters, input.name)) {
        logger.warn(
          `Got duplicate value for step input ${input.name}, using value provided as artifact.`,
        );
      }
    } else if (value instanceof ExternalArtifact) {
      bound.externalArtifacts[input.name] = value;
      if (!value.isResolved) {
        logger.warn(
          'Using an external artifact as step input currently invalidates caching ' +
          'for the step and all downstream steps.',
        );
      }
    } else {
      validateParameterValue(stepName, input, value);
      bound.parameters[input.name] = value;
    }
  }

  const legacyValue = legacy ? args[legacy.name] : undefined;
  if (legacy && legacyValue !== undefined) {
    const result = legacy.schema.safeParse(legacyValue);
    if (!result.success) {
      const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new StepInterfaceError(
        `Invalid parameters '${legacy.name}' when calling step '${stepName}':\n${errors.join('\n')}`,
      );
    }
    bound.parameters[legacy.name] = result.data;
  }

  return bound;
}
