/**
 * Parameter finalization for step configurations.
 *
 * Parameters bound to declared inputs are kept as they are; the legacy
 * parameter object is assembled field by field from the configured
 * parameters, the nested mapping under the parameter object's name and the
 * schema defaults, then validated through its Zod schema. A passthrough
 * schema also receives every other configured parameter.
 */

import type { AnyZodObject, ZodTypeAny } from 'zod';
import {
  InputValidationError,
  MissingStepParameterError,
  StepInterfaceError,
} from '../errors/step-graph-errors.js';
import type { InputDescriptor, LegacyParameter, StepInterface } from '../signature/signature-analyzer.js';
import { isJsonValue, isPlainObject, type JsonValue } from '../signature/value-checker.js';
import { copyPlain } from '../config/step-configuration.js';

function hasOwn(record: Readonly<Record<string, unknown>>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

export function isPassthroughSchema(schema: AnyZodObject): boolean {
  return schema._def.unknownKeys === 'passthrough';
}

/**
 * Collect and validate the values of a legacy parameter object.
 *
 * @throws {MissingStepParameterError} When required fields have no value
 * @throws {StepInterfaceError} When the collected values fail the schema
 */
export function finalizeLegacyParameters(
  stepName: string,
  legacy: LegacyParameter,
  parameters: Readonly<Record<string, unknown>>,
): Record<string, unknown> {
  const nestedValue = parameters[legacy.name];
  const nested = isPlainObject(nestedValue) ? nestedValue : {};
  const shape: Record<string, ZodTypeAny> = legacy.schema.shape;

  const values: Record<string, unknown> = {};
  const missingKeys: string[] = [];
  for (const [field, fieldSchema] of Object.entries(shape)) {
    if (hasOwn(parameters, field)) {
      values[field] = parameters[field];
    } else if (hasOwn(nested, field)) {
      values[field] = nested[field];
    } else if (!fieldSchema.isOptional()) {
      missingKeys.push(field);
    }
    // Otherwise the schema default applies while parsing
  }

  if (missingKeys.length > 0) {
    throw new MissingStepParameterError(stepName, legacy.name, missingKeys);
  }

  if (isPassthroughSchema(legacy.schema)) {
    for (const [key, value] of Object.entries(parameters)) {
      if (key !== legacy.name) values[key] = value;
    }
  }

  const result = legacy.schema.safeParse(values);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new StepInterfaceError(
      `Failed to validate parameters '${legacy.name}' of step '${stepName}':\n${errors.join('\n')}`,
    );
  }
  return result.data;
}

/**
 * Resolve the final parameter values of a step.
 *
 * Only parameters of declared inputs survive, plus the legacy parameter
 * object under its own name. Every value must be representable as JSON.
 */
export function finalizeParameters(
  stepName: string,
  stepInterface: StepInterface,
  parameters: Readonly<Record<string, unknown>>,
): Record<string, JsonValue> {
  const finalized: Record<string, JsonValue> = {};

  for (const [key, value] of Object.entries(parameters)) {
    if (!hasOwn(stepInterface.inputs, key)) continue;
    const copy = copyPlain(value);
    if (!isJsonValue(copy)) {
      throw new InputValidationError(
        `Parameter '${key}' of step '${stepName}' is not JSON serializable.`,
        stepName,
        key,
      );
    }
    finalized[key] = copy;
  }

  const legacy = stepInterface.legacyParameter;
  if (legacy) {
    const values = copyPlain(finalizeLegacyParameters(stepName, legacy, parameters));
    if (!isJsonValue(values)) {
      throw new StepInterfaceError(
        `Parameters '${legacy.name}' of step '${stepName}' are not JSON serializable.`,
      );
    }
    finalized[legacy.name] = values;
  }

  return finalized;
}

/**
 * The declared default of an input as a final parameter value. An
 * `undefined` default becomes `null`.
 *
 * @throws {InputValidationError} When the default is not JSON serializable
 */
export function defaultParameterValue(stepName: string, input: InputDescriptor): JsonValue {
  const value = copyPlain(input.default ?? null);
  if (!isJsonValue(value)) {
    throw new InputValidationError(
      `Default of parameter '${input.name}' of step '${stepName}' is not JSON serializable.`,
      stepName,
      input.name,
    );
  }
  return value;
}
