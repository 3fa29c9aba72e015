/**
 * Value checks against declared types.
 *
 * A small structural check over the closed DeclaredType variant. No
 * coercion: `"1"` does not satisfy `integer`. Named types accept a value
 * through the guard registered with the type, or, without a guard, when
 * the value's class carries the type's identifier.
 */

import { InputValidationError } from '../errors/step-graph-errors.js';
import { typeKey, typeOfValue, type DeclaredType } from '../types/declared-type.js';
import type { InputDescriptor } from './signature-analyzer.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Check whether a value is representable as JSON without loss.
 */
export function isJsonValue(value: unknown, seen: Set<unknown> = new Set()): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      break;
    default:
      return false;
  }

  if (seen.has(value)) return false;
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.every((item) => isJsonValue(item, seen));
    }
    if (isPlainObject(value)) {
      return Object.values(value).every((item) => isJsonValue(item, seen));
    }
    return false;
  } finally {
    seen.delete(value);
  }
}

/**
 * Check a plain value against a declared type.
 */
export function matchesType(type: DeclaredType, value: unknown): boolean {
  switch (type.kind) {
    case 'any':
      return true;
    case 'none':
      return value === null;
    case 'union':
      return type.members.some((member) => matchesType(member, value));
    case 'named':
      return type.guard ? type.guard(value) : typeKey(typeOfValue(value)) === type.identifier;
    case 'scalar':
      switch (type.scalar) {
        case 'string':
          return typeof value === 'string';
        case 'number':
          return typeof value === 'number' && Number.isFinite(value);
        case 'integer':
          return Number.isInteger(value);
        case 'boolean':
          return typeof value === 'boolean';
        case 'array':
          return Array.isArray(value);
        case 'object':
          return isPlainObject(value);
      }
  }
}

/**
 * Check whether data of type `source` can feed an input declared as
 * `target`. Every member of a source union must fit the target; an
 * integer fits a number.
 */
export function isAssignable(source: DeclaredType, target: DeclaredType): boolean {
  if (source.kind === 'any' || target.kind === 'any') return true;
  if (source.kind === 'union') {
    return source.members.every((member) => isAssignable(member, target));
  }
  if (target.kind === 'union') {
    return target.members.some((member) => isAssignable(source, member));
  }
  if (typeKey(source) === typeKey(target)) return true;
  return (
    source.kind === 'scalar' &&
    source.scalar === 'integer' &&
    target.kind === 'scalar' &&
    target.scalar === 'number'
  );
}

/**
 * Validate a value passed as a step parameter for a declared input.
 *
 * @throws {InputValidationError} When the value does not match the input
 *   type or cannot be represented as JSON
 */
export function validateParameterValue(
  stepName: string,
  input: InputDescriptor,
  value: unknown,
): void {
  if (!matchesType(input.type, value)) {
    throw new InputValidationError(
      `Value for input '${input.name}' of step '${stepName}' does not match ` +
      `declared type \`${typeKey(input.type)}\`.`,
      stepName,
      input.name,
    );
  }

  if (!isJsonValue(value)) {
    throw new InputValidationError(
      `Argument for input '${input.name}' of step '${stepName}' is not JSON ` +
      'serializable.',
      stepName,
      input.name,
    );
  }
}
