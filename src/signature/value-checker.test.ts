/**
 * Tests for value checks against declared types.
 *
 * Covers:
 * - matchesType without coercion for scalars, unions, none and any
 * - Named types through guards and class names
 * - isJsonValue for nested containers, non-finite numbers and cycles
 * - isAssignable for unions and integer → number widening
 * - validateParameterValue error fields
 */

import { describe, it, expect } from 'vitest';
import { InputValidationError } from '../errors/step-graph-errors.js';
import { NONE, named, types, union } from '../types/declared-type.js';
import {
  isAssignable,
  isJsonValue,
  matchesType,
  validateParameterValue,
} from './value-checker.js';

class Model {}

// ============================================================================
// matchesType
// ============================================================================

describe('matchesType', () => {
  it('does not coerce strings to numbers', () => {
    expect(matchesType(types.integer, '1')).toBe(false);
    expect(matchesType(types.integer, 1)).toBe(true);
    expect(matchesType(types.integer, 1.5)).toBe(false);
    expect(matchesType(types.number, 1.5)).toBe(true);
  });

  it('rejects non-finite numbers', () => {
    expect(matchesType(types.number, Number.NaN)).toBe(false);
  });

  it('accepts a value matching any union member', () => {
    const optional = union(types.string, NONE);
    expect(matchesType(optional, null)).toBe(true);
    expect(matchesType(optional, 'x')).toBe(true);
    expect(matchesType(optional, 3)).toBe(false);
  });

  it('accepts anything for any', () => {
    expect(matchesType(types.any, new Model())).toBe(true);
  });

  it('uses the guard of a named type', () => {
    const positive = named('Positive', (value) => typeof value === 'number' && value > 0);
    expect(matchesType(positive, 2)).toBe(true);
    expect(matchesType(positive, -2)).toBe(false);
  });

  it('matches named types without guard by class name', () => {
    expect(matchesType(named('Model'), new Model())).toBe(true);
    expect(matchesType(named('Model'), {})).toBe(false);
  });

  it('accepts plain objects only for object', () => {
    expect(matchesType(types.object, { a: 1 })).toBe(true);
    expect(matchesType(types.object, [1])).toBe(false);
    expect(matchesType(types.object, new Model())).toBe(false);
  });
});

// ============================================================================
// isJsonValue
// ============================================================================

describe('isJsonValue', () => {
  it('accepts nested plain containers', () => {
    expect(isJsonValue({ a: [1, 'b', null, { c: true }] })).toBe(true);
  });

  it('rejects undefined, functions and class instances', () => {
    expect(isJsonValue(undefined)).toBe(false);
    expect(isJsonValue({ f: () => 1 })).toBe(false);
    expect(isJsonValue([new Model()])).toBe(false);
  });

  it('rejects infinite numbers', () => {
    expect(isJsonValue({ n: Number.POSITIVE_INFINITY })).toBe(false);
  });

  it('rejects cycles but accepts shared references', () => {
    const shared = { x: 1 };
    expect(isJsonValue({ a: shared, b: shared })).toBe(true);

    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    expect(isJsonValue(cyclic)).toBe(false);
  });
});

// ============================================================================
// isAssignable
// ============================================================================

describe('isAssignable', () => {
  it('widens integer to number but not the reverse', () => {
    expect(isAssignable(types.integer, types.number)).toBe(true);
    expect(isAssignable(types.number, types.integer)).toBe(false);
  });

  it('requires every source union member to fit', () => {
    expect(isAssignable(union(types.string, NONE), union(NONE, types.string))).toBe(true);
    expect(isAssignable(union(types.string, NONE), types.string)).toBe(false);
  });

  it('accepts any on either side', () => {
    expect(isAssignable(types.any, named('Model'))).toBe(true);
    expect(isAssignable(named('Model'), types.any)).toBe(true);
  });
});

// ============================================================================
// validateParameterValue
// ============================================================================

describe('validateParameterValue', () => {
  const input = { name: 'epochs', type: types.integer, hasDefault: false };

  it('accepts a matching JSON value', () => {
    expect(() => validateParameterValue('trainer', input, 3)).not.toThrow();
  });

  it('names step and input on a type mismatch', () => {
    try {
      validateParameterValue('trainer', input, 'three');
      expect.fail('expected InputValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(InputValidationError);
      if (error instanceof InputValidationError) {
        expect(error.stepName).toBe('trainer');
        expect(error.inputName).toBe('epochs');
        expect(error.message).toBe(
          "Value for input 'epochs' of step 'trainer' does not match declared type `integer`.",
        );
      }
    }
  });

  it('rejects values that are not JSON representable', () => {
    const anyInput = { name: 'model', type: types.any, hasDefault: false };
    expect(() => validateParameterValue('trainer', anyInput, new Model())).toThrow(
      "Argument for input 'model' of step 'trainer' is not JSON serializable.",
    );
  });
});
