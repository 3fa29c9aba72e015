/**
 * Tests for signature analysis.
 *
 * Covers:
 * - Inputs with types and defaults, context and parameter-object parameters
 * - Single, named and empty returns
 * - Generic aliases collapsed to their origin, unions kept per member
 * - Rejection of variadic parameters, missing annotations, duplicate
 *   context/parameter objects and missing return annotations
 * - Frozen result
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { StepInterfaceError } from '../errors/step-graph-errors.js';
import { NONE, named, types, union } from '../types/declared-type.js';
import { context, generic, outputs, parameterObject } from './annotations.js';
import {
  SINGLE_RETURN_OUT_NAME,
  analyzeSignature,
  parseReturnAnnotation,
  resolveTypeAnnotation,
} from './signature-analyzer.js';

const ParamsSchema = z.object({ rate: z.number() });

// ============================================================================
// Successful analysis
// ============================================================================

describe('analyzeSignature', () => {
  it('derives inputs, outputs, context and parameter object', () => {
    const result = analyzeSignature({
      parameters: [
        { name: 'data', annotation: types.array },
        { name: 'epochs', annotation: types.integer, default: 3 },
        { name: 'ctx', annotation: context() },
        { name: 'params', annotation: parameterObject(ParamsSchema) },
      ],
      returns: named('Model'),
    }, 'trainer');

    expect(Object.keys(result.inputs)).toEqual(['data', 'epochs']);
    expect(result.inputs.data).toEqual({ name: 'data', type: types.array, hasDefault: false });
    expect(result.inputs.epochs).toEqual({
      name: 'epochs',
      type: types.integer,
      hasDefault: true,
      default: 3,
    });
    expect(result.outputs).toEqual({ output: named('Model') });
    expect(result.hasContext).toBe(true);
    expect(result.contextParameter).toBe('ctx');
    expect(result.legacyParameter).toEqual({ name: 'params', schema: ParamsSchema });
  });

  it('treats an explicit undefined default as a default', () => {
    const result = analyzeSignature({
      parameters: [{ name: 'limit', annotation: union(types.integer, NONE), default: undefined }],
      returns: types.none,
    }, 'step');

    expect(result.inputs.limit?.hasDefault).toBe(true);
  });

  it('returns a frozen interface', () => {
    const result = analyzeSignature({ parameters: [], returns: types.string }, 'step');

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.inputs)).toBe(true);
    expect(Object.isFrozen(result.outputs)).toBe(true);
  });
});

// ============================================================================
// Failures
// ============================================================================

describe('analyzeSignature failures', () => {
  it.each(['variadic-positional', 'variadic-keyword'] as const)('rejects %s parameters', (kind) => {
    expect(() => analyzeSignature({
      parameters: [{ name: 'rest', kind, annotation: types.any }],
      returns: types.none,
    }, 'step')).toThrow(StepInterfaceError);
  });

  it('rejects a parameter without annotation', () => {
    expect(() => analyzeSignature({
      parameters: [{ name: 'data' }],
      returns: types.none,
    }, 'step')).toThrow("Missing type annotation for argument 'data'");
  });

  it('rejects two context parameters', () => {
    expect(() => analyzeSignature({
      parameters: [
        { name: 'a', annotation: context() },
        { name: 'b', annotation: context() },
      ],
      returns: types.none,
    }, 'step')).toThrow("Found multiple context arguments ('a' and 'b')");
  });

  it('rejects two parameter objects', () => {
    expect(() => analyzeSignature({
      parameters: [
        { name: 'a', annotation: parameterObject(ParamsSchema) },
        { name: 'b', annotation: parameterObject(ParamsSchema) },
      ],
      returns: types.none,
    }, 'step')).toThrow("Found multiple parameter arguments ('a' and 'b')");
  });

  it('rejects a missing return annotation', () => {
    expect(() => analyzeSignature({ parameters: [] }, 'loader')).toThrow(
      'Missing return type annotation for function loader.',
    );
  });

  it('rejects duplicate parameter names', () => {
    expect(() => analyzeSignature({
      parameters: [
        { name: 'x', annotation: types.string },
        { name: 'x', annotation: types.string },
      ],
      returns: types.none,
    }, 'step')).toThrow(StepInterfaceError);
  });
});

// ============================================================================
// Return and type annotations
// ============================================================================

describe('parseReturnAnnotation', () => {
  it('declares no outputs for none', () => {
    expect(parseReturnAnnotation(types.none)).toEqual({});
  });

  it('names a single output with the default name', () => {
    expect(SINGLE_RETURN_OUT_NAME).toBe('output');
    expect(parseReturnAnnotation(types.string)).toEqual({ output: types.string });
  });

  it('keeps named outputs in declaration order', () => {
    const result = parseReturnAnnotation(outputs({
      model: named('Model'),
      metrics: generic(types.object, types.string, types.number),
    }));

    expect(Object.keys(result)).toEqual(['model', 'metrics']);
    expect(result.metrics).toEqual(types.object);
  });
});

describe('resolveTypeAnnotation', () => {
  it('collapses nested generics to the origin', () => {
    expect(resolveTypeAnnotation(generic(types.array, generic(types.array, types.string))))
      .toEqual(types.array);
  });

  it('keeps union members in declaration order', () => {
    const result = resolveTypeAnnotation(union(types.string, NONE));
    expect(result).toEqual({ kind: 'union', members: [types.string, NONE] });
  });

  it('flattens nested unions', () => {
    const result = resolveTypeAnnotation(union(types.string, union(types.number, NONE)));
    expect(result).toEqual({ kind: 'union', members: [types.string, types.number, NONE] });
  });

  it('resolves nested union outputs per member', () => {
    const result = parseReturnAnnotation(union(types.string, union(types.number, NONE)));
    expect(result.output).toEqual(union(types.string, types.number, NONE));
  });

  it('rejects the context marker as a data type', () => {
    expect(() => resolveTypeAnnotation(context())).toThrow(StepInterfaceError);
  });
});
