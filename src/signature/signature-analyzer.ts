/**
 * Signature analysis for step callables.
 *
 * Turns a step's signature descriptor into an immutable StepInterface:
 * typed inputs, typed outputs, the optional context parameter and the
 * optional legacy parameter-object parameter. Runs once per step template,
 * at declaration time, and either succeeds completely or throws
 * StepInterfaceError.
 */

import type { AnyZodObject } from 'zod';
import { StepInterfaceError } from '../errors/step-graph-errors.js';
import { union, type DeclaredType } from '../types/declared-type.js';
import {
  hasDefault,
  type ParameterDescriptor,
  type ReturnAnnotation,
  type StepSignature,
  type TypeAnnotation,
} from './annotations.js';

// ============================================================================
// Types
// ============================================================================

/** Output name used when a step returns a single, unnamed value. */
export const SINGLE_RETURN_OUT_NAME = 'output';

export interface InputDescriptor {
  readonly name: string;
  readonly type: DeclaredType;
  readonly hasDefault: boolean;
  readonly default?: unknown;
}

export interface LegacyParameter {
  readonly name: string;
  readonly schema: AnyZodObject;
}

export interface StepInterface {
  readonly inputs: Readonly<Record<string, InputDescriptor>>;
  readonly outputs: Readonly<Record<string, DeclaredType>>;
  readonly hasContext: boolean;
  readonly contextParameter: string | null;
  readonly legacyParameter: LegacyParameter | null;
}

// ============================================================================
// Type resolution
// ============================================================================

/**
 * Collapse generic aliases to their concrete origin type.
 *
 * Unions stay unions (each member collapsed) so materializer resolution can
 * branch per member. Context and parameter-object markers are not data
 * types and are rejected.
 */
export function resolveTypeAnnotation(annotation: TypeAnnotation): DeclaredType {
  switch (annotation.kind) {
    case 'generic':
      return resolveTypeAnnotation(annotation.origin);
    case 'union':
      // Nested unions flatten into the outer one
      return union(...annotation.members.flatMap((member) => {
        const resolved = resolveTypeAnnotation(member);
        return resolved.kind === 'union' ? resolved.members : [resolved];
      }));
    case 'context':
    case 'parameter-object':
      throw new StepInterfaceError(
        `A ${annotation.kind} annotation cannot describe step data.`,
      );
    default:
      return annotation;
  }
}

/**
 * Parse a step's return annotation into named, resolved output types.
 *
 * - `none` declares no outputs
 * - a single type becomes one output named `output`
 * - `outputs({...})` becomes one output per entry, in declaration order
 */
export function parseReturnAnnotation(
  annotation: ReturnAnnotation,
): Record<string, DeclaredType> {
  if (annotation.kind === 'none') {
    return {};
  }

  if (annotation.kind === 'outputs') {
    const result: Record<string, DeclaredType> = {};
    for (const [name, output] of Object.entries(annotation.outputs)) {
      result[name] = resolveTypeAnnotation(output);
    }
    return result;
  }

  return { [SINGLE_RETURN_OUT_NAME]: resolveTypeAnnotation(annotation) };
}

// ============================================================================
// Analyzer
// ============================================================================

function describeParameter(parameter: ParameterDescriptor): string {
  return `'${parameter.name}'`;
}

/**
 * Validate a step signature and derive its interface.
 *
 * @param signature - Declared parameters and return annotation
 * @param functionName - Name used in error messages
 * @throws {StepInterfaceError} On variadic parameters, missing annotations,
 *   several context or parameter-object parameters, or a missing return
 *   annotation
 */
export function analyzeSignature(
  signature: StepSignature,
  functionName: string,
): StepInterface {
  const inputs: Record<string, InputDescriptor> = {};
  let contextParameter: string | null = null;
  let legacyParameter: LegacyParameter | null = null;
  const seen = new Set<string>();

  for (const parameter of signature.parameters) {
    const kind = parameter.kind ?? 'positional';
    if (kind === 'variadic-positional' || kind === 'variadic-keyword') {
      throw new StepInterfaceError(
        `Variable args or kwargs not allowed for function ${functionName}.`,
      );
    }

    if (seen.has(parameter.name)) {
      throw new StepInterfaceError(
        `Duplicate parameter ${describeParameter(parameter)} for function ${functionName}.`,
      );
    }
    seen.add(parameter.name);

    const annotation = parameter.annotation;
    if (!annotation) {
      throw new StepInterfaceError(
        `Missing type annotation for argument ${describeParameter(parameter)}. ` +
        'Please make sure to include type annotations for all your step ' +
        'inputs and outputs.',
      );
    }

    if (annotation.kind === 'parameter-object') {
      if (legacyParameter) {
        throw new StepInterfaceError(
          `Found multiple parameter arguments ('${legacyParameter.name}' and ` +
          `'${parameter.name}') for function ${functionName}.`,
        );
      }
      legacyParameter = { name: parameter.name, schema: annotation.schema };
      continue;
    }

    if (annotation.kind === 'context') {
      if (contextParameter) {
        throw new StepInterfaceError(
          `Found multiple context arguments ('${contextParameter}' and ` +
          `'${parameter.name}') for function ${functionName}.`,
        );
      }
      contextParameter = parameter.name;
      continue;
    }

    const withDefault = hasDefault(parameter);
    inputs[parameter.name] = Object.freeze({
      name: parameter.name,
      type: resolveTypeAnnotation(annotation),
      hasDefault: withDefault,
      ...(withDefault ? { default: parameter.default } : {}),
    });
  }

  if (!signature.returns) {
    throw new StepInterfaceError(
      `Missing return type annotation for function ${functionName}. Use ` +
      '`types.none` for steps without outputs.',
    );
  }

  return Object.freeze({
    inputs: Object.freeze(inputs),
    outputs: Object.freeze(parseReturnAnnotation(signature.returns)),
    hasContext: contextParameter !== null,
    contextParameter,
    legacyParameter,
  });
}
