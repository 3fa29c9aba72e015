/**
 * Annotation forms accepted in step signature descriptors.
 *
 * A step declares its callable interface explicitly: one descriptor per
 * parameter plus a return annotation. Besides plain declared types the
 * analyzer understands generic aliases (collapsed to their origin), the
 * step-context marker and the legacy parameter-object marker.
 */

import type { AnyZodObject } from 'zod';
import type { DeclaredType } from '../types/declared-type.js';

// ============================================================================
// Annotation forms
// ============================================================================

export interface GenericAnnotation {
  readonly kind: 'generic';
  readonly origin: DeclaredType;
  readonly args: readonly TypeAnnotation[];
}

export interface ContextAnnotation {
  readonly kind: 'context';
}

export interface ParameterObjectAnnotation {
  readonly kind: 'parameter-object';
  readonly schema: AnyZodObject;
}

export type TypeAnnotation =
  | DeclaredType
  | GenericAnnotation
  | ContextAnnotation
  | ParameterObjectAnnotation;

/** Several named outputs. */
export interface OutputsAnnotation {
  readonly kind: 'outputs';
  readonly outputs: Readonly<Record<string, TypeAnnotation>>;
}

export type ReturnAnnotation = TypeAnnotation | OutputsAnnotation;

export type ParameterKind =
  | 'positional'
  | 'keyword'
  | 'variadic-positional'
  | 'variadic-keyword';

export interface ParameterDescriptor {
  readonly name: string;
  /** Default: 'positional' */
  readonly kind?: ParameterKind;
  readonly annotation?: TypeAnnotation;
  /** Presence of the key (even with `undefined`) marks a default */
  readonly default?: unknown;
}

export interface StepSignature {
  readonly parameters: readonly ParameterDescriptor[];
  readonly returns?: ReturnAnnotation;
}

// ============================================================================
// Constructors
// ============================================================================

export function generic(origin: DeclaredType, ...args: TypeAnnotation[]): GenericAnnotation {
  return { kind: 'generic', origin, args };
}

export function context(): ContextAnnotation {
  return { kind: 'context' };
}

export function parameterObject(schema: AnyZodObject): ParameterObjectAnnotation {
  return { kind: 'parameter-object', schema };
}

export function outputs(declared: Record<string, TypeAnnotation>): OutputsAnnotation {
  return { kind: 'outputs', outputs: declared };
}

export function hasDefault(parameter: ParameterDescriptor): boolean {
  return Object.prototype.hasOwnProperty.call(parameter, 'default');
}
