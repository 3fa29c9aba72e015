/**
 * Declared data types for step inputs and outputs.
 *
 * TypeScript erases annotations at runtime, so steps describe their data
 * with a closed variant built once during signature analysis:
 * - scalar: JSON-shaped primitives and containers
 * - union: ordered members, kept unresolved so materializer resolution
 *   can branch per member
 * - named: a registered object type identified by name, with an optional
 *   guard used when a plain value is passed as a parameter
 * - none: the explicit `null` member of a union (or a `none` return)
 * - any: unconstrained; outputs of this type need an explicit materializer
 */

// ============================================================================
// Types
// ============================================================================

export type ScalarKind =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'array'
  | 'object';

export interface ScalarType {
  readonly kind: 'scalar';
  readonly scalar: ScalarKind;
}

export interface UnionType {
  readonly kind: 'union';
  readonly members: readonly DeclaredType[];
}

export interface NamedType {
  readonly kind: 'named';
  readonly identifier: string;
  /** Accepts plain values passed as parameters for this type */
  readonly guard?: (value: unknown) => boolean;
}

export interface NoneType {
  readonly kind: 'none';
}

export interface AnyType {
  readonly kind: 'any';
}

export type DeclaredType = ScalarType | UnionType | NamedType | NoneType | AnyType;

const SCALAR_KINDS: readonly ScalarKind[] = [
  'string',
  'number',
  'integer',
  'boolean',
  'array',
  'object',
];

// ============================================================================
// Constructors
// ============================================================================

export function scalar(kind: ScalarKind): ScalarType {
  return { kind: 'scalar', scalar: kind };
}

export function union(...members: DeclaredType[]): UnionType {
  return { kind: 'union', members };
}

export function named(identifier: string, guard?: (value: unknown) => boolean): NamedType {
  return guard ? { kind: 'named', identifier, guard } : { kind: 'named', identifier };
}

export const NONE: NoneType = { kind: 'none' };
export const ANY: AnyType = { kind: 'any' };

/** Shorthands used by step declarations. */
export const types = {
  string: scalar('string'),
  number: scalar('number'),
  integer: scalar('integer'),
  boolean: scalar('boolean'),
  array: scalar('array'),
  object: scalar('object'),
  none: NONE,
  any: ANY,
  named,
  union,
} as const;

// ============================================================================
// Keys and descriptions
// ============================================================================

/**
 * Stable string key of a declared type.
 *
 * Used as the materializer registry key and as the `dataType` of artifact
 * records, so it must not change between runs.
 */
export function typeKey(type: DeclaredType): string {
  switch (type.kind) {
    case 'scalar':
      return type.scalar;
    case 'named':
      return type.identifier;
    case 'none':
      return 'null';
    case 'any':
      return 'any';
    case 'union':
      return type.members.map(typeKey).join(' | ');
  }
}

/**
 * Inverse of typeKey for non-union keys read back from artifact records.
 */
export function typeFromKey(key: string): DeclaredType {
  if (key === 'null') return NONE;
  if (key === 'any') return ANY;
  const scalarKind = SCALAR_KINDS.find(kind => kind === key);
  if (scalarKind) return scalar(scalarKind);
  return named(key);
}

/**
 * Derive the declared type of a runtime value.
 *
 * Class instances map to a named type carrying their constructor name;
 * plain objects map to the `object` scalar.
 */
export function typeOfValue(value: unknown): DeclaredType {
  if (value === null || value === undefined) return NONE;
  switch (typeof value) {
    case 'string':
      return scalar('string');
    case 'number':
      return Number.isInteger(value) ? scalar('integer') : scalar('number');
    case 'boolean':
      return scalar('boolean');
    default:
      break;
  }
  if (Array.isArray(value)) return scalar('array');
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null || proto === Object.prototype) return scalar('object');
    const ctorName = value.constructor.name;
    return ctorName ? named(ctorName) : scalar('object');
  }
  return named(typeof value);
}

/**
 * Registry lookup order for a type: the type itself, then its wider
 * fallbacks (an integer is also a number).
 */
export function lookupKeys(type: DeclaredType): string[] {
  if (type.kind === 'scalar' && type.scalar === 'integer') {
    return ['integer', 'number'];
  }
  return [typeKey(type)];
}
