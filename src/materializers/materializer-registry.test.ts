/**
 * Tests for the materializer registry.
 *
 * Covers:
 * - Registration for associated types and by identifier
 * - Later registrations replacing earlier defaults
 * - Integer → number lookup fallback
 * - Rejection of values that are not materializer classes
 */

import { describe, it, expect } from 'vitest';
import { createMaterializer } from '../__fixtures__/collaborators.js';
import { named, types } from '../types/declared-type.js';
import { MaterializerRegistry } from './materializer-registry.js';

describe('MaterializerRegistry', () => {
  it('registers a materializer for all associated types', () => {
    const registry = new MaterializerRegistry();
    const json = createMaterializer('test.JsonMaterializer', ['object', 'array']);
    registry.register(json);

    expect(registry.lookup(types.object)).toBe(json);
    expect(registry.lookup(types.array)).toBe(json);
    expect(registry.load('test.JsonMaterializer')).toBe(json);
    expect(registry.isRegistered(types.string)).toBe(false);
  });

  it('replaces an earlier default for the same type', () => {
    const registry = new MaterializerRegistry();
    const first = createMaterializer('test.First', ['Model']);
    const second = createMaterializer('test.Second', ['Model']);
    registry.register(first);
    registry.register(second);

    expect(registry.lookup(named('Model'))).toBe(second);
    expect(registry.load('test.First')).toBe(first);
  });

  it('falls back from integer to number', () => {
    const registry = new MaterializerRegistry();
    const number = createMaterializer('test.NumberMaterializer', ['number']);
    registry.register(number);

    expect(registry.lookup(types.integer)).toBe(number);
  });

  it('adds sources without making them defaults', () => {
    const registry = new MaterializerRegistry();
    const custom = createMaterializer('test.Custom', ['string']);
    registry.addSource(custom);

    expect(registry.load('test.Custom')).toBe(custom);
    expect(registry.lookup(types.string)).toBeUndefined();
  });

  it('rejects classes without the materializer shape', () => {
    const registry = new MaterializerRegistry();
    class NotAMaterializer {
      static readonly identifier = 'test.Nope';
      static readonly associatedTypes = ['string'];
      static readonly artifactType = 'data';
      constructor(readonly uri: string) {}
      async save(): Promise<void> {}
    }
    Reflect.deleteProperty(NotAMaterializer.prototype, 'save');

    expect(() => registry.addSource(NotAMaterializer)).toThrow(TypeError);
  });

  it('clears all entries', () => {
    const registry = new MaterializerRegistry();
    registry.register(createMaterializer('test.String', ['string']));
    registry.clear();

    expect(registry.lookup(types.string)).toBeUndefined();
    expect(registry.load('test.String')).toBeUndefined();
  });
});
