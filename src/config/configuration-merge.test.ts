/**
 * Tests for configuration parsing and merging.
 *
 * Covers:
 * - Shallow merge replaces whole mappings, deep merge merges key by key
 * - Repeating a shallow merge changes nothing
 * - Deep merges of disjoint parameter keys keep both key sets
 * - Nested settings recursion, per-output materializer entries, arrays
 * - Scalars kept from the base when the update leaves them unset
 * - Base left untouched, result frozen
 * - Unknown configuration and setting keys
 */

import { describe, it, expect } from 'vitest';
import { StepInterfaceError, UnknownSettingError } from '../errors/step-graph-errors.js';
import { mergeConfiguration, recursiveUpdate } from './configuration-merge.js';
import {
  createPartialConfiguration,
  parseConfigurationUpdate,
  type PartialStepConfiguration,
} from './step-configuration.js';

function baseConfiguration(): PartialStepConfiguration {
  return mergeConfiguration(
    createPartialConfiguration('trainer', { enableCache: false }),
    {
      parameters: { lr: 0.1, epochs: 3 },
      settings: { resources: { cpu: 1, gpu: { count: 1 } } },
      extra: { tags: ['a'] },
      outputs: { model: { materializerSource: ['test.ModelMaterializer'] } },
    },
    { deep: true },
  );
}

// ============================================================================
// Shallow and deep merge
// ============================================================================

describe('mergeConfiguration', () => {
  it('replaces whole mappings when not deep', () => {
    const result = mergeConfiguration(baseConfiguration(), { parameters: { epochs: 5 } }, { deep: false });

    expect(result.parameters).toEqual({ epochs: 5 });
    expect(result.settings).toEqual({ resources: { cpu: 1, gpu: { count: 1 } } });
  });

  it('merges mappings key by key when deep', () => {
    const result = mergeConfiguration(baseConfiguration(), { parameters: { epochs: 5 } }, { deep: true });

    expect(result.parameters).toEqual({ lr: 0.1, epochs: 5 });
  });

  it('gives the same result when a shallow merge is repeated', () => {
    const update = { parameters: { epochs: 5 }, enableCache: true };
    const once = mergeConfiguration(baseConfiguration(), update, { deep: false });
    const twice = mergeConfiguration(once, update, { deep: false });

    expect(twice).toEqual(once);
  });

  it('keeps both key sets for disjoint deep updates', () => {
    const first = mergeConfiguration(createPartialConfiguration('s'), { parameters: { a: 1 } }, { deep: true });
    const second = mergeConfiguration(first, { parameters: { b: 2 } }, { deep: true });

    expect(Object.keys(second.parameters).sort()).toEqual(['a', 'b']);
  });

  it('recurses into nested settings', () => {
    const result = mergeConfiguration(
      baseConfiguration(),
      { settings: { resources: { gpu: { type: 'test-gpu' } } } },
      { deep: true },
    );

    expect(result.settings).toEqual({ resources: { cpu: 1, gpu: { count: 1, type: 'test-gpu' } } });
  });

  it('merges output entries per output name', () => {
    const result = mergeConfiguration(
      baseConfiguration(),
      { outputs: { metrics: { materializerSource: ['test.JsonMaterializer'] }, model: {} } },
      { deep: true },
    );

    expect(result.outputs).toEqual({
      model: { materializerSource: ['test.ModelMaterializer'] },
      metrics: { materializerSource: ['test.JsonMaterializer'] },
    });
  });

  it('replaces arrays instead of merging them', () => {
    const result = mergeConfiguration(baseConfiguration(), { extra: { tags: ['b'] } }, { deep: true });

    expect(result.extra).toEqual({ tags: ['b'] });
  });

  it('keeps scalar fields the update leaves unset', () => {
    const result = mergeConfiguration(baseConfiguration(), { stepOperator: 'test-operator' }, { deep: false });

    expect(result.enableCache).toBe(false);
    expect(result.stepOperator).toBe('test-operator');
    expect(result.name).toBe('trainer');
  });

  it('leaves the base untouched and freezes the result', () => {
    const base = baseConfiguration();
    const result = mergeConfiguration(base, { parameters: { lr: 0.5 } }, { deep: true });

    expect(base.parameters).toEqual({ lr: 0.1, epochs: 3 });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.parameters)).toBe(true);
    expect(Object.isFrozen(result.settings.resources)).toBe(true);
  });

  it('does not freeze values owned by the caller', () => {
    const values = { layers: [1, 2] };
    mergeConfiguration(createPartialConfiguration('s'), { parameters: { values } }, { deep: true });

    expect(Object.isFrozen(values)).toBe(false);
    expect(Object.isFrozen(values.layers)).toBe(false);
  });

  it('rejects invalid setting keys', () => {
    expect(() => mergeConfiguration(
      createPartialConfiguration('s'),
      { settings: { 'orchestrator.kubernetes': {}, gpu: {} } },
      { deep: true },
    )).toThrow(UnknownSettingError);
  });
});

// ============================================================================
// Parsing
// ============================================================================

describe('parseConfigurationUpdate', () => {
  it('reports unknown keys with their path', () => {
    try {
      parseConfigurationUpdate({ bogus: 1, outputs: { model: { format: 'x' } } });
      expect.fail('expected UnknownSettingError');
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownSettingError);
      if (error instanceof UnknownSettingError) {
        expect([...error.keys].sort()).toEqual(['bogus', 'outputs.model.format']);
      }
    }
  });

  it('rejects values of the wrong shape', () => {
    expect(() => parseConfigurationUpdate({ enableCache: 'yes' })).toThrow(StepInterfaceError);
  });
});

describe('recursiveUpdate', () => {
  it('merges nested objects and lets update values win', () => {
    expect(recursiveUpdate({ a: { b: 1, c: 2 }, d: 1 }, { a: { c: 3 }, d: { e: 1 } }))
      .toEqual({ a: { b: 1, c: 3 }, d: { e: 1 } });
  });
});
