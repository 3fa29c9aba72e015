/**
 * Tests for PipelineBuild.
 *
 * Covers:
 * - Invocation IDs: template names, custom IDs, numeric suffixes
 * - Upstream IDs from artifacts and explicit `after` IDs
 * - Rejected invocations: unknown upstream, foreign artifacts, ended builds
 * - Finalization: parameters and defaults, parameter objects, missing
 *   inputs, artifact types and guards, ordering hints, cycles, shared
 *   external artifacts, immutability
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { createTestEnvironment, type TestEnvironment } from '../__fixtures__/collaborators.js';
import { ExternalArtifact } from '../artifacts/external-artifact.js';
import {
  AmbiguousOrderingError,
  DuplicateInvocationError,
  InputValidationError,
  MissingInputError,
  PipelineBuildError,
  PipelineCycleError,
  UnknownInvocationError,
} from '../errors/step-graph-errors.js';
import { parameterObject, type ParameterDescriptor } from '../signature/annotations.js';
import { defineStep, type StepTemplate } from '../steps/step-template.js';
import { named, types, type DeclaredType } from '../types/declared-type.js';
import { PipelineBuild } from './pipeline-build.js';

let env: TestEnvironment;
let build: PipelineBuild;

beforeEach(() => {
  env = createTestEnvironment();
  build = new PipelineBuild({ name: 'training' });
});

function step(name: string, parameters: ParameterDescriptor[], returns: DeclaredType): StepTemplate {
  return defineStep({
    name,
    signature: { parameters, returns },
    entrypoint: () => null,
    registry: env.registry,
  });
}

const loader = (): StepTemplate => step('loader', [], types.array);
const textLoader = (): StepTemplate => step('text_loader', [], types.string);
const printer = (): StepTemplate => step('printer', [{ name: 'text', annotation: types.string }], types.none);
const trainer = (): StepTemplate => step(
  'trainer',
  [
    { name: 'data', annotation: types.array },
    { name: 'epochs', annotation: types.integer, default: 3 },
  ],
  types.object,
);

// ============================================================================
// addInvocation
// ============================================================================

describe('PipelineBuild.addInvocation', () => {
  it('suffixes repeated template names', () => {
    const template = loader();
    const ids = [1, 2, 3].map(() => template.invoke(build).invocationId);

    expect(ids).toEqual(['loader', 'loader_2', 'loader_3']);
    expect(build.invocationsOf(template).map((invocation) => invocation.id)).toEqual(ids);
  });

  it('rejects a taken custom ID unless suffixing is allowed', () => {
    const template = loader();
    template.invoke(build, {}, { id: 'fetch' });

    expect(() => template.invoke(build, {}, { id: 'fetch' })).toThrow(DuplicateInvocationError);
    expect(template.invoke(build, {}, { id: 'fetch', allowSuffix: true }).invocationId).toBe('fetch_2');
  });

  it('rejects a taken template name when the build disallows suffixes', () => {
    const strict = new PipelineBuild({ name: 'strict', allowSuffix: false });
    const template = loader();
    template.invoke(strict);

    expect(() => template.invoke(strict)).toThrow('Invocation ID "loader" is already used in this pipeline.');
  });

  it('records upstream IDs of input artifacts and explicit IDs', () => {
    const data = loader().invoke(build);
    textLoader().invoke(build);
    trainer().invoke(build, { data: data.output() }, { after: 'text_loader' });

    expect([...(build.getInvocation('trainer')?.upstreamSteps ?? [])]).toEqual(['loader', 'text_loader']);
  });

  it('rejects unknown upstream IDs', () => {
    expect(() => loader().invoke(build, {}, { after: 'cleaner' })).toThrow(UnknownInvocationError);
    expect(build.invocations).toEqual([]);
  });

  it('rejects artifacts of another build', () => {
    const other = new PipelineBuild({ name: 'other' });
    const data = loader().invoke(other);

    expect(() => trainer().invoke(build, { data: data.output() })).toThrow(PipelineBuildError);
  });

  it('rejects invocations after the build ended', () => {
    build.end();

    expect(build.isEnded).toBe(true);
    expect(() => loader().invoke(build)).toThrow(PipelineBuildError);
  });
});

// ============================================================================
// finalize
// ============================================================================

describe('PipelineBuild.finalize', () => {
  it('finalizes every invocation into a graph', async () => {
    const data = loader().invoke(build);
    trainer().invoke(build, { data: data.output() });

    const graph = await build.finalize(env.deps);

    expect(graph.name).toBe('training');
    expect(graph.ids).toEqual(['loader', 'trainer']);
    expect(graph.get('trainer')?.upstreamSteps).toEqual(['loader']);
    expect(graph.get('trainer')?.stepName).toBe('trainer');
    expect(graph.get('trainer')?.configuration.parameters).toEqual({ epochs: 3 });
    expect(graph.topologicalOrder()).toEqual(['loader', 'trainer']);
    expect(graph.readySteps()).toEqual(['loader']);
    expect(graph.readySteps(['loader'])).toEqual(['trainer']);
  });

  it('ends the build', async () => {
    await build.finalize(env.deps);

    expect(() => loader().invoke(build)).toThrow(PipelineBuildError);
  });

  it('fails for inputs without value', async () => {
    trainer().invoke(build);

    await expect(build.finalize(env.deps)).rejects.toThrow(MissingInputError);
  });

  it('checks artifact types against input types', async () => {
    const text = textLoader().invoke(build);
    trainer().invoke(build, { data: text.output() });

    await expect(build.finalize(env.deps)).rejects.toThrow(
      "Wrong input type (`string`) for input 'data' of invocation 'trainer'. " +
      'The input should be of type `array`.',
    );
    await expect(build.finalize(env.deps)).rejects.toThrow(InputValidationError);
  });

  it('replaces configured parameters with invocation parameters', async () => {
    const data = loader().invoke(build);
    const template = trainer().configure({ parameters: { epochs: 5 } });
    template.invoke(build, { data: data.output(), epochs: 8 });

    const graph = await build.finalize(env.deps);

    expect(graph.get('trainer')?.configuration.parameters).toEqual({ epochs: 8 });
    expect(template.configuration.parameters).toEqual({ epochs: 5 });
  });

  it('keeps configured parameters when defaults fill the other inputs', async () => {
    const template = step(
      'fitter',
      [
        { name: 'lr', annotation: types.number },
        { name: 'epochs', annotation: types.integer, default: 3 },
      ],
      types.object,
    ).configure({ parameters: { lr: 0.1 } });
    template.invoke(build);

    const graph = await build.finalize(env.deps);

    expect(graph.get('fitter')?.configuration.parameters).toEqual({ lr: 0.1, epochs: 3 });
  });

  it('finalizes a parameter object passed at invocation', async () => {
    const template = defineStep({
      name: 'scaler',
      signature: {
        parameters: [{ name: 'params', annotation: parameterObject(z.object({ factor: z.number() })) }],
        returns: types.number,
      },
      entrypoint: () => 1,
      registry: env.registry,
    });
    template.invoke(build, { params: { factor: 2 } });

    const graph = await build.finalize(env.deps);

    expect(graph.get('scaler')?.configuration.parameters).toEqual({ params: { factor: 2 } });
  });

  it('applies named type guards to external values', async () => {
    const isTable = (value: unknown): boolean =>
      typeof value === 'object' && value !== null && 'rows' in value;
    step('table_printer', [{ name: 'table', annotation: named('Table', isTable) }], types.none)
      .invoke(build, { table: new ExternalArtifact({ value: { rows: 3 } }) });

    const graph = await build.finalize(env.deps);

    expect(graph.get('table_printer')?.configuration.externalInputArtifacts).toEqual({ table: 'artifact-1' });
  });

  it('rejects external values that fail a named type guard', async () => {
    const isTable = (value: unknown): boolean =>
      typeof value === 'object' && value !== null && 'rows' in value;
    step('table_printer', [{ name: 'table', annotation: named('Table', isTable) }], types.none)
      .invoke(build, { table: new ExternalArtifact({ value: { columns: 3 } }) });

    await expect(build.finalize(env.deps)).rejects.toThrow(
      "Wrong input type (`object`) for input 'table' of invocation 'table_printer'. " +
      'The input should be of type `Table`.',
    );
  });

  it('turns ordering hints into upstream IDs', async () => {
    const fetch = loader();
    const report = textLoader();
    report.after(fetch);
    report.invoke(build);
    fetch.invoke(build);

    const graph = await build.finalize(env.deps);

    expect(graph.get('text_loader')?.upstreamSteps).toEqual(['loader']);
    expect(graph.topologicalOrder()).toEqual(['loader', 'text_loader']);
  });

  it('rejects ordering hints on templates invoked more than once', async () => {
    const fetch = loader();
    const report = textLoader();
    report.after(fetch);
    fetch.invoke(build);
    fetch.invoke(build);
    report.invoke(build);

    await expect(build.finalize(env.deps)).rejects.toThrow(AmbiguousOrderingError);
  });

  it('rejects ordering hints on a template that is itself invoked twice', async () => {
    const fetch = loader();
    const report = textLoader();
    report.after(fetch);
    fetch.invoke(build);
    report.invoke(build);
    report.invoke(build);

    await expect(build.finalize(env.deps)).rejects.toThrow(
      'Step "text_loader" is invoked more than once',
    );
  });

  it('reports cycles from ordering hints before uploading anything', async () => {
    const first = step('first', [], types.string);
    const second = step('second', [], types.string);
    first.after(second);
    second.after(first);
    printer().invoke(build, { text: new ExternalArtifact({ value: 'hello' }) });
    first.invoke(build);
    second.invoke(build);

    await expect(build.finalize(env.deps)).rejects.toThrow(
      new PipelineCycleError(['first', 'second']),
    );
    expect(env.artifactStore.calls).toEqual([]);
    expect(env.metadataStore.calls).toEqual([]);
  });

  it('uploads an external artifact shared by two invocations once', async () => {
    const text = new ExternalArtifact({ value: 'hello' });
    const template = printer();
    template.invoke(build, { text });
    template.invoke(build, { text });

    const graph = await build.finalize(env.deps);

    expect(graph.ids).toEqual(['printer', 'printer_2']);
    expect(graph.get('printer')?.configuration.externalInputArtifacts).toEqual({ text: 'artifact-1' });
    expect(graph.get('printer_2')?.configuration.externalInputArtifacts).toEqual({ text: 'artifact-1' });
    expect(env.metadataStore.count('createArtifactRecord')).toBe(1);
    expect(env.materializers.string.saved).toHaveLength(1);
  });

  it('reuses an uploaded external artifact in a later build without store calls', async () => {
    const text = new ExternalArtifact({ value: 'hello' });
    printer().invoke(build, { text });
    await build.finalize(env.deps);
    const metadataCalls = env.metadataStore.calls.length;
    const storeCalls = env.artifactStore.calls.length;

    const next = new PipelineBuild({ name: 'retraining' });
    printer().invoke(next, { text });
    const graph = await next.finalize(env.deps);

    expect(graph.get('printer')?.configuration.externalInputArtifacts).toEqual({ text: 'artifact-1' });
    expect(env.metadataStore.calls.length).toBe(metadataCalls);
    expect(env.artifactStore.calls.length).toBe(storeCalls);
  });

  it('uploads external artifacts under the build scope', async () => {
    const scoped = new PipelineBuild({ name: 'scoped', externalArtifactsDir: 'uploads' });
    printer().invoke(scoped, { text: new ExternalArtifact({ value: 'hello' }) });

    await scoped.finalize(env.deps);

    expect(env.artifactStore.calls[0]?.method).toBe('allocateLocation');
    expect(env.artifactStore.calls[0]?.args[0]).toBe('uploads');
  });

  it('returns frozen configurations', async () => {
    loader().invoke(build);

    const graph = await build.finalize(env.deps);
    const invocation = graph.get('loader');

    expect(Object.isFrozen(graph.invocations)).toBe(true);
    expect(Object.isFrozen(invocation)).toBe(true);
    expect(Object.isFrozen(invocation?.configuration)).toBe(true);
    expect(Object.isFrozen(invocation?.configuration.parameters)).toBe(true);
  });
});
