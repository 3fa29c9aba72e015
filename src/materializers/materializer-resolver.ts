/**
 * Materializer resolution for step outputs and external artifacts.
 *
 * Explicit sources win and are returned in the order given. Without them
 * the declared type decides: `any` needs an explicit materializer, a union
 * resolves member by member in declaration order, any other type resolves
 * to a single registry entry.
 */

import {
  MaterializerNotFoundError,
  MaterializerRequiredError,
  StepInterfaceError,
} from '../errors/step-graph-errors.js';
import { typeKey, type DeclaredType } from '../types/declared-type.js';
import type { MaterializerRegistry } from './materializer-registry.js';
import { isMaterializerClass, type MaterializerClass, type MaterializerSpecifier } from './types.js';

export interface OutputResolutionRequest {
  stepName: string;
  outputName: string;
  declaredType: DeclaredType;
  /** Explicitly configured materializer source identifiers */
  explicitSources: readonly string[];
  registry: MaterializerRegistry;
}

/**
 * Turn an explicit materializer into a known source identifier.
 *
 * Classes are added to the registry's source index so the identifier can be
 * loaded again when computing caching parameters.
 *
 * @throws {StepInterfaceError} When the specifier does not denote a
 *   materializer
 */
export function resolveMaterializerSource(
  specifier: MaterializerSpecifier,
  registry: MaterializerRegistry,
  context: string,
): string {
  if (typeof specifier === 'string') {
    if (!registry.load(specifier)) {
      throw new StepInterfaceError(
        `Materializer source \`${specifier}\` for ${context} does not resolve ` +
        'to a known materializer class.',
      );
    }
    return specifier;
  }

  if (!isMaterializerClass(specifier)) {
    throw new StepInterfaceError(`Materializer for ${context} is not a materializer class.`);
  }
  registry.addSource(specifier);
  return specifier.identifier;
}

/**
 * Load the class behind a materializer source identifier.
 *
 * @throws {MaterializerNotFoundError} When the identifier is unknown
 */
export function loadMaterializer(
  identifier: string,
  registry: MaterializerRegistry,
): MaterializerClass {
  const materializer = registry.load(identifier);
  if (!materializer) {
    throw new MaterializerNotFoundError(
      `Materializer source \`${identifier}\` is not registered.`,
      identifier,
    );
  }
  return materializer;
}

/**
 * Members to resolve for a declared output type. A `none` member resolves
 * under the `null` placeholder key.
 */
export function materializerTargets(declaredType: DeclaredType): readonly DeclaredType[] {
  return declaredType.kind === 'union'
    ? declaredType.members.flatMap(materializerTargets)
    : [declaredType];
}

/**
 * Resolve the ordered list of materializer identifiers for one output.
 *
 * @throws {MaterializerRequiredError} When the output is `any` and has no
 *   explicit materializer
 * @throws {MaterializerNotFoundError} When a (member) type has no
 *   registered materializer
 */
export function resolveOutputMaterializers(request: OutputResolutionRequest): string[] {
  const { stepName, outputName, declaredType, explicitSources, registry } = request;
  const context = `output '${outputName}' of step '${stepName}'`;

  if (explicitSources.length > 0) {
    return explicitSources.map((source) => resolveMaterializerSource(source, registry, context));
  }

  if (declaredType.kind === 'any') {
    throw new MaterializerRequiredError(stepName, outputName);
  }

  return materializerTargets(declaredType).map((type) => {
    const materializer = registry.lookup(type);
    if (!materializer) {
      const description = typeKey(type);
      throw new MaterializerNotFoundError(
        `Unable to find materializer for ${context} of type \`${description}\`. ` +
        'Either set a materializer for this output with ' +
        '`configure({ outputMaterializers })` or register a default ' +
        'materializer for the type.',
        description,
        outputName,
      );
    }
    return materializer.identifier;
  });
}
