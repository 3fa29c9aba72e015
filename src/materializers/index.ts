/**
 * Barrel exports for the materializers module.
 */

export { isMaterializerClass } from './types.js';
export type { Materializer, MaterializerClass, MaterializerSpecifier } from './types.js';

export { MaterializerRegistry, materializerRegistry } from './materializer-registry.js';

export {
  loadMaterializer,
  materializerTargets,
  resolveMaterializerSource,
  resolveOutputMaterializers,
} from './materializer-resolver.js';
export type { OutputResolutionRequest } from './materializer-resolver.js';
