/**
 * Global type → materializer registry.
 *
 * Materializers register once, usually at import time of the module that
 * defines them. The registry answers two questions for the engine: which
 * materializer handles a type by default, and which class an identifier
 * refers to (needed to hash materializer sources for caching).
 */

import { getLogger } from '../logging/logger.js';
import { lookupKeys, typeKey, type DeclaredType } from '../types/declared-type.js';
import { isMaterializerClass, type MaterializerClass } from './types.js';

const logger = getLogger('materializer-registry');

export class MaterializerRegistry {
  private readonly byType = new Map<string, MaterializerClass>();
  private readonly bySource = new Map<string, MaterializerClass>();

  /**
   * Register a materializer as the default for all of its associated types.
   * A later registration for the same type replaces the earlier one.
   */
  register(materializer: MaterializerClass): void {
    this.addSource(materializer);
    for (const type of materializer.associatedTypes) {
      this.registerForType(type, materializer);
    }
  }

  /**
   * Register a materializer as the default for a single type.
   */
  registerForType(type: DeclaredType | string, materializer: MaterializerClass): void {
    const key = typeof type === 'string' ? type : typeKey(type);
    const previous = this.byType.get(key);
    if (previous && previous !== materializer) {
      logger.debug(
        `Overriding materializer for type \`${key}\`: ${previous.identifier} -> ${materializer.identifier}`,
      );
    }
    this.addSource(materializer);
    this.byType.set(key, materializer);
  }

  /**
   * Make a materializer loadable by identifier without making it a default.
   */
  addSource(materializer: MaterializerClass): void {
    if (!isMaterializerClass(materializer)) {
      throw new TypeError('Only materializer classes can be registered.');
    }
    this.bySource.set(materializer.identifier, materializer);
  }

  isRegistered(type: DeclaredType): boolean {
    return this.lookup(type) !== undefined;
  }

  /**
   * Default materializer for a type, following integer → number fallback.
   */
  lookup(type: DeclaredType): MaterializerClass | undefined {
    for (const key of lookupKeys(type)) {
      const materializer = this.byType.get(key);
      if (materializer) return materializer;
    }
    return undefined;
  }

  /**
   * Materializer class for a source identifier.
   */
  load(identifier: string): MaterializerClass | undefined {
    return this.bySource.get(identifier);
  }

  clear(): void {
    this.byType.clear();
    this.bySource.clear();
  }
}

/** Process-wide registry used when no registry is passed explicitly. */
export const materializerRegistry = new MaterializerRegistry();
