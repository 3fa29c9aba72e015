/**
 * Engine configuration read from environment variables with Zod validation.
 *
 * Missing variables fall back to defaults. Invalid values produce an
 * EngineConfigError naming the offending variable.
 *
 * @module config/engine-config
 */

import { z } from 'zod';
import { LogLevelSchema } from '../logging/logger.js';

// ============================================================================
// Schema
// ============================================================================

export const EngineConfigSchema = z.object({
  logLevel: LogLevelSchema.default('warn'),
  /** Artifact-store scope that receives uploaded external artifacts */
  externalArtifactsDir: z.string().min(1).regex(/^[^/\\]+$/, 'must be a single path segment').default('external_artifacts'),
  /** Whether unnamed invocations get a numeric suffix on ID collisions */
  allowSuffix: z.boolean().default(true),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});

/** Environment variable for each config field. */
export const ENGINE_ENV_VARS = {
  logLevel: 'STEPGRAPH_LOG_LEVEL',
  externalArtifactsDir: 'STEPGRAPH_EXTERNAL_ARTIFACTS_DIR',
  allowSuffix: 'STEPGRAPH_ALLOW_SUFFIX',
} as const satisfies Record<keyof EngineConfig, string>;

// ============================================================================
// Error type
// ============================================================================

export class EngineConfigError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'EngineConfigError';
  }
}

// ============================================================================
// Public API
// ============================================================================

function parseBooleanFlag(raw: string | undefined): boolean | string | undefined {
  if (raw === undefined) return undefined;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes'].includes(normalized)) return true;
  if (['0', 'false', 'no'].includes(normalized)) return false;
  // Left as a string so the schema reports it
  return raw;
}

/**
 * Build the engine configuration from environment variables.
 *
 * @param env - Variables to read (default: process.env)
 * @throws {EngineConfigError} When a variable holds an invalid value
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const raw = {
    logLevel: env[ENGINE_ENV_VARS.logLevel],
    externalArtifactsDir: env[ENGINE_ENV_VARS.externalArtifactsDir],
    allowSuffix: parseBooleanFlag(env[ENGINE_ENV_VARS.allowSuffix]),
  };

  const result = EngineConfigSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.issues.map((issue) => {
      const field = String(issue.path[0] ?? '');
      const variable = Object.entries(ENGINE_ENV_VARS)
        .find(([key]) => key === field)?.[1] ?? field;
      return `${variable}: ${issue.message}`;
    });
    throw new EngineConfigError(
      `Engine config validation failed:\n${errors.join('\n')}`,
      result.error.issues[0]?.path.join('.'),
    );
  }

  return result.data;
}
