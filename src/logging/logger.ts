/**
 * Leveled stderr logger.
 *
 * Writes `[scope] level: message` lines to stderr, with the level label
 * coloured through picocolors when stderr is a terminal. The threshold starts from
 * STEPGRAPH_LOG_LEVEL (default `warn`) and can be changed at runtime.
 */

import pc from 'picocolors';
import { z } from 'zod';

// ============================================================================
// Levels
// ============================================================================

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// ============================================================================
// Logger state
// ============================================================================

export interface LoggerOptions {
  level?: LogLevel;
  /** Force colours on or off (default: stderr is a TTY) */
  colors?: boolean;
  /** Line sink (default: process.stderr) */
  write?: (line: string) => void;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function levelFromEnv(): LogLevel {
  const parsed = LogLevelSchema.safeParse(process.env.STEPGRAPH_LOG_LEVEL);
  return parsed.success ? parsed.data : 'warn';
}

let threshold: LogLevel = levelFromEnv();
let colors = pc.createColors(Boolean(process.stderr.isTTY));
let write: (line: string) => void = (line) => {
  process.stderr.write(line);
};

/**
 * Change logger settings. Unset fields keep their current value.
 */
export function configureLogger(options: LoggerOptions): void {
  if (options.level) threshold = options.level;
  if (options.colors !== undefined) colors = pc.createColors(options.colors);
  if (options.write) write = options.write;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

// ============================================================================
// Factory
// ============================================================================

function label(level: Exclude<LogLevel, 'silent'>): string {
  switch (level) {
    case 'debug':
      return colors.dim('debug');
    case 'info':
      return colors.cyan('info');
    case 'warn':
      return colors.yellow('warn');
    case 'error':
      return colors.red('error');
  }
}

/**
 * Create a logger for a scope such as `step-template` or `pipeline-build`.
 */
export function getLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    write(`[${scope}] ${label(level)}: ${message}\n`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}
