export { LogLevelSchema, configureLogger, getLogger, getLogLevel, setLogLevel } from './logger.js';
export type { LogLevel, Logger, LoggerOptions } from './logger.js';
