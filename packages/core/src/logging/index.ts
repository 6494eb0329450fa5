export { createLogger, silentLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logger.js';
