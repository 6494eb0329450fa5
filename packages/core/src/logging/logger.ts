import { sanitizeLogMessage } from '../validation/input-validator.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  /** Lowest level written (default: 'info') */
  level?: LogLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  const known: readonly string[] = LOG_LEVELS;
  return typeof value === 'string' && known.includes(value);
}

/**
 * Console logger that prefixes every line with `[scope]`.
 *
 * Messages often embed peer-supplied text, so each one is passed through
 * {@link sanitizeLogMessage} before it is written.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const enabled = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold;
  const line = (message: string): string => `[${scope}] ${sanitizeLogMessage(message)}`;

  return {
    debug(message, ...args) {
      if (enabled('debug')) console.debug(line(message), ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.info(line(message), ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(line(message), ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(line(message), ...args);
    },
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
