/**
 * Logger utility for @aws-cli-gateway/runtime
 *
 * Provides a lightweight, dependency-free logging system with configurable
 * log levels and formatted output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Private - not exported from module
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
}

/** Receives fully formatted log lines. */
export type LogSink = (level: LogLevel, line: string, args: unknown[]) => void;

/** Writes each level to the matching console method. */
export const consoleSink: LogSink = (level, line, args) => {
  switch (level) {
    case 'debug':
      console.debug(line, ...args);
      break;
    case 'info':
      console.info(line, ...args);
      break;
    case 'warn':
      console.warn(line, ...args);
      break;
    case 'error':
      console.error(line, ...args);
      break;
  }
};

/**
 * Writes every level to stderr. Required for stdio transports, where stdout
 * carries protocol frames.
 */
export const stderrSink: LogSink = (_level, line, args) => {
  console.error(line, ...args);
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Create a logger instance with the specified minimum level
 *
 * @param minLevel - Minimum log level to output (default: 'info')
 * @param prefix - Prefix for log messages (default: '[aws-cli-gateway]')
 * @param sink - Destination for formatted lines (default: console)
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', '[executor]');
 * logger.info('Executing command'); // 2026-01-21T12:00:00.000Z INFO  [executor] Executing command
 * ```
 */
export function createLogger(
  minLevel: LogLevel = 'info',
  prefix = '[aws-cli-gateway]',
  sink: LogSink = consoleSink,
): Logger {
  let currentLevel = LOG_LEVELS[minLevel];

  const log = (level: LogLevel, message: string, ...args: unknown[]) => {
    if (LOG_LEVELS[level] >= currentLevel) {
      const timestamp = new Date().toISOString();
      const levelStr = level.toUpperCase().padEnd(5);
      sink(level, `${timestamp} ${levelStr} ${prefix} ${message}`, args);
    }
  };

  return {
    debug: (message, ...args) => log('debug', message, ...args),
    info: (message, ...args) => log('info', message, ...args),
    warn: (message, ...args) => log('warn', message, ...args),
    error: (message, ...args) => log('error', message, ...args),
    setLevel: (level) => {
      currentLevel = LOG_LEVELS[level];
    },
  };
}

/**
 * No-op logger for silent operation
 *
 * Use this when you want to disable logging entirely, such as in tests
 * or when creating components that accept an optional logger.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  setLevel: () => {},
};
