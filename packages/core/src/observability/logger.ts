/**
 * Structured logging for Tidemark components.
 *
 * Every component accepts a `logger` option: a {@link Logger}, the
 * {@link LoggerOptions} to build one, or `false` to silence it. Components
 * are silent when the option is omitted.
 *
 * @module observability/logger
 */

/**
 * Log levels for structured logging
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface that consumers can implement
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Context name (e.g., 'SyncCoordinator', 'LocalStore') */
  context?: string;
  /** Custom log handler */
  handler?: (entry: LogEntry) => void;
  /** Enable logging (default: false in production) */
  enabled?: boolean;
}

/**
 * Value accepted by the `logger` option of every component
 */
export type LoggerOption = Logger | LoggerOptions | false;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function defaultLogHandler(entry: LogEntry): void {
  const prefix = entry.context ? `[${entry.context}]` : '';
  const timestamp = new Date(entry.timestamp).toISOString();
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';

  switch (entry.level) {
    case 'debug':
      console.debug(`${timestamp} DEBUG${prefix} ${entry.message}${dataStr}`);
      break;
    case 'info':
      console.info(`${timestamp} INFO${prefix} ${entry.message}${dataStr}`);
      break;
    case 'warn':
      console.warn(`${timestamp} WARN${prefix} ${entry.message}${dataStr}`);
      break;
    case 'error':
      console.error(`${timestamp} ERROR${prefix} ${entry.message}${dataStr}`, entry.error ?? '');
      break;
  }
}

/**
 * Create a structured logger
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', context: 'Engine' });
 * logger.info('Store opened', { schemaVersion: 3 });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    context,
    handler = defaultLogHandler,
    enabled = process.env.NODE_ENV !== 'production',
  } = options;

  const minPriority = LOG_LEVEL_PRIORITY[level];

  function log(
    logLevel: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!enabled || LOG_LEVEL_PRIORITY[logLevel] < minPriority) return;

    handler({
      level: logLevel,
      message,
      timestamp: Date.now(),
      context,
      data,
      error,
    });
  }

  return {
    debug(message: string, data?: Record<string, unknown>): void {
      log('debug', message, data);
    },
    info(message: string, data?: Record<string, unknown>): void {
      log('info', message, data);
    },
    warn(message: string, data?: Record<string, unknown>): void {
      log('warn', message, data);
    },
    error(message: string, error?: Error, data?: Record<string, unknown>): void {
      log('error', message, data, error);
    },
  };
}

/**
 * No-op logger that doesn't output anything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function isLogger(option: Logger | LoggerOptions): option is Logger {
  return (
    'debug' in option &&
    typeof option.debug === 'function' &&
    'error' in option &&
    typeof option.error === 'function'
  );
}

/**
 * Turn a component's `logger` option into a Logger. Options objects get the
 * component's context unless they name their own.
 */
export function resolveLogger(option: LoggerOption | undefined, context: string): Logger {
  if (option === undefined || option === false) {
    return noopLogger;
  }
  if (isLogger(option)) {
    return option;
  }
  return createLogger({ ...option, context: option.context ?? context });
}
