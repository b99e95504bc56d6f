export {
  createLogger,
  noopLogger,
  resolveLogger,
  type LogEntry,
  type LogLevel,
  type Logger,
  type LoggerOption,
  type LoggerOptions,
} from './logger.js';
