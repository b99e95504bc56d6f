import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  createLogger,
  noopLogger,
  resolveLogger,
  type LogEntry,
  type Logger,
} from '../observability/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('log levels', () => {
    it('should call handler for info and above at default level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ context: 'test', handler: (e) => entries.push(e) });
      logger.debug('debug msg');
      logger.info('info msg');
      logger.warn('warn msg');
      logger.error('error msg');
      expect(entries.map((e) => e.level)).toEqual(['info', 'warn', 'error']);
    });

    it('should include debug when level is debug', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ level: 'debug', handler: (e) => entries.push(e) });
      logger.debug('debug msg');
      expect(entries).toHaveLength(1);
    });

    it('should only emit errors at error level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ level: 'error', handler: (e) => entries.push(e) });
      logger.info('info');
      logger.warn('warn');
      logger.error('error');
      expect(entries).toHaveLength(1);
    });

    it('should emit nothing when disabled', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ enabled: false, handler: (e) => entries.push(e) });
      logger.error('error');
      expect(entries).toEqual([]);
    });
  });

  describe('entries', () => {
    it('should carry context, data and error', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ context: 'SyncQueue', handler: (e) => entries.push(e) });
      const failure = new Error('disk full');

      logger.error('write failed', failure, { sequence: 4 });

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        level: 'error',
        message: 'write failed',
        context: 'SyncQueue',
        data: { sequence: 4 },
        error: failure,
      });
      expect(typeof entries[0]?.timestamp).toBe('number');
    });
  });

  describe('default handler', () => {
    it('should write warnings to console.warn with the context prefix', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const logger = createLogger({ context: 'Engine', enabled: true });

      logger.warn('slow', { ms: 12 });

      expect(spy).toHaveBeenCalledTimes(1);
      const line = String(spy.mock.calls[0]?.[0]);
      expect(line.endsWith(' WARN[Engine] slow {"ms":12}')).toBe(true);
    });
  });
});

describe('resolveLogger', () => {
  it('should return the no-op logger for undefined and false', () => {
    expect(resolveLogger(undefined, 'X')).toBe(noopLogger);
    expect(resolveLogger(false, 'X')).toBe(noopLogger);
  });

  it('should pass a Logger through unchanged', () => {
    const custom: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    expect(resolveLogger(custom, 'X')).toBe(custom);
  });

  it('should give options the component context unless they name one', () => {
    const entries: LogEntry[] = [];
    const handler = (e: LogEntry): void => {
      entries.push(e);
    };

    resolveLogger({ handler }, 'LocalStore').info('a');
    resolveLogger({ handler, context: 'Mine' }, 'LocalStore').info('b');

    expect(entries.map((e) => e.context)).toEqual(['LocalStore', 'Mine']);
  });
});
