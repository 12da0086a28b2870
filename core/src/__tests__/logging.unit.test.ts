/**
 * Tests for structured logging
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  LogLevels,
  createConsoleLogger,
  createLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  isLogLevel,
  withContext,
  type LogEntry,
} from '../logging.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('log levels', () => {
  it('should order levels', () => {
    expect(LogLevels.isAtLeast('warn', 'info')).toBe(true);
    expect(LogLevels.isAtLeast('debug', 'info')).toBe(false);
    expect(LogLevels.order('error')).toBe(3);
  });

  it('should recognise level names only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});

describe('createLogger', () => {
  it('should drop entries below the minimum level', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ minLevel: 'warn', output: entry => entries.push(entry) });
    logger.info('skipped');
    logger.warn('kept', { operation: 'plan' });
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 'warn', message: 'kept', context: { operation: 'plan' } });
  });

  it('should attach errors to error entries', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ output: entry => entries.push(entry) });
    const failure = new Error('bad');
    logger.error('failed', failure);
    expect(entries[0]?.error).toBe(failure);
    expect(entries[0]?.context).toBeUndefined();
  });
});

describe('createTestLogger', () => {
  it('should capture and filter entries', () => {
    const logger = createTestLogger();
    logger.debug('a');
    logger.info('b');
    logger.info('c');
    expect(logger.getLogs().map(e => e.message)).toEqual(['a', 'b', 'c']);
    expect(logger.getLogsByLevel('info')).toHaveLength(2);
    logger.clear();
    expect(logger.getLogs()).toEqual([]);
  });
});

describe('withContext', () => {
  it('should merge bound context with call context, call context winning', () => {
    const logger = createTestLogger();
    const child = withContext(logger, { service: 'query', operation: 'plan' });
    child.info('one');
    child.info('two', { operation: 'execute', rowsProcessed: 3 });
    const [one, two] = logger.getLogs();
    expect(one?.context).toEqual({ service: 'query', operation: 'plan' });
    expect(two?.context).toEqual({ service: 'query', operation: 'execute', rowsProcessed: 3 });
  });
});

describe('formatLogEntry', () => {
  const entry: LogEntry = { level: 'info', message: 'done', timestamp: 0, context: { rowsProcessed: 2 } };

  it('should render JSON', () => {
    expect(formatLogEntry(entry, 'json')).toBe(
      '{"level":"info","message":"done","timestamp":0,"context":{"rowsProcessed":2}}'
    );
  });

  it('should render a pretty line', () => {
    expect(formatLogEntry(entry, 'pretty')).toBe('[1970-01-01T00:00:00.000Z] INFO  done {"rowsProcessed":2}');
  });
});

describe('createConsoleLogger', () => {
  it('should write info to stdout and errors to stderr', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createConsoleLogger({ minLevel: 'info' });
    logger.debug('hidden');
    logger.info('shown');
    logger.error('failed');
    expect(log).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe('createNoopLogger', () => {
  it('should accept calls without output', () => {
    const logger = createNoopLogger();
    expect(() => logger.error('ignored', new Error('x'))).not.toThrow();
  });
});
