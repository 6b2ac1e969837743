import { afterEach, describe, expect, it, vi } from 'vitest';
import { createConsoleSink, createLogger, createMemorySink, formatJson, formatPretty } from '../src/index.js';
import type { LogEntry } from '../src/index.js';

describe('logger', () => {
  describe('log levels', () => {
    it('development skips debug logs', () => {
      const sink = createMemorySink();
      const logger = createLogger({ sink });

      logger.debug('debug_event', { foo: 'bar' });
      logger.info('info_event', { foo: 'bar' });

      expect(sink.entries).toHaveLength(1);
      expect(sink.entries[0].level).toBe('info');
      expect(sink.entries[0].event_type).toBe('info_event');
      expect(sink.entries[0].metadata).toEqual({ foo: 'bar' });
    });

    it('test environment keeps debug logs', () => {
      const sink = createMemorySink();
      const logger = createLogger({ sink, environment: 'test' });

      logger.debug('debug_event');

      expect(sink.entries.map((e) => e.level)).toEqual(['debug']);
    });

    it('production only keeps warnings and above', () => {
      const sink = createMemorySink();
      const logger = createLogger({ sink, environment: 'production' });

      logger.info('info_event');
      logger.warn('warn_event');
      logger.error('error_event');
      logger.fatal('fatal_event');

      expect(sink.entries.map((e) => e.event_type)).toEqual([
        'warn_event',
        'error_event',
        'fatal_event',
      ]);
    });

    it('minLevel overrides the environment default', () => {
      const sink = createMemorySink();
      const logger = createLogger({ sink, environment: 'test', minLevel: 'error' });

      logger.warn('warn_event');
      logger.error('error_event');

      expect(sink.entries.map((e) => e.event_type)).toEqual(['error_event']);
    });
  });

  describe('messages', () => {
    it('lifts a string message out of the metadata', () => {
      const sink = createMemorySink();
      const logger = createLogger({ sink });

      logger.info('case_passed', { message: 'all good', case_index: 1 });

      expect(sink.entries[0].message).toBe('all good');
      expect(sink.entries[0].metadata).toEqual({ case_index: 1 });
    });

    it('keeps a non-string message in the metadata', () => {
      const sink = createMemorySink();
      const logger = createLogger({ sink });

      logger.info('event', { message: 42 });

      expect(sink.entries[0].message).toBeUndefined();
      expect(sink.entries[0].metadata).toEqual({ message: 42 });
    });
  });

  describe('stack traces', () => {
    it('drops stack metadata in production', () => {
      const sink = createMemorySink();
      const logger = createLogger({ sink, environment: 'production' });

      logger.error('fault', { stack: 'Error: boom\n    at x', reason: 'boom' });

      expect(sink.entries[0].metadata).toEqual({ reason: 'boom' });
    });

    it('keeps stack metadata in development', () => {
      const sink = createMemorySink();
      const logger = createLogger({ sink });

      logger.error('fault', { stack: 'trace' });

      expect(sink.entries[0].metadata).toEqual({ stack: 'trace' });
    });
  });

  describe('child loggers', () => {
    it('child inherits parent metadata', () => {
      const sink = createMemorySink();
      const logger = createLogger({ sink });
      const child = logger.child({ caseIndex: 3 });

      child.info('child_event', { action: 'run' });

      expect(sink.entries[0].metadata).toEqual({ caseIndex: 3, action: 'run' });
    });

    it('child metadata overwrites parent when keys conflict', () => {
      const sink = createMemorySink();
      const logger = createLogger({ sink });
      const grandchild = logger.child({ key: 'parent_value' }).child({ key: 'child_value' });

      grandchild.info('conflict_event');

      expect(sink.entries[0].metadata.key).toBe('child_value');
    });

    it('siblings have isolated metadata', () => {
      const sink = createMemorySink();
      const logger = createLogger({ sink });

      logger.child({ branch: 'a' }).info('event_a');
      logger.child({ branch: 'b' }).info('event_b');

      expect(sink.entries.map((e) => e.metadata.branch)).toEqual(['a', 'b']);
    });
  });

  describe('memory sink', () => {
    it('clear empties the entry list', () => {
      const sink = createMemorySink();
      const logger = createLogger({ sink });

      logger.info('one');
      sink.clear();

      expect(sink.entries).toHaveLength(0);
    });
  });
});

describe('formatting', () => {
  const entry: LogEntry = {
    id: 'log_1',
    level: 'warn',
    event_type: 'case_failed',
    message: '---- Test case 1: "demo" FAILED',
    metadata: {},
    timestamp: Date.UTC(2024, 0, 2, 3, 4, 5),
  };

  it('pretty format prints the message after the padded level', () => {
    expect(formatPretty(entry, false)).toBe('WARN  ---- Test case 1: "demo" FAILED');
  });

  it('pretty format falls back to event type and metadata', () => {
    const bare: LogEntry = { ...entry, message: undefined, metadata: { stage: 'TEST' } };
    expect(formatPretty(bare, false)).toBe('WARN  case_failed {"stage":"TEST"}');
  });

  it('json format writes an ISO timestamp', () => {
    expect(JSON.parse(formatJson(entry))).toEqual({
      level: 'warn',
      event_type: 'case_failed',
      message: '---- Test case 1: "demo" FAILED',
      metadata: {},
      timestamp: '2024-01-02T03:04:05.000Z',
    });
  });
});

describe('console sink', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('routes errors to stderr and the rest to stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger({ sink: createConsoleSink('json') });

    logger.info('info_event');
    logger.error('error_event');

    expect(log).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(error.mock.calls[0][0])).event_type).toBe('error_event');
  });
});
