import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  configureLogging,
  resetLogging,
  META_STRING_MAX_LENGTH,
  type LogEntry,
  type LogSink,
} from './logger.js';

// ---------------------------------------------------------------------------
// Test sink that captures log entries
// ---------------------------------------------------------------------------

function createTestSink(): { sink: LogSink; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const sink: LogSink = (entry: LogEntry) => {
    entries.push(entry);
  };
  return { sink, entries };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    const test = createTestSink();
    entries = test.entries;
    configureLogging({ level: 'debug', sink: test.sink });
  });

  afterEach(() => {
    resetLogging();
  });

  // -----------------------------------------------------------------------
  // Log entry structure
  // -----------------------------------------------------------------------

  describe('log entry structure', () => {
    it('carries level, component and msg', () => {
      const logger = createLogger('adapter');
      logger.info('test message');

      expect(entries).toHaveLength(1);
      const entry = entries[0];
      expect(entry.level).toBe('info');
      expect(entry.component).toBe('adapter');
      expect(entry.msg).toBe('test message');
    });

    it('timestamp is ISO 8601 format', () => {
      const logger = createLogger('adapter');
      logger.info('test');

      const ts = entries[0].ts;
      expect(new Date(ts).toISOString()).toBe(ts);
    });

    it('includes optional metadata when provided', () => {
      const logger = createLogger('reaper');
      logger.debug('reaper stopped', { ticks: 3, reclaimed: 1 });

      expect(entries[0].meta).toEqual({ ticks: 3, reclaimed: 1 });
    });

    it('omits meta field when no metadata is provided', () => {
      const logger = createLogger('adapter');
      logger.info('simple message');

      expect(entries[0].meta).toBeUndefined();
    });
  });

  // -----------------------------------------------------------------------
  // Level filtering
  // -----------------------------------------------------------------------

  describe('level filtering', () => {
    it('drops entries below the configured level', () => {
      configureLogging({ level: 'warn' });
      const logger = createLogger('event-loop');

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('resetLogging restores info level', () => {
      const { sink, entries: captured } = createTestSink();
      resetLogging();
      configureLogging({ sink });
      const logger = createLogger('event-loop');

      logger.debug('hidden');
      logger.info('shown');

      expect(captured.map((e) => e.msg)).toEqual(['shown']);
    });
  });

  // -----------------------------------------------------------------------
  // Promoted fields
  // -----------------------------------------------------------------------

  describe('promoted fields', () => {
    it('promotes fd, socket_type, error_code and duration_ms to the top level', () => {
      const logger = createLogger('adapter');
      logger.error('poll start failed', {
        fd: 7,
        socket_type: 'rep',
        error_code: 'REGISTRATION_FAILED',
        duration_ms: 12,
        attempt: 2,
      });

      const entry = entries[0];
      expect(entry.fd).toBe(7);
      expect(entry.socket_type).toBe('rep');
      expect(entry.error_code).toBe('REGISTRATION_FAILED');
      expect(entry.duration_ms).toBe(12);
      expect(entry.meta).toEqual({ attempt: 2 });
    });

    it('does not promote fields of the wrong type', () => {
      const logger = createLogger('adapter');
      logger.info('odd', { fd: 'seven' });

      expect(entries[0].fd).toBeUndefined();
      expect(entries[0].meta).toBeUndefined();
    });

    it('withContext binds fd and socket_type to every entry', () => {
      const logger = createLogger('adapter').withContext({ fd: 4, socket_type: 'pull' });
      logger.debug('drain finished');

      expect(entries[0].fd).toBe(4);
      expect(entries[0].socket_type).toBe('pull');
    });

    it('metadata overrides bound context', () => {
      const logger = createLogger('adapter').withContext({ fd: 4 });
      logger.debug('x', { fd: 9 });

      expect(entries[0].fd).toBe(9);
    });
  });

  // -----------------------------------------------------------------------
  // child
  // -----------------------------------------------------------------------

  describe('child', () => {
    it('scopes the component name and keeps the bound context', () => {
      const logger = createLogger('adapter').withContext({ fd: 5 }).child('drain');
      logger.info('hello');

      expect(entries[0].component).toBe('adapter:drain');
      expect(entries[0].fd).toBe(5);
    });
  });

  // -----------------------------------------------------------------------
  // Metadata sanitization
  // -----------------------------------------------------------------------

  describe('metadata sanitization', () => {
    it('serializes Error values', () => {
      const logger = createLogger('adapter');
      const err = new Error('boom');
      logger.error('handler threw', { error: err });

      expect(entries[0].meta).toEqual({
        error: { name: 'Error', message: 'boom', stack: err.stack },
      });
    });

    it('summarizes Buffers by size', () => {
      const logger = createLogger('adapter');
      logger.debug('frame', { frame: Buffer.from('hello') });

      expect(entries[0].meta).toEqual({ frame: { bytes: 5 } });
    });

    it('truncates long strings', () => {
      const logger = createLogger('adapter');
      logger.info('long', { text: 'x'.repeat(META_STRING_MAX_LENGTH + 10) });

      expect(entries[0].meta).toEqual({
        text: 'x'.repeat(META_STRING_MAX_LENGTH) + '...[truncated]',
      });
    });

    it('keeps strings at the limit intact', () => {
      const logger = createLogger('adapter');
      const text = 'y'.repeat(META_STRING_MAX_LENGTH);
      logger.info('exact', { text });

      expect(entries[0].meta).toEqual({ text });
    });
  });
});
