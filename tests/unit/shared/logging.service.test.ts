/**
 * Logging Service Tests
 */

import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';
import {
  getLogger,
  isLogLevel,
  LoggingService,
  setLogger,
  writeToStderr,
  type LogEntry,
  type McpNotificationSender,
} from '../../../src/shared/services/logging.service.js';

describe('LoggingService', () => {
  let entries: LogEntry[];

  function capture(level: ConstructorParameters<typeof LoggingService>[0]): LoggingService {
    return new LoggingService(level, (entry) => entries.push(entry));
  }

  beforeEach(() => {
    entries = [];
  });

  it('should drop entries below the minimum level', () => {
    const logger = capture('warning');

    logger.info('skipped');
    logger.warning('kept');

    expect(entries.map((entry) => [entry.level, entry.message])).toEqual([['warning', 'kept']]);
  });

  it('should change the minimum level', () => {
    const logger = capture('error');

    logger.setMinLevel('debug');
    logger.debug('now visible');

    expect(entries).toHaveLength(1);
  });

  it('should name child loggers after their scope', () => {
    const logger = capture('debug');
    const store = logger.child('store');

    logger.info('root');
    store.debug('row written', { table: 'book' });
    store.child('links').warning('nested');

    expect(store.name).toBe('form-processor.store');
    expect(entries.map((entry) => [entry.logger, entry.message])).toEqual([
      ['form-processor', 'root'],
      ['form-processor.store', 'row written'],
      ['form-processor.store.links', 'nested'],
    ]);
    expect(entries[1].context).toEqual({ table: 'book' });
  });

  it('should apply the root level to children', () => {
    const logger = capture('info');
    const form = logger.child('form.book');

    form.debug('hidden');
    logger.setMinLevel('debug');
    form.debug('shown');

    expect(entries.map((entry) => entry.message)).toEqual(['shown']);
  });

  it('should pass errors through to the entry', () => {
    const logger = capture('debug');
    const error = new Error('bad');

    logger.child('controller').critical('boom', error, { form: 'book' });

    expect(entries[0]).toMatchObject({
      level: 'critical',
      logger: 'form-processor.controller',
      message: 'boom',
      context: { form: 'book' },
      error,
    });
  });

  describe('MCP notifications', () => {
    let consoleError: MockInstance<typeof console.error>;

    beforeEach(() => {
      consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
      consoleError.mockRestore();
    });

    it('should send entries to the attached server instead of the sink', () => {
      const logger = capture('info');
      const sendLoggingMessage = vi.fn<McpNotificationSender['sendLoggingMessage']>().mockResolvedValue(undefined);
      logger.setMcpServer({ sendLoggingMessage });

      logger.child('form.book').info('saved', { id: 3 });
      logger.info('no context', {});

      expect(sendLoggingMessage).toHaveBeenCalledTimes(2);
      expect(sendLoggingMessage).toHaveBeenNthCalledWith(1, {
        level: 'info',
        logger: 'form-processor.form.book',
        data: { message: 'saved', timestamp: expect.any(String), context: { id: 3 } },
      });
      expect(sendLoggingMessage.mock.calls[1][0].data).not.toHaveProperty('context');
      expect(entries).toEqual([]);
    });

    it('should fall back to the sink when sending fails', async () => {
      const logger = capture('info');
      const failure = new Error('transport closed');
      logger.setMcpServer({ sendLoggingMessage: vi.fn().mockRejectedValue(failure) });

      logger.critical('lost');

      await vi.waitFor(() => expect(entries).toHaveLength(1));
      expect(entries[0].message).toBe('lost');
      expect(consoleError).toHaveBeenCalledWith('[LoggingService] Failed to send MCP notification:', failure);
    });

    it('should return to the sink once the server is detached', () => {
      const logger = capture('info');
      const sendLoggingMessage = vi.fn<McpNotificationSender['sendLoggingMessage']>().mockResolvedValue(undefined);
      logger.setMcpServer({ sendLoggingMessage });
      logger.setMcpServer(null);

      logger.info('local');

      expect(sendLoggingMessage).not.toHaveBeenCalled();
      expect(entries).toHaveLength(1);
    });
  });
});

describe('writeToStderr', () => {
  it('should write the level, logger name, context and error', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const error = new Error('bad');
    error.stack = 'Error: bad\n    at test';

    try {
      writeToStderr({
        level: 'error',
        logger: 'form-processor.store',
        message: 'boom',
        timestamp: Date.UTC(2024, 0, 2, 3, 4, 5),
        context: { table: 'book' },
        error,
      });

      expect(consoleError).toHaveBeenCalledTimes(1);
      expect(String(consoleError.mock.calls[0][0]).split('\n')).toEqual([
        '[2024-01-02T03:04:05.000Z] ERROR    form-processor.store: boom',
        '  Context: {"table":"book"}',
        '  Error: bad',
        '  Stack: Error: bad',
        '    at test',
      ]);
    } finally {
      consoleError.mockRestore();
    }
  });
});

describe('isLogLevel', () => {
  it('should accept only known level names', () => {
    expect(isLogLevel('warning')).toBe(true);
    expect(isLogLevel('warn')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe('getLogger', () => {
  it('should return the logger set with setLogger', () => {
    const original = getLogger();
    const replacement = new LoggingService('emergency');

    setLogger(replacement);
    try {
      expect(getLogger()).toBe(replacement);
    } finally {
      setLogger(original);
    }
  });
});
