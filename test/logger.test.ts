import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import {
  ConsoleTransport,
  getLogger,
  getUserDataLogger,
  Logger,
  LogLevel,
  MessageFormatter,
  RedactingFormatter,
  resetLoggers,
  setInternalErrorHandler,
  type LogEntry,
  type Transport,
} from '../lib/index';
import { MemoryTransport, settle } from './test-utils';

class ThrowingTransport implements Transport {
  log(_entry: LogEntry): Promise<void> {
    throw new Error('sync failure');
  }
}

class RejectingTransport implements Transport {
  log(_entry: LogEntry): Promise<void> {
    return Promise.reject(new Error('async failure'));
  }

  flush(): Promise<void> {
    return Promise.reject(new Error('flush failure'));
  }
}

describe('Logger', () => {
  let memory: MemoryTransport;
  let internalError: Mock;

  beforeEach(() => {
    memory = new MemoryTransport();
    internalError = vi.fn();
    setInternalErrorHandler(internalError);
    resetLoggers();
  });

  afterEach(() => {
    setInternalErrorHandler(null);
  });

  it('skips entries below the configured level', () => {
    const logger = new Logger('test', { transports: [memory], level: LogLevel.WARN });

    logger.trace('t');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    logger.fatal('f');

    expect(memory.logs).toEqual(['w', 'e', 'f']);
  });

  it('defaults to INFO', () => {
    const logger = new Logger('test', { transports: [memory] });

    logger.debug('hidden');
    logger.info('shown');

    expect(memory.logs).toEqual(['shown']);
    expect(logger.isEnabledFor(LogLevel.DEBUG)).toBe(false);
  });

  it('builds entries with logger name, level and serialized args', () => {
    const logger = new Logger('records', { transports: [memory] });

    logger.error('failed', new Error('boom'), 7);

    const entry = memory.entries[0];
    expect(entry.loggerName).toBe('records');
    expect(entry.level).toBe(LogLevel.ERROR);
    expect(entry.levelName).toBe('ERROR');
    expect(entry.message).toBe('failed');
    expect(entry.args).toEqual([{ name: 'Error', message: 'boom' }, 7]);
  });

  it('renders timestamps in the configured style', () => {
    const logger = new Logger('t', { transports: [memory], timestampStyle: 'iso' });
    logger.info('a');
    logger.setOptions({ timestampStyle: 'asctime' });
    logger.info('b');

    expect(memory.entries[0].timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect(memory.entries[1].timestamp).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2},\d{3}$/);
  });

  it('hands its formatter to every transport', () => {
    const other = new MemoryTransport();
    const logger = new Logger('t', {
      transports: [memory, other],
      formatter: new RedactingFormatter(new MessageFormatter()),
    });

    logger.info('email=a@b.c;ip=1;');

    expect(memory.logs).toEqual(['email=***;ip=1;']);
    expect(other.logs).toEqual(['email=***;ip=1;']);
  });

  it('reports a transport that throws without failing the call', () => {
    const logger = new Logger('t', { transports: [new ThrowingTransport(), memory] });

    expect(() => logger.info('still logged')).not.toThrow();
    expect(memory.logs).toEqual(['still logged']);
    expect(internalError).toHaveBeenCalledWith(
      "Synchronous error in transport 'ThrowingTransport':",
      expect.objectContaining({ message: 'sync failure' }),
    );
  });

  it('reports a transport that rejects', async () => {
    const logger = new Logger('t', { transports: [new RejectingTransport()] });

    logger.info('x');
    await settle();

    expect(internalError).toHaveBeenCalledWith(
      "Async error in transport 'RejectingTransport':",
      expect.objectContaining({ message: 'async failure' }),
    );
  });

  it('reports a formatter failure inside a transport', async () => {
    const logger = new Logger('t', {
      transports: [memory],
      formatter: {
        format: () => {
          throw new Error('bad record');
        },
      },
    });

    logger.info('x');
    await settle();

    expect(memory.logs).toEqual([]);
    expect(internalError).toHaveBeenCalledWith(
      "Async error in transport 'MemoryTransport':",
      expect.objectContaining({ message: 'bad record' }),
    );
  });

  it('flushes every transport and reports flush failures', async () => {
    const logger = new Logger('t', { transports: [memory, new RejectingTransport()] });

    await logger.flushAll();

    expect(memory.flushed).toBe(1);
    expect(internalError).toHaveBeenCalledWith(
      "Error flushing transport 'RejectingTransport':",
      expect.objectContaining({ message: 'flush failure' }),
    );
  });

  it('manages transports', () => {
    const other = new MemoryTransport();
    const logger = new Logger('t', { transports: [] });

    logger.addTransport(memory);
    logger.addTransport(other);
    logger.info('both');
    logger.removeTransport(memory);
    logger.info('other only');
    logger.setTransports([memory]);
    logger.info('memory only');

    expect(memory.logs).toEqual(['both', 'memory only']);
    expect(other.logs).toEqual(['both', 'other only']);
  });

  it('uses a console transport by default', () => {
    expect(new Logger('t').options.transports).toEqual([expect.any(ConsoleTransport)]);
  });
});

describe('getLogger', () => {
  beforeEach(() => {
    resetLoggers();
  });

  it('returns one logger per name', () => {
    const first = getLogger('svc', { level: LogLevel.DEBUG });
    const second = getLogger('svc', { level: LogLevel.ERROR });

    expect(second).toBe(first);
    expect(second.options.level).toBe(LogLevel.DEBUG);
    expect(getLogger('other')).not.toBe(first);
  });
});

describe('getUserDataLogger', () => {
  beforeEach(() => {
    resetLoggers();
  });

  it('is configured once with a redacting console transport', () => {
    const logger = getUserDataLogger();

    expect(getUserDataLogger()).toBe(logger);
    expect(logger.name).toBe('user_data');
    expect(logger.options.level).toBe(LogLevel.INFO);
    expect(logger.options.transports).toHaveLength(1);
    expect(logger.options.transports?.[0]).toBeInstanceOf(ConsoleTransport);
    expect(logger.options.formatter).toBeInstanceOf(RedactingFormatter);
  });

  it('writes redacted lines to the console', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    getUserDataLogger().info('name=Bob;email=bob@x.io;ip=10.0.0.1;');

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0][0]).toMatch(
      /^\[USER_DATA\] user_data INFO \d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2},\d{3}: name=\*\*\*;email=\*\*\*;ip=10\.0\.0\.1;$/,
    );
  });

  it('keeps redaction when the name was requested through getLogger first', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    const viaGetLogger = getLogger('user_data', { formatter: new MessageFormatter() });

    expect(getUserDataLogger()).toBe(viaGetLogger);
    expect(viaGetLogger.options.formatter).toBeInstanceOf(RedactingFormatter);

    getUserDataLogger().info('name=Alice;ssn=123-45-6789;');

    expect(info).toHaveBeenCalledTimes(1);
    expect(String(info.mock.calls[0][0]).endsWith(': name=***;ssn=***;')).toBe(true);
  });

  it('builds a fresh logger after resetLoggers', () => {
    const before = getUserDataLogger();
    resetLoggers();

    expect(getUserDataLogger()).not.toBe(before);
  });
});
