import { DefaultFormatter } from '../formatters/DefaultFormatter';
import { RedactingFormatter } from '../formatters/RedactingFormatter';
import { PII_FIELDS } from '../redaction/config';
import { ConsoleTransport } from '../transports/ConsoleTransport';
import { logInternalError } from '../utils/internalErrorHandler';
import { getTimestamp, processLogArgs } from '../utils/serialization';
import { LogLevel, USER_DATA_LOGGER_NAME } from './constants';
import type { BaseLogger, LogEntry, LoggerOptions, Transport, TransportOptions } from './types';

export const defaultOptions: LoggerOptions = {
  level: LogLevel.INFO,
  timestampStyle: 'asctime',
};

/**
 * Named logger that fans entries out to its transports.
 *
 * Nothing a transport or formatter does can throw back into the caller:
 * synchronous and asynchronous failures are routed to the internal error handler.
 */
export class Logger implements BaseLogger {
  options: LoggerOptions;

  constructor(
    readonly name: string,
    options: LoggerOptions = {},
  ) {
    this.options = {
      ...defaultOptions,
      transports: [new ConsoleTransport()],
      ...options,
    };
  }

  setOptions(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  isEnabledFor(level: LogLevel): boolean {
    const minLevel: LogLevel = this.options.level ?? LogLevel.INFO;
    return level <= minLevel;
  }

  private createLogEntry(level: LogLevel, message: string, optionalParams: unknown[]): LogEntry {
    return {
      timestamp: getTimestamp(this.options.timestampStyle),
      level,
      levelName: LogLevel[level],
      loggerName: this.name,
      message,
      args: processLogArgs(optionalParams),
    };
  }

  private log(level: LogLevel, message: string, ...optionalParams: unknown[]): void {
    if (!this.isEnabledFor(level)) {
      return;
    }

    const entry = this.createLogEntry(level, message, optionalParams);
    const transportOptions: TransportOptions = { formatter: this.options.formatter };

    for (const transport of this.options.transports ?? []) {
      try {
        void transport.log(entry, transportOptions).catch((error: unknown) => {
          logInternalError(`Async error in transport '${transport.constructor.name}':`, error);
        });
      } catch (error) {
        logInternalError(`Synchronous error in transport '${transport.constructor.name}':`, error);
      }
    }
  }

  fatal(message: string, ...optionalParams: unknown[]): void {
    this.log(LogLevel.FATAL, message, ...optionalParams);
  }

  error(message: string, ...optionalParams: unknown[]): void {
    this.log(LogLevel.ERROR, message, ...optionalParams);
  }

  warn(message: string, ...optionalParams: unknown[]): void {
    this.log(LogLevel.WARN, message, ...optionalParams);
  }

  info(message: string, ...optionalParams: unknown[]): void {
    this.log(LogLevel.INFO, message, ...optionalParams);
  }

  debug(message: string, ...optionalParams: unknown[]): void {
    this.log(LogLevel.DEBUG, message, ...optionalParams);
  }

  trace(message: string, ...optionalParams: unknown[]): void {
    this.log(LogLevel.TRACE, message, ...optionalParams);
  }

  async flushAll(): Promise<void> {
    const flushPromises = (this.options.transports ?? []).map(async transport => {
      try {
        await transport.flush?.();
      } catch (error) {
        logInternalError(`Error flushing transport '${transport.constructor.name}':`, error);
      }
    });

    await Promise.all(flushPromises);
  }

  // Transport management methods
  addTransport(transport: Transport): void {
    this.options.transports ??= [];
    this.options.transports.push(transport);
  }

  removeTransport(transport: Transport): void {
    if (!this.options.transports) {
      return;
    }
    const index = this.options.transports.indexOf(transport);
    if (index !== -1) {
      this.options.transports.splice(index, 1);
    }
  }

  setTransports(transports: Transport[]): void {
    this.options.transports = [...transports];
  }
}

const registry = new Map<string, Logger>();
let userDataLogger: Logger | undefined;

/**
 * Returns the logger registered under `name`, creating it on first use.
 * `options` only apply when the logger is created.
 *
 * The `user_data` name always resolves to {@link getUserDataLogger}, so it can
 * never be created without redaction.
 */
export function getLogger(name: string, options?: LoggerOptions): Logger {
  if (name === USER_DATA_LOGGER_NAME) {
    return getUserDataLogger();
  }
  let instance = registry.get(name);
  if (!instance) {
    instance = new Logger(name, options);
    registry.set(name, instance);
  }
  return instance;
}

/**
 * Logger for user records: INFO and above, one console transport, and every
 * line passed through a RedactingFormatter over {@link PII_FIELDS}.
 */
export function getUserDataLogger(): Logger {
  userDataLogger ??= new Logger(USER_DATA_LOGGER_NAME, {
    level: LogLevel.INFO,
    transports: [new ConsoleTransport()],
    formatter: new RedactingFormatter(new DefaultFormatter(), { fields: PII_FIELDS }),
  });
  return userDataLogger;
}

/**
 * Drops every cached logger. Mainly for tests.
 */
export function resetLoggers(): void {
  registry.clear();
  userDataLogger = undefined;
}
