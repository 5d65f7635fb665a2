import type { LogLevel } from './constants';

/**
 * Represents a single log record.
 */
export interface LogEntry {
  /** Formatted timestamp string */
  timestamp: string;
  /** Numeric log level */
  level: LogLevel;
  /** String representation of log level */
  levelName: string;
  /** Name of the logger that produced the entry */
  loggerName: string;
  /** Primary log message */
  message: string;
  /** Extra arguments passed after the message, already made serializable */
  args: unknown[];
}

/**
 * Interface for pluggable formatters.
 */
export interface LogFormatter {
  /**
   * Format a log entry into a display string.
   * @param entry - The log entry to format
   */
  format(entry: LogEntry): string;
}

/**
 * Options for transport operations.
 */
export interface TransportOptions {
  /** Formatter the logger was configured with */
  formatter?: LogFormatter;
}

/**
 * Interface for log transports.
 * Transports are responsible for writing log entries to a destination.
 */
export interface Transport {
  /**
   * Logs an entry to the transport destination.
   * @param entry - The log entry to write
   * @param options - Options passed down from the logger
   */
  log(entry: LogEntry, options?: TransportOptions): Promise<void>;

  /**
   * Flushes any pending log entries.
   * Should be called before application shutdown.
   */
  flush?(): Promise<void>;
}

/** Timestamp rendering used by a logger. */
export type TimestampStyle = 'iso' | 'asctime';

/**
 * Interface for logger configuration options.
 */
export interface LoggerOptions {
  /** Minimum log level to process. Defaults to LogLevel.INFO. */
  level?: LogLevel;
  /** Array of transports to use. Defaults to [new ConsoleTransport()]. */
  transports?: Transport[];
  /** Formatter handed to every transport. */
  formatter?: LogFormatter;
  /** How entry timestamps are rendered. Defaults to 'asctime'. */
  timestampStyle?: TimestampStyle;
}

/**
 * Base interface for logger methods.
 */
export interface BaseLogger {
  readonly name: string;
  fatal(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  trace(message: string, ...args: unknown[]): void;
  flushAll(): Promise<void>;
}
