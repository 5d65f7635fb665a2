import { LogLevel } from '../core/constants';
import type { LogEntry, LogFormatter, Transport, TransportOptions } from '../core/types';
import { DEFAULT_FORMATTER } from '../formatters';
import { logInternalError } from '../utils/internalErrorHandler';

/**
 * ConsoleTransport writes formatted log lines to the console.
 */
export class ConsoleTransport implements Transport {
  /**
   * @param formatter - Formatter for this transport. Takes precedence over the
   *   one the logger passes in; DefaultFormatter is used when neither is set.
   */
  constructor(private readonly formatter?: LogFormatter) {}

  log(entry: LogEntry, options?: TransportOptions): Promise<void> {
    const formatter = this.formatter ?? options?.formatter ?? DEFAULT_FORMATTER;

    let formatted: string;
    try {
      formatted = formatter.format(entry);
    } catch (error) {
      // No unformatted fallback: the raw message may hold unredacted values.
      logInternalError(
        `ConsoleTransport could not format a ${entry.levelName} record from '${entry.loggerName}':`,
        error instanceof Error ? error.message : String(error),
      );
      return Promise.resolve();
    }

    const consoleMethod =
      entry.level === LogLevel.ERROR || entry.level === LogLevel.FATAL
        ? console.error
        : entry.level === LogLevel.WARN
          ? console.warn
          : entry.level === LogLevel.DEBUG || entry.level === LogLevel.TRACE
            ? console.debug
            : console.info;

    consoleMethod(formatted);
    return Promise.resolve();
  }

  /**
   * Console transport doesn't need to flush anything.
   */
  flush(): Promise<void> {
    return Promise.resolve();
  }
}
