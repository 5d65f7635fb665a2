import type { LogEntry, LogFormatter } from '../core/types';
import { safeStringify } from '../utils/serialization';

export interface DefaultFormatterOptions {
  /** Bracketed tag at the start of every line. Default: 'USER_DATA' */
  tag?: string;
}

/**
 * Plain single-line formatter:
 * `[USER_DATA] user_data INFO 2024-03-01 09:05:07,042: name=***;ip=10.0.0.1;`
 *
 * Extra log arguments are appended after the message, separated by spaces.
 */
export class DefaultFormatter implements LogFormatter {
  private readonly tag: string;

  constructor(options: DefaultFormatterOptions = {}) {
    this.tag = options.tag ?? 'USER_DATA';
  }

  format(entry: LogEntry): string {
    const argsString = entry.args.length > 0 ? ` ${entry.args.map(arg => safeStringify(arg)).join(' ')}` : '';
    return `[${this.tag}] ${entry.loggerName} ${entry.levelName} ${entry.timestamp}: ${entry.message}${argsString}`;
  }
}
