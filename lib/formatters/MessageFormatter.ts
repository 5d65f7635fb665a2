import type { LogEntry, LogFormatter } from '../core/types';

/**
 * Emits the entry message and nothing else.
 */
export class MessageFormatter implements LogFormatter {
  format(entry: LogEntry): string {
    return entry.message;
  }
}
