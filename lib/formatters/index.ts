// Core formatter interface
export type { LogFormatter } from './LogFormatter';
import { DefaultFormatter } from './DefaultFormatter';
import type { LogFormatter } from './LogFormatter';
import { MessageFormatter } from './MessageFormatter';

export { DefaultFormatter } from './DefaultFormatter';
export type { DefaultFormatterOptions } from './DefaultFormatter';
export { MessageFormatter } from './MessageFormatter';
export { RedactingFormatter } from './RedactingFormatter';
export type { RedactingFormatterOptions } from './RedactingFormatter';

// Formatter registry for easy access
export const BUILT_IN_FORMATTERS = {
  default: DefaultFormatter,
  message: MessageFormatter,
} as const;

export type BuiltInFormatterName = keyof typeof BUILT_IN_FORMATTERS;

// Factory function for creating formatters by name
export function createFormatter(name: BuiltInFormatterName): LogFormatter {
  const FormatterClass = BUILT_IN_FORMATTERS[name];
  return new FormatterClass();
}

export const DEFAULT_FORMATTER = new DefaultFormatter();
