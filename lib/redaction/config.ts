import { ConfigError } from '../core/errors';

/** Fields redacted when no explicit list is configured. */
export const PII_FIELDS = ['name', 'email', 'phone', 'ssn', 'password'] as const;

export const DEFAULT_SEPARATOR = ';';
export const DEFAULT_ASSIGNMENT = '=';
export const DEFAULT_PLACEHOLDER = '***';

/**
 * Configuration for `key=value` redaction.
 */
export interface RedactionConfig {
  /** Field names whose values are replaced. Matched exactly and case-sensitively. */
  fields: readonly string[];
  /** Character between segments. Default: ';' */
  separator: string;
  /** Character between a key and its value. Default: '=' */
  assignment: string;
  /** Text written in place of a sensitive value. Default: '***' */
  placeholder: string;
}

/**
 * Fills in defaults and freezes the result. The returned config is shared
 * read-only for the lifetime of whatever holds it.
 *
 * @throws ConfigError if the separator or assignment is empty or they are equal,
 * or a field name is blank
 */
export function resolveRedactionConfig(config: Partial<RedactionConfig> = {}): Readonly<RedactionConfig> {
  const separator = config.separator ?? DEFAULT_SEPARATOR;
  const assignment = config.assignment ?? DEFAULT_ASSIGNMENT;

  if (separator.length === 0) {
    throw new ConfigError('Redaction separator must not be empty');
  }
  if (assignment.length === 0) {
    throw new ConfigError('Redaction assignment must not be empty');
  }
  if (separator === assignment) {
    throw new ConfigError(`Redaction separator and assignment must differ (both are '${separator}')`);
  }

  const fields = config.fields ?? PII_FIELDS;
  for (const field of fields) {
    if (field.trim().length === 0) {
      throw new ConfigError('Redaction field names must not be empty');
    }
  }

  return Object.freeze({
    fields: Object.freeze([...new Set(fields)]),
    separator,
    assignment,
    placeholder: config.placeholder ?? DEFAULT_PLACEHOLDER,
  });
}
