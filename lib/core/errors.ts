/**
 * Error thrown when configuration is invalid.
 */
export class ConfigError extends Error {
  override name = 'ConfigError';
}

/**
 * Error thrown when a secret cannot be encoded into the bytes the hash
 * primitive consumes without losing information.
 */
export class EncodingError extends Error {
  override name = 'EncodingError';
}

/**
 * A segment of a log line that does not follow `key<assign>value`.
 */
export interface MalformedSegment {
  /** Zero-based position of the segment in the line */
  index: number;
  /** Raw segment text */
  segment: string;
  reason: 'missing-assignment' | 'empty-key';
}

/**
 * Diagnostic describing a log line that does not fully follow the
 * `key=value;...` grammar. Redaction never throws it; it is only handed to
 * diagnostic hooks.
 */
export class MalformedMessageError extends Error {
  override name = 'MalformedMessageError';

  constructor(readonly segments: readonly MalformedSegment[]) {
    super(
      `Log line has ${segments.length} malformed segment${segments.length === 1 ? '' : 's'} ` +
        `at position${segments.length === 1 ? '' : 's'} ${segments.map(s => s.index).join(', ')}`,
    );
  }
}
