import type { MalformedSegment } from '../core/errors';
import { DEFAULT_ASSIGNMENT, DEFAULT_PLACEHOLDER, DEFAULT_SEPARATOR } from './config';
import { buildFieldMatcher, type FieldMatcher } from './matcher';

/**
 * Replaces the value of every sensitive segment in `message` with `placeholder`.
 *
 * Never throws: text that does not follow the `key=value;...` grammar is left
 * as it is, and only the segments the matcher recognizes are rewritten. A line
 * without sensitive segments is returned unchanged.
 */
export function redactMessage(
  message: string,
  matcher: FieldMatcher,
  placeholder: string = DEFAULT_PLACEHOLDER,
): string {
  // The placeholder goes in through a replacer, so `$&` in it stays literal.
  return matcher.replace(message, () => placeholder);
}

/**
 * One-shot form of {@link redactMessage} for callers without a prebuilt matcher.
 *
 * @example
 * filterDatum(['password'], '***', 'name=Bob;password=hunter2;', ';');
 * // 'name=Bob;password=***;'
 */
export function filterDatum(
  fields: readonly string[],
  redaction: string,
  message: string,
  separator: string = DEFAULT_SEPARATOR,
): string {
  return redactMessage(message, buildFieldMatcher(fields, separator, DEFAULT_ASSIGNMENT), redaction);
}

/**
 * Lists the segments of a line that are not `key<assign>value`.
 *
 * Redaction does not depend on this; it exists for callers that want to
 * know when a line strays from the grammar (a value holding the separator,
 * free text mixed into the line).
 */
export function inspectMessage(
  message: string,
  separator: string = DEFAULT_SEPARATOR,
  assignment: string = DEFAULT_ASSIGNMENT,
): MalformedSegment[] {
  const segments = message.split(separator);
  // `a=1;b=2;` ends with an empty segment that is not a defect.
  if (segments.length > 0 && segments[segments.length - 1].trim() === '') {
    segments.pop();
  }

  const issues: MalformedSegment[] = [];
  segments.forEach((segment, index) => {
    const at = segment.indexOf(assignment);
    if (at === -1) {
      issues.push({ index, segment, reason: 'missing-assignment' });
    } else if (segment.slice(0, at).trim() === '') {
      issues.push({ index, segment, reason: 'empty-key' });
    }
  });
  return issues;
}
