/**
 * A single `field<assign>value` occurrence located in a log line.
 */
export interface FieldMatch {
  /** Sensitive field name that matched */
  field: string;
  /** Value text, without the trailing separator */
  value: string;
  /** Offset of the field name in the line */
  index: number;
}

/**
 * Locates sensitive `key=value` segments in a log line.
 */
export interface FieldMatcher {
  readonly fields: readonly string[];
  readonly separator: string;
  readonly assignment: string;
  /** True if at least one sensitive segment is present. */
  test(message: string): boolean;
  /** Every sensitive segment, left to right, non-overlapping. */
  matches(message: string): FieldMatch[];
  /**
   * Rewrites the value of every sensitive segment with what `replacer` returns.
   * Field names, assignment characters and separators are kept as they are.
   */
  replace(message: string, replacer: (match: FieldMatch) => string): string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Builds the source of the field pattern.
 *
 * A field only counts at a segment boundary: the start of the line, right
 * after a separator (optionally followed by whitespace), or after whitespace
 * in leading text that holds no separator or assignment yet, which is where a
 * formatter header ends. The value is the shortest run up to the next
 * separator or the end of the line.
 */
function buildPatternSource(fields: readonly string[], separator: string, assignment: string): string {
  const sep = escapeRegExp(separator);
  const assign = escapeRegExp(assignment);
  const names = fields.map(escapeRegExp).join('|');
  const boundary = `^|${sep}\\s*|^(?:(?!${sep}|${assign})[\\s\\S])*\\s`;
  return `(?<=${boundary})(${names})(${assign})((?:(?!${sep})[\\s\\S])*)`;
}

class RegExpFieldMatcher implements FieldMatcher {
  readonly fields: readonly string[];
  private readonly global: RegExp | null;
  private readonly single: RegExp | null;

  constructor(
    fields: readonly string[],
    readonly separator: string,
    readonly assignment: string,
  ) {
    this.fields = Object.freeze([...new Set(fields)].filter(field => field.length > 0));

    if (this.fields.length === 0) {
      this.global = null;
      this.single = null;
    } else {
      const source = buildPatternSource(this.fields, separator, assignment);
      this.global = new RegExp(source, 'g');
      this.single = new RegExp(source);
    }

    Object.freeze(this);
  }

  test(message: string): boolean {
    return this.single !== null && this.single.test(message);
  }

  matches(message: string): FieldMatch[] {
    if (this.global === null) {
      return [];
    }
    return Array.from(message.matchAll(this.global), match => ({
      field: match[1],
      value: match[3],
      index: match.index ?? 0,
    }));
  }

  replace(message: string, replacer: (match: FieldMatch) => string): string {
    if (this.global === null) {
      return message;
    }
    return message.replace(
      this.global,
      (_whole: string, field: string, assign: string, value: string, index: number) =>
        `${field}${assign}${replacer({ field, value, index })}`,
    );
  }
}

/**
 * Compiles a matcher for the given sensitive field names.
 *
 * The returned matcher is frozen and safe to share. An empty field list
 * produces a matcher that never matches.
 */
export function buildFieldMatcher(
  fields: readonly string[],
  separator: string = ';',
  assignment: string = '=',
): FieldMatcher {
  return new RegExpFieldMatcher(fields, separator, assignment);
}
