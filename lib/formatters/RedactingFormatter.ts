import { MalformedMessageError } from '../core/errors';
import type { LogEntry, LogFormatter } from '../core/types';
import { resolveRedactionConfig, type RedactionConfig } from '../redaction/config';
import { buildFieldMatcher, type FieldMatcher } from '../redaction/matcher';
import { inspectMessage, redactMessage } from '../redaction/redactor';
import { logInternalError } from '../utils/internalErrorHandler';

export interface RedactingFormatterOptions extends Partial<RedactionConfig> {
  /**
   * Called with a diagnostic for every formatted line that does not follow
   * the `key=value;...` grammar. The line is still redacted and returned.
   * Segment text is replaced by the placeholder; only positions and reasons
   * reach the hook.
   */
  onMalformed?: (error: MalformedMessageError) => void;
}

/**
 * Decorates another formatter and redacts sensitive `key=value` segments in
 * whatever it produces.
 *
 * The field set, separator, assignment and placeholder are fixed when the
 * formatter is built; the matcher is compiled once in the constructor.
 * Errors thrown by the wrapped formatter propagate unchanged.
 *
 * @example
 * const formatter = new RedactingFormatter(new MessageFormatter(), { fields: ['email', 'ssn'] });
 * formatter.format(entry); // 'name=Alice;email=***;ssn=***;ip=1.2.3.4;'
 */
export class RedactingFormatter implements LogFormatter {
  readonly config: Readonly<RedactionConfig>;
  private readonly matcher: FieldMatcher;
  private readonly onMalformed?: (error: MalformedMessageError) => void;

  constructor(
    private readonly inner: LogFormatter,
    options: RedactingFormatterOptions = {},
  ) {
    const { onMalformed, ...config } = options;
    this.config = resolveRedactionConfig(config);
    this.matcher = buildFieldMatcher(this.config.fields, this.config.separator, this.config.assignment);
    this.onMalformed = onMalformed;
  }

  format(entry: LogEntry): string {
    const redacted = redactMessage(this.inner.format(entry), this.matcher, this.config.placeholder);

    if (this.onMalformed) {
      this.reportMalformed(redacted, this.onMalformed);
    }

    return redacted;
  }

  // A malformed segment is text the matcher could not vet, so it is masked too.
  private reportMalformed(redacted: string, hook: (error: MalformedMessageError) => void): void {
    const segments = inspectMessage(redacted, this.config.separator, this.config.assignment).map(segment => ({
      ...segment,
      segment: this.config.placeholder,
    }));
    if (segments.length === 0) {
      return;
    }
    try {
      hook(new MalformedMessageError(segments));
    } catch (error) {
      logInternalError('RedactingFormatter onMalformed hook failed:', error);
    }
  }
}
