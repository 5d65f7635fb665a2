export type { RedactionConfig } from './config';
export {
  DEFAULT_ASSIGNMENT,
  DEFAULT_PLACEHOLDER,
  DEFAULT_SEPARATOR,
  PII_FIELDS,
  resolveRedactionConfig,
} from './config';
export type { FieldMatch, FieldMatcher } from './matcher';
export { buildFieldMatcher } from './matcher';
export { filterDatum, inspectMessage, redactMessage } from './redactor';
