// Core logger
export { defaultOptions, getLogger, getUserDataLogger, Logger, resetLoggers } from './core/logger';
export type { BaseLogger, LogEntry, LogFormatter, LoggerOptions, TimestampStyle, Transport, TransportOptions } from './core/types';

// Log levels and errors
export { LogLevel, USER_DATA_LOGGER_NAME } from './core/constants';
export { ConfigError, EncodingError, MalformedMessageError } from './core/errors';
export type { MalformedSegment } from './core/errors';

// Transports
export { ConsoleTransport } from './transports/ConsoleTransport';

// Formatters
export {
  BUILT_IN_FORMATTERS,
  createFormatter,
  DefaultFormatter,
  MessageFormatter,
  RedactingFormatter,
} from './formatters';
export type { BuiltInFormatterName, DefaultFormatterOptions, RedactingFormatterOptions } from './formatters';

// Redaction
export {
  buildFieldMatcher,
  DEFAULT_ASSIGNMENT,
  DEFAULT_PLACEHOLDER,
  DEFAULT_SEPARATOR,
  filterDatum,
  inspectMessage,
  PII_FIELDS,
  redactMessage,
  resolveRedactionConfig,
} from './redaction';
export type { FieldMatch, FieldMatcher, RedactionConfig } from './redaction';

// Credentials
export { CredentialHasher, DEFAULT_ROUNDS, hashPassword, isValid, MAX_ROUNDS } from './credentials';
export type { CredentialDigest, CredentialHasherOptions } from './credentials';

// Database collaborator
export { ENV_VARS, loadDatabaseConfig, MysqlUserStore, USER_COLUMNS } from './db';
export type { DatabaseConfig, UserRecordSet, UserStore } from './db';

// Helpers
export { getTimestamp, processLogArgs, safeStringify, serializeError } from './utils/serialization';
export {
  logInternalDebug,
  logInternalError,
  logInternalWarning,
  setInternalDebugHandler,
  setInternalErrorHandler,
  setInternalWarningHandler,
} from './utils/internalErrorHandler';
export type {
  InternalDebugHandler,
  InternalErrorHandler,
  InternalWarningHandler,
} from './utils/internalErrorHandler';
