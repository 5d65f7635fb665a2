/**
 * Log levels, most severe first. An entry is emitted when its level is
 * less than or equal to the logger's configured level.
 */
export enum LogLevel {
  FATAL = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
  TRACE = 5,
}

/** Name of the logger used for user records. */
export const USER_DATA_LOGGER_NAME = 'user_data';
