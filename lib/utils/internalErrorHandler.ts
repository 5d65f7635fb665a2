/**
 * Reporting channel for failures inside the library itself: transports that
 * reject, formatters that throw, diagnostic hooks that blow up. Callers of the
 * logger never see these errors; they land here instead.
 */

export type InternalErrorHandler = (message: string, error?: unknown) => void;
export type InternalWarningHandler = (message: string, error?: unknown) => void;
export type InternalDebugHandler = (message: string, data?: unknown) => void;

type Severity = 'error' | 'warning' | 'debug';

function consoleHandler(write: (...data: unknown[]) => void) {
  return (message: string, detail?: unknown): void => {
    if (detail !== undefined) {
      write(message, detail);
    } else {
      write(message);
    }
  };
}

const defaults: Record<Severity, (message: string, detail?: unknown) => void> = {
  error: consoleHandler((...data) => console.error(...data)),
  warning: consoleHandler((...data) => console.warn(...data)),
  debug: consoleHandler((...data) => console.debug(...data)),
};

const handlers: Record<Severity, (message: string, detail?: unknown) => void> = { ...defaults };

function report(severity: Severity, message: string, detail?: unknown): void {
  try {
    handlers[severity](message, detail);
  } catch {
    defaults[severity](`[INTERNAL ${severity.toUpperCase()} HANDLER FAILED] ${message}`, detail);
  }
}

/**
 * Replace the handler for library errors. Pass null to restore console.error.
 */
export function setInternalErrorHandler(handler: InternalErrorHandler | null): void {
  handlers.error = handler ?? defaults.error;
}

/**
 * Replace the handler for library warnings. Pass null to restore console.warn.
 */
export function setInternalWarningHandler(handler: InternalWarningHandler | null): void {
  handlers.warning = handler ?? defaults.warning;
}

/**
 * Replace the handler for library debug output. Pass null to restore console.debug.
 */
export function setInternalDebugHandler(handler: InternalDebugHandler | null): void {
  handlers.debug = handler ?? defaults.debug;
}

export function logInternalError(message: string, error?: unknown): void {
  report('error', message, error);
}

export function logInternalWarning(message: string, error?: unknown): void {
  report('warning', message, error);
}

export function logInternalDebug(message: string, data?: unknown): void {
  report('debug', message, data);
}
