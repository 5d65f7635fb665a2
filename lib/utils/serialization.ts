export { getTimestamp } from './time';

/**
 * Serializes an error object with optional depth limiting for causes.
 * @param error - The error to serialize
 * @param maxDepth - Maximum depth to serialize nested causes
 */
export function serializeError(error: Error, maxDepth: number = 3): Record<string, unknown> {
  const serialized: Record<string, unknown> = {
    name: error.name,
    message: error.message,
  };

  if (error.cause !== undefined && maxDepth > 0) {
    serialized.cause =
      error.cause instanceof Error ? serializeError(error.cause, maxDepth - 1) : safeStringify(error.cause);
  }

  return serialized;
}

/**
 * Turns log call arguments into values every formatter can stringify.
 * Errors become plain objects; everything else passes through.
 */
export function processLogArgs(args: unknown[]): unknown[] {
  return args.map(arg => (arg instanceof Error ? serializeError(arg) : arg));
}

/**
 * Create a JSON replacer function that handles circular references.
 */
function createCircularReplacer(): (_key: string, value: unknown) => unknown {
  const seen = new WeakSet<object>();

  return function (_key: string, value: unknown) {
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (value === null || typeof value !== 'object') {
      return value;
    }
    if (seen.has(value)) {
      return '[Circular Reference]';
    }
    seen.add(value);
    return value;
  };
}

/**
 * Safely serialize any value, handling circular references and non-serializable objects.
 */
export function safeStringify(value: unknown, fallback = '[Non-serializable]'): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }

  if (typeof value === 'object') {
    try {
      return JSON.stringify(value, createCircularReplacer());
    } catch {
      return `[Object: ${Object.prototype.toString.call(value)}]`;
    }
  }

  try {
    return String(value);
  } catch {
    return fallback;
  }
}
