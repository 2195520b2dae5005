import { serializeError } from 'serialize-error-cjs';

export type SerializedError = ReturnType<typeof serializeError>;

/**
 * Turns any thrown value into an `Error`. Error instances (and subclasses) are returned as is.
 */
export function normalizeError(error: unknown): Error {
  if (error instanceof Error) return error;

  switch (typeof error) {
    case 'string':
      return new Error(error);
    case 'symbol':
    case 'function':
      return new Error(error.toString());
    case 'object':
      if (error === null) return new Error('null');
      try {
        return new Error(JSON.stringify(error));
      } catch {
        return new Error(Object.prototype.toString.call(error));
      }
    default:
      return new Error(String(error));
  }
}

/** Plain-object view of any thrown value for structured logs. */
export function sanitizeError(error: unknown): SerializedError {
  return serializeError(normalizeError(error));
}
