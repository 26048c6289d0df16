import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request exceeds the client's global timeout.
 * Surfaces as the `cause` of a {@link TransportError}.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';

  /** Creates a TimeoutError for the elapsed budget in milliseconds */
  constructor(timeoutMs: number, opts?: ErrorOptions) {
    super(`error request timed out after ${timeoutMs}ms`, opts);
    this.name = TimeoutError.name;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/**
 * Extract a {@link TimeoutError} from an unknown error value, following nested causes.
 */
export function getTimeoutError(error: unknown): TimeoutError | null {
  return unwrapErrorType(TimeoutError, error);
}
