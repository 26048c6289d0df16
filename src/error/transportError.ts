import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error for everything that went wrong below the API contract: the network
 * call failed or timed out, a local upload source could not be read, or a
 * success response body could not be decoded into its declared type.
 * The underlying failure is kept as `cause`.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  static name = 'TransportError';

  constructor(message: string, opts?: ErrorOptions) {
    super(message, opts);
    this.name = TransportError.name;
  }
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): TransportError | null {
  return unwrapErrorType(TransportError, error);
}
