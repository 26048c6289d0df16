import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Configuration error raised when a client is created with a base URL that is
 * empty or lacks an `http://` / `https://` scheme.
 */
export class InvalidBaseUrlError extends Error {
  /** InvalidBaseUrlError error-name */
  static name = 'InvalidBaseUrlError';
  /** Base URL exactly as it was given */
  #url: string;

  /** Creates a new InvalidBaseUrlError with the rejected input */
  constructor(url: string, opts?: ErrorOptions) {
    super(`invalid base url: ${url}`, opts);
    this.name = InvalidBaseUrlError.name;
    this.#url = url;
  }

  get url(): string {
    return this.#url;
  }
}

/**
 * Type guard for {@link InvalidBaseUrlError}.
 */
export function isInvalidBaseUrlError(error: unknown): error is InvalidBaseUrlError {
  return error instanceof InvalidBaseUrlError;
}

/**
 * Extract an {@link InvalidBaseUrlError} from an unknown error value, following nested causes.
 */
export function getInvalidBaseUrlError(error: unknown): InvalidBaseUrlError | null {
  return unwrapErrorType(InvalidBaseUrlError, error);
}
