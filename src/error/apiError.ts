import type { ErrorBody } from './errorBody.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a response whose status falls outside the endpoint's
 * declared success set.
 *
 * `error` holds the parsed canonical error body when the server sent one,
 * `body` the raw response text when it was non-empty.
 */
export class ApiError extends Error {
  /** ApiError error-name */
  static name = 'ApiError';
  /** HTTP status of the rejected response */
  #status: number;
  /** Structured error detail, when the body parsed */
  #error: ErrorBody | null;
  /** Raw response text, when non-empty */
  #body: string | null;

  /** Creates a new ApiError from a status, the parsed error body and the raw text */
  constructor(status: number, error: ErrorBody | null, body: string | null, opts?: ErrorOptions) {
    super(
      error
        ? `api error (status ${status}): ${error.error.code} (${error.error.message})`
        : `api error (status ${status})`,
      opts,
    );
    this.name = ApiError.name;
    this.#status = status;
    this.#error = error;
    this.#body = body;
  }

  get status(): number {
    return this.#status;
  }

  get error(): ErrorBody | null {
    return this.#error;
  }

  get body(): string | null {
    return this.#body;
  }

  /** Shorthand for `error.error.code` */
  get code(): string | null {
    return this.#error?.error.code ?? null;
  }
}

/**
 * Type guard for {@link ApiError}.
 */
export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

/**
 * Extract an {@link ApiError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): ApiError | null {
  return unwrapErrorType(ApiError, error);
}
