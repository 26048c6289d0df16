/**
 * Error entrypoint: exports the client's error taxonomy and helpers for
 * identifying and unwrapping error types.
 * @module
 */

/** Response status outside the declared success set. */
export { ApiError, getApiError, isApiError } from './apiError.js';
/** Union of the errors a request operation can return. */
export type { ClientError } from './clientError.js';
/** Canonical `{ error: { code, message } }` body. */
export { type ErrorBody, errorBodySchema } from './errorBody.js';
/** Invalid base URL at construction time. */
export { getInvalidBaseUrlError, InvalidBaseUrlError, isInvalidBaseUrlError } from './invalidBaseUrlError.js';
/** Generic check matching an error constructor anywhere in a cause chain. */
export { isErrorType } from './isErrorType.js';
/** 302 without a `Location` header. */
export { isMissingLocationError, MissingLocationError } from './missingLocationError.js';
/** Global timeout elapsed. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Network, file or decode failure. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './unwrapErrorType.js';
/** Schema validation failure. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
