import type { ApiError } from './apiError.js';
import type { MissingLocationError } from './missingLocationError.js';
import type { TransportError } from './transportError.js';
import type { ValidationError } from './validationError.js';

/**
 * Every error a request operation can return. `ValidationError` only appears
 * directly when a request body or query failed its schema before sending;
 * response validation failures arrive wrapped in a `TransportError`.
 */
export type ClientError = ApiError | TransportError | MissingLocationError | ValidationError;
