/**
 * Core entrypoint: exports the typed request client, auth variants and request definitions.
 * Import from here if you only need the generic client without the Releasy endpoint surface.
 * @module
 */

/**
 * Credentials variants and the header each one produces.
 */
export { type Auth, adminKey, apiKey, authHeaders, noAuth, operatorJwt } from '../auth/auth.js';

/**
 * Transport and logging contracts a client can be given.
 */
export type { FetchClientProvider, FetchClientProviderDefinition, Logger, RequestOptions } from '../types/request.js';

/**
 * Constructor options accepted by {@link RequestClient}.
 */
export type { RequestClientProps } from './client.js';

/**
 * Typed HTTP client that:
 * - constructs URLs based on endpoint definitions,
 * - attaches `Accept`, `User-Agent` and the active auth header,
 * - optionally validates request/response payloads via schemas,
 * - classifies every response into a typed value or an error.
 *
 * @typeParam Schema - The map of endpoint definitions available to the client.
 */
export { RequestClient } from './client.js';

/**
 * RequestDefinitions types up the possible variations of
 * the endpoints we create
 */
export type { DownloadResolution, RequestDefinitions } from './types.js';
