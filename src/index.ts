/**
 * Root entrypoint: the Releasy API client, its records, the generic typed
 * request client and the error taxonomy, from a single module surface.
 * @module
 */

/**
 * Client for the Releasy release-management API.
 */
export { authFromEnv, ReleasyClient, type ReleasyClientOptions, type ReleasyEnv, releasyEnvSchema } from './api/client.js';

/**
 * Endpoint definition map for the Releasy API.
 */
export { type Endpoints, endpoints } from './api/endpoints.js';

/**
 * Request, query and response records with their schemas.
 */
export * from './api/models.js';

/**
 * Credentials variants and the header each one produces.
 */
export { type Auth, adminKey, apiKey, authHeaders, noAuth, operatorJwt } from './auth/auth.js';

/**
 * Constructor options accepted by {@link RequestClient}.
 */
export type { RequestClientProps } from './core/client.js';

/**
 * Generic typed HTTP client the Releasy client is built on.
 */
export { RequestClient } from './core/client.js';

/**
 * Shape of endpoint definition maps consumed by {@link RequestClient}.
 */
export type { DownloadResolution, RequestDefinitions } from './core/types.js';

/**
 * Error taxonomy and helpers.
 */
export * from './error/index.js';

/**
 * Default fetch-backed transport.
 */
export { FetchClient } from './fetch/client.js';

/**
 * Transport, logging and per-call option contracts.
 */
export type { FetchClientProvider, FetchClientProviderDefinition, Logger, RequestOptions } from './types/request.js';

/**
 * Error-first result tuples.
 */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
