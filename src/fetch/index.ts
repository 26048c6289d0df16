/**
 * Fetch entrypoint: exports the fetch client and supporting types.
 * @module
 */
export type { FetchClientProvider, FetchClientProviderDefinition, FetchOptions, FetchResponse } from '../types/request.js';
export { FetchClient } from './client.js';
export { mergeHeaderOptions } from './utils.js';
