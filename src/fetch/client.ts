import type { FetchClientProviderDefinition, FetchOptions, FetchResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

const ABSOLUTE_URL = /^https?:\/\//i;

/**
 * Thin wrapper around the native `fetch` API that:
 * - prefixes relative request paths with a configured base URL,
 * - passes absolute URLs (presigned uploads) through untouched,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Every status, successful or not, is handed back as a response. Deciding what
 * a status means is the caller's job.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Base URL prepended to all relative request paths, always ending in `/`. */
  #baseUrl: string;

  /** Creates a new instance of the fetch-client for a normalized base URL */
  constructor(baseUrl: string) {
    this.#baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  }

  /**
   * Executes a GET request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `v1/admin/users/123`).
   * @returns A promise resolving to `[error, response]`.
   */
  public get(endpoint: string, opts: Omit<FetchOptions, 'method' | 'body'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(endpoint, { ...opts, method: 'GET', body: undefined });
  }

  /**
   * Executes a PUT request against the given endpoint or absolute URL.
   */
  public put(endpoint: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(endpoint, { ...opts, method: 'PUT' });
  }

  /**
   * Executes a PATCH request against the given endpoint.
   */
  public patch(endpoint: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(endpoint, { ...opts, method: 'PATCH' });
  }

  /**
   * Executes a POST request against the given endpoint.
   */
  public post(endpoint: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(endpoint, { ...opts, method: 'POST' });
  }

  /**
   * Executes a DELETE request against the given endpoint.
   */
  public delete(endpoint: string, opts: Omit<FetchOptions, 'method' | 'body'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(endpoint, { ...opts, method: 'DELETE', body: undefined });
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Network / fetch rejections (including an aborted signal) come back as the
   * error slot with the original failure as `cause`.
   */
  async #request(endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    const [err, res] = await safeWrapAsync(() =>
      fetch(this.constructPath(endpoint), {
        body: opts.body,
        method: opts.method,
        headers: mergeHeaderOptions(opts.headers),
        ...(opts.redirect && { redirect: opts.redirect }),
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${opts.method} request in fetchClient`, { cause: err }), null];
    }

    // Cast this for some more type-safety on http-status-codes
    return [null, res as FetchResponse];
  }

  /**
   * Joins the base URL and endpoint into a single URL string.
   *
   * - Strips a leading slash from the endpoint to avoid `//` in the URL.
   * - Returns absolute `http(s)://` URLs unchanged.
   */
  private constructPath(endpoint: string): string {
    if (ABSOLUTE_URL.test(endpoint)) {
      return endpoint;
    }

    return `${this.#baseUrl}${endpoint.replace(/^\//, '')}`;
  }
}
