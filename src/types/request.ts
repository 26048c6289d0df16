import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header layer accepted by the fetch wrapper; a nullish value unsets the header. */
export type HeaderOptions = Headers | Record<string, string | null | undefined>;

/** HTTP status codes the client can declare as an expected bodiless success. */
export type StatusCode =
  | 100
  | 101
  | 102
  | 103
  | 200
  | 201
  | 202
  | 203
  | 204
  | 205
  | 206
  | 207
  | 208
  | 214
  | 226
  | 300
  | 301
  | 302
  | 303
  | 304
  | 305
  | 307
  | 308
  | 400
  | 401
  | 402
  | 403
  | 404
  | 405
  | 406
  | 407
  | 408
  | 409
  | 410
  | 411
  | 412
  | 413
  | 414
  | 415
  | 416
  | 417
  | 418
  | 421
  | 422
  | 423
  | 424
  | 425
  | 426
  | 428
  | 429
  | 431
  | 451
  | 500
  | 501
  | 502
  | 503
  | 504
  | 505
  | 506
  | 507
  | 508
  | 510
  | 511;

/** Options passed down to each fetch request */
export interface FetchOptions extends Omit<RequestInit, 'headers'> {
  /** Headers sent with the request. */
  headers?: HeaderOptions;
  /** Abort signal, used for the global timeout. */
  signal?: AbortSignal;
}

/** Fetch response with a narrowed status code union. */
export interface FetchResponse extends Response {
  /** "Strong" type of status-codes {@link StatusCode} */
  status: StatusCode;
}

/** Per-call options accepted by the typed client operations. */
export interface RequestOptions {
  /**
   * Whether to validate payloads against the endpoint schemas, defaults to the
   * client-wide `validation` flag.
   */
  validate?: boolean;
  /** Token letting the server deduplicate a retried create. Sent as `Idempotency-Key`. */
  idempotencyKey?: string;
}

/** Structured logger the client reports request lifecycle events to. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/** Contract for HTTP transports used by RequestClient. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (url: string, options: Omit<FetchOptions, 'method' | 'body'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Executes a PUT request. */
  put: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Executes a PATCH request. */
  patch: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Executes a POST request. */
  post: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Executes a DELETE request. */
  delete: (url: string, options: Omit<FetchOptions, 'method' | 'body'>) => SafeWrapAsync<Error, FetchResponse>;
}

/** Factory signature for constructing HTTP transports. */
export interface FetchClientProvider {
  /** Creates a new transport bound to a normalized base URL. */
  new (baseUrl: string): FetchClientProviderDefinition;
}
