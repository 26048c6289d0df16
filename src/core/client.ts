import { readFile } from 'node:fs/promises';
import { type Auth, authHeaders, noAuth } from '../auth/auth.js';
import type { ClientError } from '../error/clientError.js';
import type { InvalidBaseUrlError } from '../error/invalidBaseUrlError.js';
import { MissingLocationError } from '../error/missingLocationError.js';
import { TransportError } from '../error/transportError.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
  HeaderOptions,
  Logger,
  RequestOptions,
} from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { errorFromResponse, getResponseData } from '../utils/getResponseData.js';
import { normalizeBaseUrl } from '../utils/normalizeBaseUrl.js';
import { createTimeoutSignal } from '../utils/signals.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import type {
  DeleteArgs,
  DeleteEndpoint,
  DeleteReturn,
  DownloadResolution,
  GetArgs,
  GetEndpoint,
  GetReturn,
  HttpMethod,
  OperationDefinition,
  PatchArgs,
  PatchEndpoint,
  PatchReturn,
  PostArgs,
  PostEndpoint,
  PostReturn,
  PutArgs,
  PutEndpoint,
  PutReturn,
  RedirectArgs,
  RedirectEndpoint,
  RequestDefinitions,
} from './types.js';

/** Configuration for constructing a typed {@link RequestClient}. */
export interface RequestClientProps<Schema extends RequestDefinitions> {
  /** HTTP client implementation used for requests. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** Base URL of the API (e.g. `https://releasy.example.com`). Trimmed and stripped of trailing slashes. */
  baseUrl: string;
  /** Credentials sent with every API request. Defaults to none. */
  auth?: Auth;
  /** `User-Agent` sent with every API request, when set. */
  userAgent?: string;
  /** Global timeout in milliseconds, applied to every request including uploads. */
  timeout?: number;
  /**
   * Global validation flag.
   *
   * When `true`, request and response payloads are validated with the
   * configured schemas by default. Per-request options can override this.
   * @default true
   */
  validation?: boolean;
  /** Receives request lifecycle events. The client is silent without one. */
  logger?: Logger;
  /**
   * Map of endpoint definitions describing request/response schemas
   * and supported operations for each endpoint key.
   */
  endpoints: Schema;
}

/** Everything a client instance holds; shared as-is between `withAuth` copies. */
interface ClientState {
  fetchClient: FetchClientProviderDefinition;
  baseUrl: string;
  definitions: RequestDefinitions;
  auth: Auth;
  userAgent?: string;
  timeout?: number;
  validation: boolean;
  logger?: Logger;
}

/**
 * Typed HTTP client that:
 * - constructs URLs based on endpoint definitions,
 * - attaches `Accept`, `User-Agent` and the active auth header,
 * - optionally validates request/response payloads via schemas,
 * - classifies every response into a typed value or a {@link ClientError}.
 *
 * Instances are immutable. All methods return error-first tuples via
 * {@link SafeWrapAsync} and never throw for an expected failure.
 *
 * @typeParam Schema - The map of endpoint definitions available to the client.
 */
export class RequestClient<Schema extends RequestDefinitions> {
  /** Configuration, shared by every copy derived through {@link withAuth} */
  #state: Readonly<ClientState>;

  private constructor(state: ClientState) {
    this.#state = state;
  }

  /**
   * Validates the base URL and creates a client. Fails without touching the
   * network when the base URL is empty or lacks an `http(s)://` scheme.
   */
  static create<Schema extends RequestDefinitions>({
    fetchProvider = FetchClient,
    baseUrl,
    auth = noAuth(),
    userAgent,
    timeout,
    validation = true,
    logger,
    endpoints,
  }: RequestClientProps<Schema>): SafeWrap<InvalidBaseUrlError, RequestClient<Schema>> {
    const [errBaseUrl, normalized] = normalizeBaseUrl(baseUrl);
    if (errBaseUrl) {
      return [errBaseUrl, null];
    }

    return [
      null,
      new RequestClient<Schema>({
        fetchClient: new fetchProvider(normalized),
        baseUrl: normalized,
        definitions: endpoints,
        auth,
        userAgent,
        timeout,
        validation,
        logger,
      }),
    ];
  }

  /** Normalized base URL, without a trailing slash. */
  get baseUrl(): string {
    return this.#state.baseUrl;
  }

  /** Active credentials. */
  get auth(): Auth {
    return this.#state.auth;
  }

  /**
   * Returns a copy using other credentials. The transport and every other
   * setting are shared, the base URL is not validated again, and this client
   * is left unchanged.
   */
  withAuth(auth: Auth): RequestClient<Schema> {
    return new RequestClient<Schema>({ ...this.#state, auth });
  }

  /**
   * Performs a typed GET request against a configured endpoint.
   *
   * @typeParam Endpoint - Endpoint key within {@link Schema} that supports GET.
   * @param args - Tuple of `[endpoint, params, options]`.
   * @returns A promise resolving to `[error, data]` where `data` is the typed response.
   */
  get<Endpoint extends GetEndpoint<Schema>>(
    ...args: GetArgs<Schema, Endpoint>
  ): SafeWrapAsync<ClientError, GetReturn<Schema, Endpoint>> {
    const [endpoint, params, opts = {}] = args;
    return this.#execute<GetReturn<Schema, Endpoint>>('get', endpoint, params, opts);
  }

  /**
   * Performs a typed POST request against a configured endpoint.
   *
   * - Validates the request body using the endpoint `request` schema, when validating.
   * - Sends an empty body when the endpoint declares no `request` schema.
   * - Sends `Idempotency-Key` when `options.idempotencyKey` is set.
   *
   * @typeParam Endpoint - Endpoint key within {@link Schema} that supports POST.
   * @param args - Tuple of `[endpoint, params, body, options]`.
   */
  post<Endpoint extends PostEndpoint<Schema>>(
    ...args: PostArgs<Schema, Endpoint>
  ): SafeWrapAsync<ClientError, PostReturn<Schema, Endpoint>> {
    const [endpoint, params, data, opts = {}] = args;
    return this.#execute<PostReturn<Schema, Endpoint>>('post', endpoint, params, opts, data);
  }

  /**
   * Performs a typed PUT request against a configured endpoint.
   *
   * @typeParam Endpoint - Endpoint key within {@link Schema} that supports PUT.
   * @param args - Tuple of `[endpoint, params, body, options]`.
   */
  put<Endpoint extends PutEndpoint<Schema>>(
    ...args: PutArgs<Schema, Endpoint>
  ): SafeWrapAsync<ClientError, PutReturn<Schema, Endpoint>> {
    const [endpoint, params, data, opts = {}] = args;
    return this.#execute<PutReturn<Schema, Endpoint>>('put', endpoint, params, opts, data);
  }

  /**
   * Performs a typed PATCH request against a configured endpoint.
   *
   * @typeParam Endpoint - Endpoint key within {@link Schema} that supports PATCH.
   * @param args - Tuple of `[endpoint, params, body, options]`.
   */
  patch<Endpoint extends PatchEndpoint<Schema>>(
    ...args: PatchArgs<Schema, Endpoint>
  ): SafeWrapAsync<ClientError, PatchReturn<Schema, Endpoint>> {
    const [endpoint, params, data, opts = {}] = args;
    return this.#execute<PatchReturn<Schema, Endpoint>>('patch', endpoint, params, opts, data);
  }

  /**
   * Performs a typed DELETE request against a configured endpoint.
   *
   * @typeParam Endpoint - Endpoint key within {@link Schema} that supports DELETE.
   * @param args - Tuple of `[endpoint, params, options]`.
   */
  delete<Endpoint extends DeleteEndpoint<Schema>>(
    ...args: DeleteArgs<Schema, Endpoint>
  ): SafeWrapAsync<ClientError, DeleteReturn<Schema, Endpoint>> {
    const [endpoint, params, opts = {}] = args;
    return this.#execute<DeleteReturn<Schema, Endpoint>>('delete', endpoint, params, opts);
  }

  /**
   * Performs a GET without following redirects and resolves the `302`
   * `Location`.
   *
   * - `302` with `Location` gives `{ location }`.
   * - `302` without it gives a {@link MissingLocationError}.
   * - Any other status goes through the generic error path.
   *
   * @typeParam Endpoint - Endpoint key within {@link Schema} that supports `redirect`.
   * @param args - Tuple of `[endpoint, params, options]`.
   */
  async redirect<Endpoint extends RedirectEndpoint<Schema>>(
    ...args: RedirectArgs<Schema, Endpoint>
  ): SafeWrapAsync<ClientError, DownloadResolution> {
    const [endpoint, params, { validate = this.#state.validation } = {}] = args;
    const definition: OperationDefinition | undefined = this.#state.definitions[endpoint]?.redirect;

    const [errUrl, url] = await constructUrl(endpoint, params, definition, validate);
    if (errUrl) {
      return [errUrl, null];
    }

    const [errHeaders, headers] = this.#apiHeaders();
    if (errHeaders) {
      return [errHeaders, null];
    }

    return this.#send<DownloadResolution>('get', url, { headers, redirect: 'manual' }, async (response) => {
      if (response.status !== 302) {
        return [await errorFromResponse(response, this.#state.logger), null];
      }

      await response.body?.cancel();
      const location = response.headers.get('Location');
      if (location === null) {
        return [new MissingLocationError(), null];
      }

      return [null, { location }];
    });
  }

  /**
   * Uploads a local file to an absolute (presigned) URL with a raw `PUT`.
   *
   * No API headers are sent: no auth, no `Accept`, no `User-Agent`. A file that
   * can't be read is a {@link TransportError} returned before any network call.
   * Any 2xx is success.
   */
  async upload(url: string, filePath: string): SafeWrapAsync<ClientError, null> {
    const [errFile, bytes] = await safeWrapAsync(() => readFile(filePath));
    if (errFile) {
      return [new TransportError(`error reading upload file ${filePath}`, { cause: errFile }), null];
    }

    return this.#send<null>(
      'put',
      url,
      { body: bytes },
      async (response) => {
        if (!response.ok) {
          return [await errorFromResponse(response, this.#state.logger), null];
        }

        await response.body?.cancel();
        return [null, null];
      },
      withoutQuery(url),
    );
  }

  /**
   * Builds and sends a request for one endpoint operation.
   *
   * Query and body failing their schema are returned before sending. Only
   * operations with a `request` schema send a body, as JSON.
   */
  async #execute<ResponseType>(
    method: HttpMethod,
    endpoint: string,
    params: unknown,
    opts: RequestOptions,
    rawData?: unknown,
  ): SafeWrapAsync<ClientError, ResponseType> {
    const { validate = this.#state.validation, idempotencyKey } = opts;
    const definition: OperationDefinition | undefined = this.#state.definitions[endpoint]?.[method];
    if (!definition) {
      return [new TransportError(`error no definition found for ${method.toUpperCase()} ${endpoint}`), null];
    }

    const [errUrl, url] = await constructUrl(endpoint, params, definition, validate);
    if (errUrl) {
      return [errUrl, null];
    }

    let body: string | undefined;
    if (definition.request && (method === 'post' || method === 'put' || method === 'patch')) {
      let data = rawData;
      if (validate) {
        const [errParse, parsed] = await validator(data, definition.request);
        if (errParse) {
          return [errParse, null];
        }

        data = parsed;
      }

      body = JSON.stringify(data);
    }

    const [errHeaders, headers] = this.#apiHeaders({
      'Content-Type': body === undefined ? undefined : 'application/json',
      'Idempotency-Key': idempotencyKey,
    });
    if (errHeaders) {
      return [errHeaders, null];
    }

    return this.#send(method, url, { body, headers }, (response) =>
      this.#classify<ResponseType>(response, method, endpoint, definition, validate),
    );
  }

  /**
   * Turns a response into the operation's result.
   *
   * - An endpoint declaring `status` succeeds only on that exact status, with no value.
   * - An endpoint declaring `response` succeeds on any 2xx with the decoded body;
   *   a body that isn't JSON or doesn't match is a {@link TransportError}.
   * - Everything else is an {@link ApiError} built from the response body.
   */
  async #classify<ResponseType>(
    response: FetchResponse,
    method: HttpMethod,
    endpoint: string,
    definition: OperationDefinition,
    validate: boolean,
  ): SafeWrapAsync<ClientError, ResponseType> {
    if (definition.status !== undefined) {
      if (response.status !== definition.status) {
        return [await errorFromResponse(response, this.#state.logger), null];
      }

      await response.body?.cancel();
      // Bodiless success, the declared status is all there is to return
      return [null, null as ResponseType];
    }

    if (!response.ok) {
      return [await errorFromResponse(response, this.#state.logger), null];
    }

    const [errData, result] = await getResponseData<ResponseType>(response);
    if (errData) {
      return [errData, null];
    }

    if (validate === false || !definition.response) {
      return [null, result];
    }

    const [errParse, parsed] = await validator(result, definition.response);
    if (errParse) {
      return [
        new TransportError(`error decoding response body in ${method.toUpperCase()} ${endpoint}`, {
          cause: errParse,
        }),
        null,
      ];
    }

    return [null, parsed];
  }

  /**
   * Standard API headers: `Accept`, `User-Agent` when configured, the single
   * auth header of the active variant, then `extra`. A value `Headers`
   * rejects (a newline, a non-Latin-1 character) is a {@link TransportError}.
   */
  #apiHeaders(extra?: HeaderOptions): SafeWrap<TransportError, Headers> {
    const [err, headers] = safeWrap(() =>
      mergeHeaderOptions(
        {
          Accept: 'application/json',
          'User-Agent': this.#state.userAgent,
        },
        authHeaders(this.#state.auth),
        extra,
      ),
    );
    if (err) {
      return [new TransportError('error building request headers', { cause: err }), null];
    }

    return [null, headers];
  }

  /**
   * Sends one request through the provider and hands the response to
   * `classify`. The global timeout covers both and is cleared once they settle.
   * Provider failures (network, timeout) and a failed body read come back as a
   * {@link TransportError}.
   */
  async #send<Value>(
    method: HttpMethod,
    url: string,
    opts: Omit<FetchOptions, 'method'>,
    classify: (response: FetchResponse) => SafeWrapAsync<ClientError, Value>,
    logUrl = url,
  ): SafeWrapAsync<ClientError, Value> {
    const { logger, timeout, fetchClient } = this.#state;
    const timer = createTimeoutSignal(timeout);
    const verb = method.toUpperCase();

    try {
      logger?.debug('http.request', { method: verb, url: logUrl });
      const [errWrapped, wrapped] = await safeWrapAsync(() =>
        fetchClient[method](url, { ...opts, ...(timer && { signal: timer.signal }) }),
      );
      if (errWrapped) {
        logger?.warn('http.request.failed', { method: verb, url: logUrl, error: errWrapped.message });
        return [new TransportError(`error calling ${verb} request`, { cause: errWrapped }), null];
      }

      const [err, response] = wrapped;
      if (err) {
        logger?.warn('http.request.failed', { method: verb, url: logUrl, error: err.message });
        return [new TransportError(`error sending ${verb} request`, { cause: err }), null];
      }

      logger?.debug('http.response', { method: verb, url: logUrl, status: response.status });
      const [errClassify, result] = await safeWrapAsync(() => classify(response));
      if (errClassify) {
        return [new TransportError(`error reading ${verb} response`, { cause: errClassify }), null];
      }

      return result;
    } finally {
      timer?.clear();
    }
  }
}

/** Drops the query string, which carries the signature of presigned URLs. */
function withoutQuery(url: string): string {
  const index = url.indexOf('?');
  return index === -1 ? url : url.slice(0, index);
}
