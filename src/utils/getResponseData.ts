import { ApiError } from '../error/apiError.js';
import { type ErrorBody, errorBodySchema } from '../error/errorBody.js';
import { TransportError } from '../error/transportError.js';
import type { FetchResponse, Logger } from '../types/request.js';
import { validator } from './validator.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads a success response body and parses it as JSON.
 *
 * The body is read once as text, so a failed parse can still report what was
 * received. Read and parse failures both come back as a {@link TransportError}.
 */
export async function getResponseData<ReturnValue>(response: FetchResponse): SafeWrapAsync<TransportError, ReturnValue> {
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new TransportError('error reading response body', { cause: errText }), null];
  }

  const [errJson, json] = safeWrap(() => JSON.parse(text));
  if (errJson) {
    return [new TransportError(`error decoding response body (status ${response.status})`, { cause: errJson }), null];
  }

  return [null, json];
}

/**
 * Builds the error for a response outside the endpoint's success set.
 *
 * - The raw text is kept as `body`, or `null` when empty.
 * - A body in the canonical `{ error: { code, message } }` shape is attached
 *   as `error`; anything else leaves it `null`.
 * - A body that can't be read at all is a {@link TransportError}.
 */
export async function errorFromResponse(response: FetchResponse, logger?: Logger): Promise<ApiError | TransportError> {
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return new TransportError(`error reading error response body (status ${response.status})`, { cause: errText });
  }

  const error = await parseErrorBody(text);
  if (!error && text) {
    logger?.debug('http.error_body.unparsed', { status: response.status });
  }

  return new ApiError(response.status, error, text || null);
}

/** Parses the canonical error body, `null` when the text isn't one. */
async function parseErrorBody(text: string): Promise<ErrorBody | null> {
  if (!text) {
    return null;
  }

  const [errJson, json] = safeWrap<unknown>(() => JSON.parse(text));
  if (errJson) {
    return null;
  }

  const [errBody, body] = await validator(json, errorBodySchema);
  if (errBody) {
    return null;
  }

  return body;
}
