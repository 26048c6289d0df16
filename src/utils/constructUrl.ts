import type { OperationDefinition } from '../core/types.js';
import { ValidationError } from '../error/validationError.js';
import { validator } from './validator.js';
import type { SafeWrapAsync } from './wrap.js';

/**
 * Constructs a relative URL by replacing path parameters and appending query parameters.
 * Handles strict validation of $search if enabled.
 *
 * Invalid query params and path params left unfilled are both reported as a
 * {@link ValidationError}; nothing is sent in either case.
 */
export async function constructUrl(
  path: string,
  params: unknown,
  definition: OperationDefinition | undefined,
  validation?: boolean,
): SafeWrapAsync<ValidationError, string> {
  let result = path;
  let query = '';

  if (params && typeof params === 'object') {
    // 1. Handle Query Params ($search)
    if ('$search' in params && params.$search) {
      let data: unknown = params.$search;
      if (validation && definition?.$search) {
        const [errParse, parsed] = await validator(params.$search, definition.$search);
        if (errParse) {
          return [errParse, null];
        }
        data = parsed;
      }
      query = encodeSearch(data);
    }

    // 2. Handle Direct Key Params (replacing {param} in URL)
    for (const [key, value] of Object.entries(params)) {
      if (key === '$search') {
        continue;
      }
      if (typeof value === 'string' || typeof value === 'number') {
        result = result.replaceAll(`{${key}}`, encodeURIComponent(String(value)));
      }
    }
  }

  // Check for remaining unreplaced braces
  if (result.includes('{') || result.includes('}')) {
    return [new ValidationError(`error constructing URL, path contains {} still ${result}`, []), null];
  }

  // Strip leading slash for clean concatenation with baseUrl
  if (result.startsWith('/')) {
    result = result.substring(1);
  }

  return [null, query ? `${result}?${query}` : result];
}

/**
 * Encodes a query record in its own key order. Absent and `null` fields are
 * skipped, booleans and numbers are written through `String`.
 */
export function encodeSearch(data: unknown): string {
  if (!data || typeof data !== 'object') {
    return '';
  }

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(data)) {
    if (value === undefined || value === null) {
      continue;
    }
    searchParams.append(key, String(value));
  }

  return searchParams.toString();
}
