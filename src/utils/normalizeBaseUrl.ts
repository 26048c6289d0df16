import { InvalidBaseUrlError } from '../error/invalidBaseUrlError.js';
import type { SafeWrap } from './wrap.js';

/**
 * Trims the base URL, strips trailing slashes and requires an `http://` or
 * `https://` scheme. Nothing else about the URL is checked.
 */
export function normalizeBaseUrl(baseUrl: string): SafeWrap<InvalidBaseUrlError, string> {
  const trimmed = baseUrl.trim().replace(/\/+$/, '');
  if (!trimmed || !(trimmed.startsWith('http://') || trimmed.startsWith('https://'))) {
    return [new InvalidBaseUrlError(baseUrl), null];
  }

  return [null, trimmed];
}
