import { describe, expect, it } from 'vitest';
import { ApiError, getApiError, isApiError } from './apiError.js';
import { getInvalidBaseUrlError, InvalidBaseUrlError, isInvalidBaseUrlError } from './invalidBaseUrlError.js';
import { isMissingLocationError, MissingLocationError } from './missingLocationError.js';
import { getTransportError, isTransportError, TransportError } from './transportError.js';

describe('ApiError', () => {
  it('formats status, code and message when the body parsed', () => {
    const err = new ApiError(404, { error: { code: 'not_found', message: 'customer not found' } }, '{}');

    expect(err.name).toBe('ApiError');
    expect(err.message).toBe('api error (status 404): not_found (customer not found)');
    expect(err.status).toBe(404);
    expect(err.code).toBe('not_found');
    expect(err.body).toBe('{}');
  });

  it('formats status only without a parsed body', () => {
    const err = new ApiError(502, null, '<html>bad gateway</html>');

    expect(err.message).toBe('api error (status 502)');
    expect(err.code).toBeNull();
    expect(err.error).toBeNull();
  });

  it('is found through a cause chain', () => {
    const err = new ApiError(409, null, null);

    expect(isApiError(err)).toBe(true);
    expect(getApiError(new Error('outer', { cause: err }))).toBe(err);
  });
});

describe('TransportError', () => {
  it('keeps its cause', () => {
    const cause = new TypeError('fetch failed');
    const err = new TransportError('error sending GET request', { cause });

    expect(err.name).toBe('TransportError');
    expect(err.cause).toBe(cause);
    expect(isTransportError(err)).toBe(true);
    expect(getTransportError(new Error('outer', { cause: err }))).toBe(err);
  });
});

describe('InvalidBaseUrlError', () => {
  it('carries the rejected url', () => {
    const err = new InvalidBaseUrlError('ftp://host');

    expect(err.message).toBe('invalid base url: ftp://host');
    expect(err.url).toBe('ftp://host');
    expect(isInvalidBaseUrlError(err)).toBe(true);
    expect(getInvalidBaseUrlError(err)).toBe(err);
  });
});

describe('MissingLocationError', () => {
  it('has a fixed message', () => {
    const err = new MissingLocationError();

    expect(err.name).toBe('MissingLocationError');
    expect(err.message).toBe('missing Location header in redirect response');
    expect(isMissingLocationError(err)).toBe(true);
    expect(isMissingLocationError(new Error('x'))).toBe(false);
  });
});
