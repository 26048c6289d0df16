import { describe, expect, it } from 'vitest';
import { adminKey, apiKey, authHeaders, noAuth, operatorJwt } from './auth.js';

describe('authHeaders', () => {
  it('sends nothing for none', () => {
    expect(authHeaders(noAuth())).toEqual({});
  });

  it('sends the admin key header', () => {
    expect(authHeaders(adminKey('test-admin-key'))).toEqual({ 'x-releasy-admin-key': 'test-admin-key' });
  });

  it('sends the api key header', () => {
    expect(authHeaders(apiKey('test-api-key'))).toEqual({ 'x-releasy-api-key': 'test-api-key' });
  });

  it('sends a bearer token for operators', () => {
    expect(authHeaders(operatorJwt('test-jwt'))).toEqual({ Authorization: 'Bearer test-jwt' });
  });

  it('yields at most one header per variant', () => {
    for (const auth of [noAuth(), adminKey('a'), apiKey('b'), operatorJwt('c')]) {
      expect(Object.keys(authHeaders(auth)).length).toBeLessThanOrEqual(1);
    }
  });
});
