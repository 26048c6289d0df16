/**
 * Credentials a client sends with every API request. Exactly one variant is
 * active per client.
 */
export type Auth =
  | { type: 'none' }
  | { type: 'adminKey'; key: string }
  | { type: 'apiKey'; key: string }
  | { type: 'operatorJwt'; token: string };

/** Header carrying an admin key. */
export const ADMIN_KEY_HEADER = 'x-releasy-admin-key';
/** Header carrying a customer API key. */
export const API_KEY_HEADER = 'x-releasy-api-key';

/** No credentials. */
export function noAuth(): Auth {
  return { type: 'none' };
}

/** Administrative key, sent as `x-releasy-admin-key`. */
export function adminKey(key: string): Auth {
  return { type: 'adminKey', key };
}

/** Customer API key, sent as `x-releasy-api-key`. */
export function apiKey(key: string): Auth {
  return { type: 'apiKey', key };
}

/** Operator bearer token, sent as `Authorization: Bearer <token>`. */
export function operatorJwt(token: string): Auth {
  return { type: 'operatorJwt', token };
}

/**
 * The auth header for the active variant, as a header record. Empty for `none`.
 */
export function authHeaders(auth: Auth): Record<string, string> {
  switch (auth.type) {
    case 'none':
      return {};
    case 'adminKey':
      return { [ADMIN_KEY_HEADER]: auth.key };
    case 'apiKey':
      return { [API_KEY_HEADER]: auth.key };
    case 'operatorJwt':
      return { Authorization: `Bearer ${auth.token}` };
  }
}
