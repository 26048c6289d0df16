import { afterEach, beforeEach, describe, expect, type Mock, test, vi } from 'vitest';
import { adminKey, apiKey, noAuth, operatorJwt } from '../auth/auth.js';
import { InvalidBaseUrlError } from '../error/invalidBaseUrlError.js';
import { TransportError } from '../error/transportError.js';
import { getValidationError, ValidationError } from '../error/validationError.js';
import { authFromEnv, ReleasyClient, releasyEnvSchema } from './client.js';

const BASE_URL = 'https://releasy.example.com';

const fromEnvOrThrow = (env: Record<string, string | undefined>) => {
  const [err, client] = ReleasyClient.fromEnv(env);
  if (err) {
    throw err;
  }

  return client;
};

describe('authFromEnv', () => {
  test('prefers the operator JWT over keys', () => {
    const env = releasyEnvSchema.parse({
      RELEASY_OPERATOR_JWT: 'test-jwt',
      RELEASY_ADMIN_KEY: 'test-admin-key',
      RELEASY_API_KEY: 'test-api-key',
    });

    expect(authFromEnv(env)).toEqual(operatorJwt('test-jwt'));
  });

  test('prefers the admin key over the API key', () => {
    const env = releasyEnvSchema.parse({ RELEASY_ADMIN_KEY: 'test-admin-key', RELEASY_API_KEY: 'test-api-key' });

    expect(authFromEnv(env)).toEqual(adminKey('test-admin-key'));
  });

  test('falls back to the API key, then none', () => {
    expect(authFromEnv(releasyEnvSchema.parse({ RELEASY_API_KEY: 'test-api-key' }))).toEqual(apiKey('test-api-key'));
    expect(authFromEnv(releasyEnvSchema.parse({}))).toEqual(noAuth());
  });

  test('treats blank variables as unset', () => {
    const env = releasyEnvSchema.parse({ RELEASY_OPERATOR_JWT: '', RELEASY_API_KEY: 'test-api-key' });

    expect(authFromEnv(env)).toEqual(apiKey('test-api-key'));
  });
});

describe('ReleasyClient.fromEnv', () => {
  test('reads base url and auth', () => {
    const client = fromEnvOrThrow({ RELEASY_BASE_URL: `${BASE_URL}/`, RELEASY_ADMIN_KEY: 'test-admin-key' });

    expect(client.baseUrl).toBe(BASE_URL);
    expect(client.auth).toEqual(adminKey('test-admin-key'));
  });

  test('fails with InvalidBaseUrlError when no base url is set', () => {
    const [err, client] = ReleasyClient.fromEnv({ RELEASY_API_KEY: 'test-api-key' });

    expect(client).toBeNull();
    expect(err).toBeInstanceOf(InvalidBaseUrlError);
  });

  test('rejects a timeout that is not a whole number', () => {
    const [err, client] = ReleasyClient.fromEnv({ RELEASY_BASE_URL: BASE_URL, RELEASY_TIMEOUT_MS: '1.5s' });

    expect(client).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(getValidationError(err)?.issues[0]?.path).toEqual(['RELEASY_TIMEOUT_MS']);
  });

  test('lets overrides win over the environment', () => {
    const [err, client] = ReleasyClient.fromEnv(
      { RELEASY_BASE_URL: 'https://ignored.example.com', RELEASY_API_KEY: 'test-api-key' },
      { baseUrl: BASE_URL, auth: adminKey('test-admin-key') },
    );

    expect(err).toBeNull();
    expect(client?.baseUrl).toBe(BASE_URL);
    expect(client?.auth).toEqual(adminKey('test-admin-key'));
  });

  test('ignores unrelated variables', () => {
    const client = fromEnvOrThrow({ RELEASY_BASE_URL: BASE_URL, PATH: '/usr/bin', HOME: '/root' });

    expect(client.auth).toEqual(noAuth());
  });
});

describe('ReleasyClient operations', () => {
  const originalFetch = global.fetch;
  let mockedFetch: Mock<typeof fetch>;

  const createClient = () => {
    const [err, client] = ReleasyClient.create({ baseUrl: BASE_URL, auth: adminKey('test-admin-key') });
    if (err) {
      throw err;
    }

    return client;
  };

  const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

  beforeEach(() => {
    mockedFetch = vi.fn<typeof fetch>();
    global.fetch = mockedFetch;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  test('lists customers with the given filters', async () => {
    mockedFetch.mockResolvedValueOnce(
      json({
        customers: [{ id: 'c1', name: 'Acme', created_at: 1700000000, plan: null }],
        limit: 10,
        offset: 0,
      }),
    );

    const [err, page] = await createClient().listCustomers({ plan: 'pro', limit: 10 });

    expect(err).toBeNull();
    expect(page).toEqual({
      customers: [{ id: 'c1', name: 'Acme', created_at: 1700000000, plan: undefined, suspended_at: undefined }],
      limit: 10,
      offset: 0,
    });
    expect(mockedFetch.mock.calls[0]?.[0]).toBe(`${BASE_URL}/v1/admin/customers?plan=pro&limit=10`);
  });

  test('encodes path segments', async () => {
    mockedFetch.mockResolvedValueOnce(json({ id: 'c/1', name: 'Acme', created_at: 1 }));

    await createClient().getCustomer('c/1');

    expect(mockedFetch.mock.calls[0]?.[0]).toBe(`${BASE_URL}/v1/admin/customers/c%2F1`);
  });

  test('publishes without a body', async () => {
    mockedFetch.mockResolvedValueOnce(
      json({ id: 'r1', product: 'cli', version: '1.0.0', status: 'draft', created_at: 1700000000 }),
    );

    const [err, release] = await createClient().publishRelease('r1');

    expect(err).toBeNull();
    expect(release?.published_at).toBeUndefined();
    expect(release?.artifacts).toBeUndefined();
    expect(mockedFetch.mock.calls[0]?.[1]?.method).toBe('POST');
    expect(mockedFetch.mock.calls[0]?.[1]?.body).toBeUndefined();
  });

  test('rejects a non-integer timestamp in a response', async () => {
    mockedFetch.mockResolvedValueOnce(json({ id: 'c1', name: 'Acme', created_at: 1.5 }));

    const [err, customer] = await createClient().getCustomer('c1');

    expect(customer).toBeNull();
    expect(err).toBeInstanceOf(TransportError);
  });

  test('sends Idempotency-Key only from the idempotent variant', async () => {
    mockedFetch
      .mockResolvedValueOnce(json({ id: 'c1', name: 'Acme', created_at: 1 }, 201))
      .mockResolvedValueOnce(json({ id: 'c1', name: 'Acme', created_at: 1 }, 201));
    const client = createClient();

    await client.adminCreateCustomer({ name: 'Acme' });
    await client.adminCreateCustomerWithIdempotency({ name: 'Acme' }, 'idem-1');

    const [plain, idempotent] = mockedFetch.mock.calls;
    expect(new Headers(plain?.[1]?.headers).has('idempotency-key')).toBe(false);
    expect(new Headers(idempotent?.[1]?.headers).get('idempotency-key')).toBe('idem-1');
  });

  test('deletes an entitlement on 204 only', async () => {
    mockedFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

    const [err, value] = await createClient().deleteEntitlement('c1', 'e1');

    expect(err).toBeNull();
    expect(value).toBeNull();
    expect(mockedFetch.mock.calls[0]?.[0]).toBe(`${BASE_URL}/v1/admin/customers/c1/entitlements/e1`);
    expect(mockedFetch.mock.calls[0]?.[1]?.method).toBe('DELETE');
  });

  test('switches credentials without touching the original client', async () => {
    mockedFetch.mockResolvedValueOnce(
      json({ active: true, api_key_id: 'k1', customer_id: 'c1', key_type: 'ci', scopes: ['releases:read'] }),
    );
    const admin = createClient();

    const [err, info] = await admin.withAuth(apiKey('test-api-key')).authIntrospect();

    expect(err).toBeNull();
    expect(info?.scopes).toEqual(['releases:read']);
    expect(admin.auth).toEqual(adminKey('test-admin-key'));
    const headers = new Headers(mockedFetch.mock.calls[0]?.[1]?.headers);
    expect(headers.get('x-releasy-api-key')).toBe('test-api-key');
    expect(headers.has('x-releasy-admin-key')).toBe(false);
  });
});
