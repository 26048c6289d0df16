import { z } from 'zod';
import { type Auth, adminKey, apiKey, noAuth, operatorJwt } from '../auth/auth.js';
import { RequestClient, type RequestClientProps } from '../core/client.js';
import type { DownloadResolution } from '../core/types.js';
import type { ClientError } from '../error/clientError.js';
import type { InvalidBaseUrlError } from '../error/invalidBaseUrlError.js';
import { ValidationError } from '../error/validationError.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import { type Endpoints, endpoints } from './endpoints.js';
import type {
  AdminCreateCustomerRequest,
  AdminCreateCustomerResponse,
  AdminCreateKeyRequest,
  AdminCreateKeyResponse,
  AdminCustomerListQuery,
  AdminCustomerListResponse,
  AdminCustomerResponse,
  AdminRevokeKeyRequest,
  AdminRevokeKeyResponse,
  AdminUpdateCustomerRequest,
  ApiKeyIntrospection,
  ArtifactPresignRequest,
  ArtifactPresignResponse,
  ArtifactRegisterRequest,
  ArtifactRegisterResponse,
  AuditEventListQuery,
  AuditEventListResponse,
  DownloadTokenRequest,
  DownloadTokenResponse,
  EntitlementCreateRequest,
  EntitlementListQuery,
  EntitlementListResponse,
  EntitlementResponse,
  EntitlementUpdateRequest,
  HealthResponse,
  ReleaseCreateRequest,
  ReleaseListQuery,
  ReleaseListResponse,
  ReleaseResponse,
  ResetCredentialsRequest,
  UserCreateRequest,
  UserGroupsReplaceRequest,
  UserListQuery,
  UserListResponse,
  UserPatchRequest,
  UserResponse,
} from './models.js';

/** Options accepted by {@link ReleasyClient.create}. */
export type ReleasyClientOptions = Omit<RequestClientProps<Endpoints>, 'endpoints'>;

/** Blank variables count as unset. */
const envValue = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema.optional());

/** Environment variables read by {@link ReleasyClient.fromEnv}. */
export const releasyEnvSchema = z.object({
  RELEASY_BASE_URL: envValue(z.string()),
  RELEASY_ADMIN_KEY: envValue(z.string()),
  RELEASY_API_KEY: envValue(z.string()),
  RELEASY_OPERATOR_JWT: envValue(z.string()),
  RELEASY_USER_AGENT: envValue(z.string()),
  RELEASY_TIMEOUT_MS: envValue(
    z
      .string()
      .regex(/^\d+$/, 'expected a whole number of milliseconds')
      .transform((value) => Number(value)),
  ),
});

/** Parsed Releasy environment. */
export type ReleasyEnv = z.output<typeof releasyEnvSchema>;

/**
 * Credentials picked from the environment: operator JWT, then admin key, then
 * API key, then none.
 */
export function authFromEnv(env: ReleasyEnv): Auth {
  if (env.RELEASY_OPERATOR_JWT) {
    return operatorJwt(env.RELEASY_OPERATOR_JWT);
  }

  if (env.RELEASY_ADMIN_KEY) {
    return adminKey(env.RELEASY_ADMIN_KEY);
  }

  if (env.RELEASY_API_KEY) {
    return apiKey(env.RELEASY_API_KEY);
  }

  return noAuth();
}

/**
 * Client for the Releasy release-management API.
 *
 * Each method issues exactly one request and resolves to `[error, value]`,
 * where `error` is one of {@link ClientError}. The client is immutable; use
 * {@link ReleasyClient.withAuth} to switch credentials.
 *
 * @example
 * const [err, client] = ReleasyClient.create({
 *   baseUrl: 'https://releasy.example.com',
 *   auth: adminKey('test-admin-key'),
 * });
 * if (err) throw err;
 * const [errCustomers, page] = await client.listCustomers({ limit: 10 });
 */
export class ReleasyClient {
  /** Generic typed client bound to the Releasy endpoints */
  #client: RequestClient<Endpoints>;

  private constructor(client: RequestClient<Endpoints>) {
    this.#client = client;
  }

  /**
   * Creates a client. Fails with {@link InvalidBaseUrlError} when the base URL
   * is empty or not `http(s)://`.
   */
  static create(options: ReleasyClientOptions): SafeWrap<InvalidBaseUrlError, ReleasyClient> {
    const [err, client] = RequestClient.create({ ...options, endpoints });
    if (err) {
      return [err, null];
    }

    return [null, new ReleasyClient(client)];
  }

  /**
   * Creates a client from `RELEASY_*` environment variables. Explicit
   * `overrides` win over the environment.
   *
   * - `RELEASY_BASE_URL` is required unless `overrides.baseUrl` is given.
   * - Auth comes from `RELEASY_OPERATOR_JWT`, `RELEASY_ADMIN_KEY` or
   *   `RELEASY_API_KEY`, first one set wins.
   * - `RELEASY_TIMEOUT_MS` must be a whole number.
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    overrides: Partial<ReleasyClientOptions> = {},
  ): SafeWrap<ValidationError | InvalidBaseUrlError, ReleasyClient> {
    const parsed = releasyEnvSchema.safeParse(env);
    if (!parsed.success) {
      return [new ValidationError('error reading releasy environment', parsed.error.issues), null];
    }

    const vars = parsed.data;
    return ReleasyClient.create({
      auth: authFromEnv(vars),
      userAgent: vars.RELEASY_USER_AGENT,
      timeout: vars.RELEASY_TIMEOUT_MS,
      ...overrides,
      baseUrl: overrides.baseUrl ?? vars.RELEASY_BASE_URL ?? '',
    });
  }

  /** Normalized base URL. */
  get baseUrl(): string {
    return this.#client.baseUrl;
  }

  /** Active credentials. */
  get auth(): Auth {
    return this.#client.auth;
  }

  /**
   * Returns a client sharing this one's transport and settings but sending
   * other credentials. This client is left unchanged.
   */
  withAuth(auth: Auth): ReleasyClient {
    return new ReleasyClient(this.#client.withAuth(auth));
  }

  /** `GET /openapi.json`, the raw OpenAPI document. */
  openapiJson(): SafeWrapAsync<ClientError, unknown> {
    return this.#client.get('/openapi.json', null);
  }

  /** `GET /health` */
  healthCheck(): SafeWrapAsync<ClientError, HealthResponse> {
    return this.#client.get('/health', null);
  }

  /** `GET /live` */
  liveCheck(): SafeWrapAsync<ClientError, HealthResponse> {
    return this.#client.get('/live', null);
  }

  /** `GET /ready`. A service in maintenance answers 503, which comes back as an `ApiError`. */
  readyCheck(): SafeWrapAsync<ClientError, HealthResponse> {
    return this.#client.get('/ready', null);
  }

  /** Lists audit events matching the filters present in `query`. */
  listAuditEvents(query: AuditEventListQuery = {}): SafeWrapAsync<ClientError, AuditEventListResponse> {
    return this.#client.get('/v1/admin/audit-events', { $search: query });
  }

  listCustomers(query: AdminCustomerListQuery = {}): SafeWrapAsync<ClientError, AdminCustomerListResponse> {
    return this.#client.get('/v1/admin/customers', { $search: query });
  }

  /** Creates a customer without an idempotency key. */
  adminCreateCustomer(body: AdminCreateCustomerRequest): SafeWrapAsync<ClientError, AdminCreateCustomerResponse> {
    return this.#client.post('/v1/admin/customers', null, body);
  }

  /**
   * Creates a customer, sending `idempotencyKey` as `Idempotency-Key` when
   * given so a retried create isn't applied twice.
   */
  adminCreateCustomerWithIdempotency(
    body: AdminCreateCustomerRequest,
    idempotencyKey?: string,
  ): SafeWrapAsync<ClientError, AdminCreateCustomerResponse> {
    return this.#client.post('/v1/admin/customers', null, body, { idempotencyKey });
  }

  getCustomer(customerId: string): SafeWrapAsync<ClientError, AdminCustomerResponse> {
    return this.#client.get('/v1/admin/customers/{customer_id}', { customer_id: customerId });
  }

  updateCustomer(
    customerId: string,
    body: AdminUpdateCustomerRequest,
  ): SafeWrapAsync<ClientError, AdminCustomerResponse> {
    return this.#client.patch('/v1/admin/customers/{customer_id}', { customer_id: customerId }, body);
  }

  listUsers(query: UserListQuery = {}): SafeWrapAsync<ClientError, UserListResponse> {
    return this.#client.get('/v1/admin/users', { $search: query });
  }

  /** Creates a user without an idempotency key. */
  createUser(body: UserCreateRequest): SafeWrapAsync<ClientError, UserResponse> {
    return this.#client.post('/v1/admin/users', null, body);
  }

  /** Creates a user, sending `Idempotency-Key` when `idempotencyKey` is given. */
  createUserWithIdempotency(body: UserCreateRequest, idempotencyKey?: string): SafeWrapAsync<ClientError, UserResponse> {
    return this.#client.post('/v1/admin/users', null, body, { idempotencyKey });
  }

  getUser(userId: string): SafeWrapAsync<ClientError, UserResponse> {
    return this.#client.get('/v1/admin/users/{user_id}', { user_id: userId });
  }

  patchUser(userId: string, body: UserPatchRequest): SafeWrapAsync<ClientError, UserResponse> {
    return this.#client.patch('/v1/admin/users/{user_id}', { user_id: userId }, body);
  }

  /** Replaces the user's full group list. */
  replaceGroups(userId: string, body: UserGroupsReplaceRequest): SafeWrapAsync<ClientError, UserResponse> {
    return this.#client.put('/v1/admin/users/{user_id}/groups', { user_id: userId }, body);
  }

  /**
   * Triggers a credential reset. Succeeds on `202` only, with no value.
   */
  resetCredentials(userId: string, body: ResetCredentialsRequest = {}): SafeWrapAsync<ClientError, null> {
    return this.#client.post('/v1/admin/users/{user_id}/reset-credentials', { user_id: userId }, body);
  }

  listEntitlements(
    customerId: string,
    query: EntitlementListQuery = {},
  ): SafeWrapAsync<ClientError, EntitlementListResponse> {
    return this.#client.get('/v1/admin/customers/{customer_id}/entitlements', {
      customer_id: customerId,
      $search: query,
    });
  }

  createEntitlement(
    customerId: string,
    body: EntitlementCreateRequest,
  ): SafeWrapAsync<ClientError, EntitlementResponse> {
    return this.#client.post('/v1/admin/customers/{customer_id}/entitlements', { customer_id: customerId }, body);
  }

  updateEntitlement(
    customerId: string,
    entitlementId: string,
    body: EntitlementUpdateRequest,
  ): SafeWrapAsync<ClientError, EntitlementResponse> {
    return this.#client.patch(
      '/v1/admin/customers/{customer_id}/entitlements/{entitlement_id}',
      { customer_id: customerId, entitlement_id: entitlementId },
      body,
    );
  }

  /** Deletes an entitlement. Succeeds on `204` only. */
  deleteEntitlement(customerId: string, entitlementId: string): SafeWrapAsync<ClientError, null> {
    return this.#client.delete('/v1/admin/customers/{customer_id}/entitlements/{entitlement_id}', {
      customer_id: customerId,
      entitlement_id: entitlementId,
    });
  }

  /** Issues an API key. The secret is only ever returned here. */
  adminCreateKey(body: AdminCreateKeyRequest): SafeWrapAsync<ClientError, AdminCreateKeyResponse> {
    return this.#client.post('/v1/admin/keys', null, body);
  }

  adminRevokeKey(body: AdminRevokeKeyRequest): SafeWrapAsync<ClientError, AdminRevokeKeyResponse> {
    return this.#client.post('/v1/admin/keys/revoke', null, body);
  }

  /** Describes the API key this client authenticates with. Sends an empty body. */
  authIntrospect(): SafeWrapAsync<ClientError, ApiKeyIntrospection> {
    return this.#client.post('/v1/auth/introspect', null, null);
  }

  createDownloadToken(body: DownloadTokenRequest): SafeWrapAsync<ClientError, DownloadTokenResponse> {
    return this.#client.post('/v1/downloads/token', null, body);
  }

  /**
   * Exchanges a download token for the artifact's location. The redirect is
   * not followed; its `Location` is returned.
   */
  resolveDownloadToken(token: string): SafeWrapAsync<ClientError, DownloadResolution> {
    return this.#client.redirect('/v1/downloads/{token}', { token });
  }

  listReleases(query: ReleaseListQuery = {}): SafeWrapAsync<ClientError, ReleaseListResponse> {
    return this.#client.get('/v1/releases', { $search: query });
  }

  createRelease(body: ReleaseCreateRequest): SafeWrapAsync<ClientError, ReleaseResponse> {
    return this.#client.post('/v1/releases', null, body);
  }

  /** Deletes a release. Succeeds on `204` only. */
  deleteRelease(releaseId: string): SafeWrapAsync<ClientError, null> {
    return this.#client.delete('/v1/releases/{release_id}', { release_id: releaseId });
  }

  /** Records an uploaded artifact against its release. */
  registerReleaseArtifact(
    releaseId: string,
    body: ArtifactRegisterRequest,
  ): SafeWrapAsync<ClientError, ArtifactRegisterResponse> {
    return this.#client.post('/v1/releases/{release_id}/artifacts', { release_id: releaseId }, body);
  }

  /** Requests a presigned upload URL for a new artifact. */
  presignReleaseArtifactUpload(
    releaseId: string,
    body: ArtifactPresignRequest,
  ): SafeWrapAsync<ClientError, ArtifactPresignResponse> {
    return this.#client.post('/v1/releases/{release_id}/artifacts/presign', { release_id: releaseId }, body);
  }

  /**
   * Uploads the file at `filePath` to a presigned URL. No API credentials or
   * headers are sent; any 2xx is success.
   */
  uploadPresignedArtifact(uploadUrl: string, filePath: string): SafeWrapAsync<ClientError, null> {
    return this.#client.upload(uploadUrl, filePath);
  }

  publishRelease(releaseId: string): SafeWrapAsync<ClientError, ReleaseResponse> {
    return this.#client.post('/v1/releases/{release_id}/publish', { release_id: releaseId }, null);
  }

  unpublishRelease(releaseId: string): SafeWrapAsync<ClientError, ReleaseResponse> {
    return this.#client.post('/v1/releases/{release_id}/unpublish', { release_id: releaseId }, null);
  }
}
