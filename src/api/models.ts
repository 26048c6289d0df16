import { z } from 'zod';

/**
 * Optional response field: the server may send `null` or leave it out, callers
 * always see it as absent.
 */
const nullish = <T extends z.ZodTypeAny>(schema: T) => schema.nullish().transform((value) => value ?? undefined);

/** Unix timestamps, sizes and other 64-bit integers. */
const int = () => z.number().int();

export const healthResponseSchema = z.object({
  status: z.string(),
});
export type HealthResponse = z.output<typeof healthResponseSchema>;

/** The OpenAPI document is passed through untouched. */
export const openapiDocumentSchema = z.unknown();

// Customers

export const adminCreateCustomerRequestSchema = z.object({
  name: z.string(),
  plan: z.string().optional(),
});
export type AdminCreateCustomerRequest = z.input<typeof adminCreateCustomerRequestSchema>;

export const adminCreateCustomerResponseSchema = z.object({
  id: z.string(),
  name: z.string(),
  created_at: int(),
  plan: nullish(z.string()),
});
export type AdminCreateCustomerResponse = z.output<typeof adminCreateCustomerResponseSchema>;

export const adminCustomerListQuerySchema = z.object({
  customer_id: z.string().optional(),
  name: z.string().optional(),
  plan: z.string().optional(),
  limit: int().optional(),
  offset: int().optional(),
});
export type AdminCustomerListQuery = z.input<typeof adminCustomerListQuerySchema>;

export const adminCustomerResponseSchema = z.object({
  id: z.string(),
  name: z.string(),
  created_at: int(),
  plan: nullish(z.string()),
  suspended_at: nullish(int()),
});
export type AdminCustomerResponse = z.output<typeof adminCustomerResponseSchema>;

export const adminCustomerListResponseSchema = z.object({
  customers: z.array(adminCustomerResponseSchema),
  limit: int(),
  offset: int(),
});
export type AdminCustomerListResponse = z.output<typeof adminCustomerListResponseSchema>;

export const adminUpdateCustomerRequestSchema = z.object({
  name: z.string().optional(),
  plan: z.string().optional(),
  suspended: z.boolean().optional(),
});
export type AdminUpdateCustomerRequest = z.input<typeof adminUpdateCustomerRequestSchema>;

// Users

export const userListQuerySchema = z.object({
  customer_id: z.string().optional(),
  email: z.string().optional(),
  status: z.string().optional(),
  keycloak_user_id: z.string().optional(),
  created_from: int().optional(),
  created_to: int().optional(),
  limit: int().optional(),
  cursor: z.string().optional(),
});
export type UserListQuery = z.input<typeof userListQuerySchema>;

export const userResponseSchema = z.object({
  id: z.string(),
  keycloak_user_id: z.string(),
  customer_id: z.string(),
  email: z.string(),
  status: z.string(),
  groups: z.array(z.string()),
  created_at: int(),
  updated_at: int(),
  disabled_at: nullish(int()),
  display_name: nullish(z.string()),
  last_synced_at: nullish(int()),
  metadata: nullish(z.unknown()),
});
export type UserResponse = z.output<typeof userResponseSchema>;

export const userListResponseSchema = z.object({
  users: z.array(userResponseSchema),
  next_cursor: nullish(z.string()),
});
export type UserListResponse = z.output<typeof userListResponseSchema>;

export const userCreateRequestSchema = z.object({
  email: z.string(),
  customer_id: z.string(),
  display_name: z.string().optional(),
  groups: z.array(z.string()).optional(),
  metadata: z.unknown().optional(),
  status: z.string().optional(),
});
export type UserCreateRequest = z.input<typeof userCreateRequestSchema>;

export const userPatchRequestSchema = z.object({
  display_name: z.string().optional(),
  groups: z.array(z.string()).optional(),
  metadata: z.unknown().optional(),
  status: z.string().optional(),
});
export type UserPatchRequest = z.input<typeof userPatchRequestSchema>;

export const userGroupsReplaceRequestSchema = z.object({
  groups: z.array(z.string()),
});
export type UserGroupsReplaceRequest = z.input<typeof userGroupsReplaceRequestSchema>;

export const resetCredentialsRequestSchema = z.object({
  send_email: z.boolean().optional(),
});
export type ResetCredentialsRequest = z.input<typeof resetCredentialsRequestSchema>;

// API keys

export const adminCreateKeyRequestSchema = z.object({
  customer_id: z.string(),
  expires_at: int().optional(),
  key_type: z.string().optional(),
  name: z.string().optional(),
  scopes: z.array(z.string()).optional(),
});
export type AdminCreateKeyRequest = z.input<typeof adminCreateKeyRequestSchema>;

export const adminCreateKeyResponseSchema = z.object({
  api_key_id: z.string(),
  api_key: z.string(),
  customer_id: z.string(),
  key_type: z.string(),
  scopes: z.array(z.string()),
  expires_at: nullish(int()),
});
export type AdminCreateKeyResponse = z.output<typeof adminCreateKeyResponseSchema>;

export const adminRevokeKeyRequestSchema = z.object({
  api_key_id: z.string(),
});
export type AdminRevokeKeyRequest = z.input<typeof adminRevokeKeyRequestSchema>;

export const adminRevokeKeyResponseSchema = z.object({
  api_key_id: z.string(),
});
export type AdminRevokeKeyResponse = z.output<typeof adminRevokeKeyResponseSchema>;

export const apiKeyIntrospectionSchema = z.object({
  active: z.boolean(),
  api_key_id: z.string(),
  customer_id: z.string(),
  key_type: z.string(),
  scopes: z.array(z.string()),
  expires_at: nullish(int()),
});
export type ApiKeyIntrospection = z.output<typeof apiKeyIntrospectionSchema>;

// Artifacts

export const artifactPresignRequestSchema = z.object({
  filename: z.string(),
  platform: z.string(),
});
export type ArtifactPresignRequest = z.input<typeof artifactPresignRequestSchema>;

export const artifactPresignResponseSchema = z.object({
  artifact_id: z.string(),
  object_key: z.string(),
  upload_url: z.string(),
  expires_at: int(),
});
export type ArtifactPresignResponse = z.output<typeof artifactPresignResponseSchema>;

export const artifactRegisterRequestSchema = z.object({
  artifact_id: z.string(),
  object_key: z.string(),
  checksum: z.string(),
  size: int(),
  platform: z.string(),
});
export type ArtifactRegisterRequest = z.input<typeof artifactRegisterRequestSchema>;

export const artifactRegisterResponseSchema = z.object({
  id: z.string(),
  release_id: z.string(),
  object_key: z.string(),
  checksum: z.string(),
  size: int(),
  platform: z.string(),
  created_at: int(),
});
export type ArtifactRegisterResponse = z.output<typeof artifactRegisterResponseSchema>;

export const artifactSummarySchema = z.object({
  id: z.string(),
  object_key: z.string(),
  platform: z.string(),
  checksum: z.string(),
  size: int(),
});
export type ArtifactSummary = z.output<typeof artifactSummarySchema>;

// Audit events

export const auditEventListQuerySchema = z.object({
  customer_id: z.string().optional(),
  actor: z.string().optional(),
  event: z.string().optional(),
  created_from: int().optional(),
  created_to: int().optional(),
  limit: int().optional(),
  offset: int().optional(),
});
export type AuditEventListQuery = z.input<typeof auditEventListQuerySchema>;

export const auditEventResponseSchema = z.object({
  id: z.string(),
  actor: z.string(),
  event: z.string(),
  created_at: int(),
  customer_id: nullish(z.string()),
  payload: nullish(z.unknown()),
});
export type AuditEventResponse = z.output<typeof auditEventResponseSchema>;

export const auditEventListResponseSchema = z.object({
  events: z.array(auditEventResponseSchema),
  limit: int(),
  offset: int(),
});
export type AuditEventListResponse = z.output<typeof auditEventListResponseSchema>;

// Downloads

export const downloadTokenRequestSchema = z.object({
  artifact_id: z.string(),
  expires_in_seconds: int().optional(),
  purpose: z.string().optional(),
});
export type DownloadTokenRequest = z.input<typeof downloadTokenRequestSchema>;

export const downloadTokenResponseSchema = z.object({
  download_url: z.string(),
  expires_at: int(),
});
export type DownloadTokenResponse = z.output<typeof downloadTokenResponseSchema>;

// Entitlements

export const entitlementCreateRequestSchema = z.object({
  product: z.string(),
  starts_at: int(),
  ends_at: int().optional(),
  metadata: z.unknown().optional(),
});
export type EntitlementCreateRequest = z.input<typeof entitlementCreateRequestSchema>;

export const entitlementUpdateRequestSchema = z.object({
  product: z.string().optional(),
  starts_at: int().optional(),
  ends_at: int().optional(),
  metadata: z.unknown().optional(),
});
export type EntitlementUpdateRequest = z.input<typeof entitlementUpdateRequestSchema>;

export const entitlementResponseSchema = z.object({
  id: z.string(),
  customer_id: z.string(),
  product: z.string(),
  starts_at: int(),
  ends_at: nullish(int()),
  metadata: nullish(z.unknown()),
});
export type EntitlementResponse = z.output<typeof entitlementResponseSchema>;

export const entitlementListQuerySchema = z.object({
  product: z.string().optional(),
  limit: int().optional(),
  offset: int().optional(),
});
export type EntitlementListQuery = z.input<typeof entitlementListQuerySchema>;

export const entitlementListResponseSchema = z.object({
  entitlements: z.array(entitlementResponseSchema),
  limit: int(),
  offset: int(),
});
export type EntitlementListResponse = z.output<typeof entitlementListResponseSchema>;

// Releases

export const releaseCreateRequestSchema = z.object({
  product: z.string(),
  version: z.string(),
});
export type ReleaseCreateRequest = z.input<typeof releaseCreateRequestSchema>;

export const releaseResponseSchema = z.object({
  id: z.string(),
  product: z.string(),
  version: z.string(),
  status: z.string(),
  created_at: int(),
  published_at: nullish(int()),
  artifacts: nullish(z.array(artifactSummarySchema)),
});
export type ReleaseResponse = z.output<typeof releaseResponseSchema>;

export const releaseListQuerySchema = z.object({
  product: z.string().optional(),
  version: z.string().optional(),
  status: z.string().optional(),
  include_artifacts: z.boolean().optional(),
  limit: int().optional(),
  offset: int().optional(),
});
export type ReleaseListQuery = z.input<typeof releaseListQuerySchema>;

export const releaseListResponseSchema = z.object({
  releases: z.array(releaseResponseSchema),
  limit: int(),
  offset: int(),
});
export type ReleaseListResponse = z.output<typeof releaseListResponseSchema>;
