import type { RequestDefinitions } from '../core/types.js';
import {
  adminCreateCustomerRequestSchema,
  adminCreateCustomerResponseSchema,
  adminCreateKeyRequestSchema,
  adminCreateKeyResponseSchema,
  adminCustomerListQuerySchema,
  adminCustomerListResponseSchema,
  adminCustomerResponseSchema,
  adminRevokeKeyRequestSchema,
  adminRevokeKeyResponseSchema,
  adminUpdateCustomerRequestSchema,
  apiKeyIntrospectionSchema,
  artifactPresignRequestSchema,
  artifactPresignResponseSchema,
  artifactRegisterRequestSchema,
  artifactRegisterResponseSchema,
  auditEventListQuerySchema,
  auditEventListResponseSchema,
  downloadTokenRequestSchema,
  downloadTokenResponseSchema,
  entitlementCreateRequestSchema,
  entitlementListQuerySchema,
  entitlementListResponseSchema,
  entitlementResponseSchema,
  entitlementUpdateRequestSchema,
  healthResponseSchema,
  openapiDocumentSchema,
  releaseCreateRequestSchema,
  releaseListQuerySchema,
  releaseListResponseSchema,
  releaseResponseSchema,
  resetCredentialsRequestSchema,
  userCreateRequestSchema,
  userGroupsReplaceRequestSchema,
  userListQuerySchema,
  userListResponseSchema,
  userPatchRequestSchema,
  userResponseSchema,
} from './models.js';

/**
 * Every Releasy endpoint, keyed by path template. Operations declaring
 * `status` succeed only on that exact bodiless status.
 */
export const endpoints = {
  '/openapi.json': {
    get: { response: openapiDocumentSchema },
  },
  '/health': {
    get: { response: healthResponseSchema },
  },
  '/live': {
    get: { response: healthResponseSchema },
  },
  '/ready': {
    get: { response: healthResponseSchema },
  },
  '/v1/admin/audit-events': {
    get: { $search: auditEventListQuerySchema, response: auditEventListResponseSchema },
  },
  '/v1/admin/customers': {
    get: { $search: adminCustomerListQuerySchema, response: adminCustomerListResponseSchema },
    post: { request: adminCreateCustomerRequestSchema, response: adminCreateCustomerResponseSchema },
  },
  '/v1/admin/customers/{customer_id}': {
    get: { response: adminCustomerResponseSchema },
    patch: { request: adminUpdateCustomerRequestSchema, response: adminCustomerResponseSchema },
  },
  '/v1/admin/customers/{customer_id}/entitlements': {
    get: { $search: entitlementListQuerySchema, response: entitlementListResponseSchema },
    post: { request: entitlementCreateRequestSchema, response: entitlementResponseSchema },
  },
  '/v1/admin/customers/{customer_id}/entitlements/{entitlement_id}': {
    patch: { request: entitlementUpdateRequestSchema, response: entitlementResponseSchema },
    delete: { status: 204 },
  },
  '/v1/admin/users': {
    get: { $search: userListQuerySchema, response: userListResponseSchema },
    post: { request: userCreateRequestSchema, response: userResponseSchema },
  },
  '/v1/admin/users/{user_id}': {
    get: { response: userResponseSchema },
    patch: { request: userPatchRequestSchema, response: userResponseSchema },
  },
  '/v1/admin/users/{user_id}/groups': {
    put: { request: userGroupsReplaceRequestSchema, response: userResponseSchema },
  },
  '/v1/admin/users/{user_id}/reset-credentials': {
    post: { request: resetCredentialsRequestSchema, status: 202 },
  },
  '/v1/admin/keys': {
    post: { request: adminCreateKeyRequestSchema, response: adminCreateKeyResponseSchema },
  },
  '/v1/admin/keys/revoke': {
    post: { request: adminRevokeKeyRequestSchema, response: adminRevokeKeyResponseSchema },
  },
  '/v1/auth/introspect': {
    post: { response: apiKeyIntrospectionSchema },
  },
  '/v1/downloads/token': {
    post: { request: downloadTokenRequestSchema, response: downloadTokenResponseSchema },
  },
  '/v1/downloads/{token}': {
    redirect: {},
  },
  '/v1/releases': {
    get: { $search: releaseListQuerySchema, response: releaseListResponseSchema },
    post: { request: releaseCreateRequestSchema, response: releaseResponseSchema },
  },
  '/v1/releases/{release_id}': {
    delete: { status: 204 },
  },
  '/v1/releases/{release_id}/artifacts': {
    post: { request: artifactRegisterRequestSchema, response: artifactRegisterResponseSchema },
  },
  '/v1/releases/{release_id}/artifacts/presign': {
    post: { request: artifactPresignRequestSchema, response: artifactPresignResponseSchema },
  },
  '/v1/releases/{release_id}/publish': {
    post: { response: releaseResponseSchema },
  },
  '/v1/releases/{release_id}/unpublish': {
    post: { response: releaseResponseSchema },
  },
} satisfies RequestDefinitions;

/** Type of the Releasy endpoint map. */
export type Endpoints = typeof endpoints;
