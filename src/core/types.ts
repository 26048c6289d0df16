import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { RequestOptions, StatusCode } from '../types/request.js';

/** Schema for unknown input, any output, used to easier infer data */
// biome-ignore lint/suspicious/noExplicitAny: This is used for inferrence, and requires any so inference works as it should
export type SchemaType = StandardSchemaV1<unknown, any>;
/** Empty object definition */
export type EmptyObject = Record<never, never>;

/** Enforce at least one property to be present on a type. */
export type RequireAtLeastOne<T> = {
  [K in keyof T]-?: Required<Pick<T, K>> & Partial<Pick<T, Exclude<keyof T, K>>>;
}[keyof T];

/**
 * EmptyishObject checks and allows for nulls on props
 */
export type EmptyishObject<T> = [keyof T] extends [never] ? null : T;

/**
 * HTTPMethods that exists
 */
export type HttpMethod = 'get' | 'post' | 'put' | 'patch' | 'delete';

/**
 * Operations an endpoint can declare. `redirect` is a GET that expects a
 * `302` and resolves to its `Location` instead of a body.
 */
export type ClientOperation = HttpMethod | 'redirect';

/**
 * What counts as success for an operation: either a 2xx with a body decoded
 * through `response`, or exactly one bodiless `status`.
 */
export type ResponseDefinition = { response: SchemaType; status?: never } | { status: StatusCode; response?: never };

/** Optional query schema, encoded into the URL search params. */
export type SearchDefinition = { $search?: SchemaType };

/**
 * RequestDefinitions types up the possible variations of
 * the endpoints we create
 */
export type RequestDefinitions = {
  [path: string]: RequireAtLeastOne<{
    [M in ClientOperation]: M extends 'redirect'
      ? SearchDefinition
      : M extends 'get' | 'delete'
        ? SearchDefinition & ResponseDefinition
        : SearchDefinition & ResponseDefinition & { request?: SchemaType };
  }>;
};

/**
 * Flattened view of a single operation definition, as the executor reads it
 * at runtime.
 */
export type OperationDefinition = {
  $search?: SchemaType;
  request?: SchemaType;
  response?: SchemaType;
  status?: StatusCode;
};

/** Parse `{param}` segments from a path template into a typed object. */
export type ParsePathParams<Path extends string | number | boolean> =
  Path extends `${infer _Start}{${infer Param}}${infer Rest}`
    ? { [K in Param]: string | number } & ParsePathParams<Rest>
    : EmptyObject;

/** Extract endpoints that support a given operation. */
export type EndpointsWithMethod<Method extends ClientOperation, Schema extends RequestDefinitions> = {
  [K in keyof Schema]: Schema[K] extends Record<Method, unknown> ? K : never;
}[keyof Schema];

/**
 * ResponseType defines what will be returned from the endpoint, `null` for
 * operations that only declare a bodiless status.
 */
export type ResponseType<
  Schema,
  Endpoint extends keyof Schema,
  Method extends keyof Schema[Endpoint],
> = Schema[Endpoint][Method] extends { response: infer S extends SchemaType } ? StandardSchemaV1.InferOutput<S> : null;

/** Typed request body for an endpoint/method, `null` when the operation sends an empty body. */
export type RequestType<
  Schema,
  Endpoint extends keyof Schema,
  Method extends keyof Schema[Endpoint],
> = Schema[Endpoint][Method] extends { request: infer S extends SchemaType } ? StandardSchemaV1.InferInput<S> : null;

/** Typed query params via `$search` if present. */
export type SearchType<
  Schema,
  Endpoint extends keyof Schema,
  Method extends keyof Schema[Endpoint],
> = Schema[Endpoint][Method] extends { $search: infer S extends SchemaType }
  ? { $search: StandardSchemaV1.InferInput<S> }
  : EmptyObject;

/** Combined params object (path + query) expected by client methods. */
export type Params<
  Schema extends RequestDefinitions,
  Endpoint extends keyof RequestDefinitions & string,
  Method extends ClientOperation & keyof RequestDefinitions[Endpoint],
> = EmptyishObject<ParsePathParams<Endpoint> & SearchType<Schema, Endpoint, Method>>;

/** Explicitly typed GET endpoints. */
export type GetEndpoint<Schema extends RequestDefinitions> = EndpointsWithMethod<'get', Schema> & string;
/** Explicitly typed POST endpoints. */
export type PostEndpoint<Schema extends RequestDefinitions> = EndpointsWithMethod<'post', Schema> & string;
/** Explicitly typed PUT endpoints. */
export type PutEndpoint<Schema extends RequestDefinitions> = EndpointsWithMethod<'put', Schema> & string;
/** Explicitly typed PATCH endpoints. */
export type PatchEndpoint<Schema extends RequestDefinitions> = EndpointsWithMethod<'patch', Schema> & string;
/** Explicitly typed DELETE endpoints. */
export type DeleteEndpoint<Schema extends RequestDefinitions> = EndpointsWithMethod<'delete', Schema> & string;
/** Explicitly typed redirect-resolution endpoints. */
export type RedirectEndpoint<Schema extends RequestDefinitions> = EndpointsWithMethod<'redirect', Schema> & string;

/**
 * Typed parameters for get function call parameters
 */
export type GetArgs<Schema extends RequestDefinitions, Endpoint extends GetEndpoint<Schema> & string> = [
  endpoint: Endpoint,
  params: Params<Schema, Endpoint, 'get'>,
  options?: Pick<RequestOptions, 'validate'>,
];

/**
 * Typed parameters for post function call parameters
 */
export type PostArgs<Schema extends RequestDefinitions, Endpoint extends PostEndpoint<Schema> & string> = [
  endpoint: Endpoint,
  params: Params<Schema, Endpoint, 'post'>,
  data: RequestType<Schema, Endpoint, 'post'>,
  options?: RequestOptions,
];

/**
 * Typed parameters for put function call parameters
 */
export type PutArgs<Schema extends RequestDefinitions, Endpoint extends PutEndpoint<Schema> & string> = [
  endpoint: Endpoint,
  params: Params<Schema, Endpoint, 'put'>,
  data: RequestType<Schema, Endpoint, 'put'>,
  options?: RequestOptions,
];

/**
 * Typed parameters for patch function call parameters
 */
export type PatchArgs<Schema extends RequestDefinitions, Endpoint extends PatchEndpoint<Schema> & string> = [
  endpoint: Endpoint,
  params: Params<Schema, Endpoint, 'patch'>,
  data: RequestType<Schema, Endpoint, 'patch'>,
  options?: RequestOptions,
];

/**
 * Typed parameters for delete function call parameters
 */
export type DeleteArgs<Schema extends RequestDefinitions, Endpoint extends DeleteEndpoint<Schema> & string> = [
  endpoint: Endpoint,
  params: Params<Schema, Endpoint, 'delete'>,
  options?: Pick<RequestOptions, 'validate'>,
];

/**
 * Typed parameters for redirect function call parameters
 */
export type RedirectArgs<Schema extends RequestDefinitions, Endpoint extends RedirectEndpoint<Schema> & string> = [
  endpoint: Endpoint,
  params: Params<Schema, Endpoint, 'redirect'>,
  options?: Pick<RequestOptions, 'validate'>,
];

/** Typed return-type for get function */
export type GetReturn<Schema extends RequestDefinitions, T extends GetEndpoint<Schema>> = ResponseType<
  Schema,
  T,
  'get'
>;

/** Typed return-type for post function */
export type PostReturn<Schema extends RequestDefinitions, T extends PostEndpoint<Schema>> = ResponseType<
  Schema,
  T,
  'post'
>;

/** Typed return-type for put function */
export type PutReturn<Schema extends RequestDefinitions, T extends PutEndpoint<Schema>> = ResponseType<
  Schema,
  T,
  'put'
>;

/** Typed return-type for patch function */
export type PatchReturn<Schema extends RequestDefinitions, T extends PatchEndpoint<Schema>> = ResponseType<
  Schema,
  T,
  'patch'
>;

/** Typed return-type for delete function */
export type DeleteReturn<Schema extends RequestDefinitions, T extends DeleteEndpoint<Schema>> = ResponseType<
  Schema,
  T,
  'delete'
>;

/** Outcome of following a redirect-based download: the final object location. */
export type DownloadResolution = {
  location: string;
};
