import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates a value against a Standard Schema and wraps the outcome in a
 * `[error, value]` tuple.
 *
 * - Sync and async schema implementations are both supported.
 * - A schema that throws, rejects, or returns something that isn't a result
 *   object yields a `ValidationError` without issues, carrying the cause.
 * - Reported `issues` yield a `ValidationError` listing them.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  const [errStart, pending] = safeWrap(() => schema['~standard'].validate(input));
  if (errStart) {
    return [new ValidationError('error validating on validation start', [], { cause: errStart }), null];
  }

  const [errResult, result] = await safeWrapAsync(() => Promise.resolve(pending));
  if (errResult) {
    return [new ValidationError('error validating async data', [], { cause: errResult }), null];
  }

  if (!result || typeof result !== 'object') {
    return [new ValidationError('error validation result of wrong type', []), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', [...result.issues]), null];
  }

  return [null, result.value];
}
