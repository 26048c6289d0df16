import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Checks whether an unknown error is, or was caused by, a specific error class.
 * Not a type guard: a match may sit further down the `cause` chain, use
 * {@link unwrapErrorType} to get hold of it.
 */
export function isErrorType<T extends Error>(
  // biome-ignore lint/suspicious/noExplicitAny: errorClass needs to handle any type of class handling, hence the any class-type
  errorClass: new (...args: any[]) => T,
  err: unknown,
): boolean {
  return unwrapErrorType(errorClass, err) !== null;
}
