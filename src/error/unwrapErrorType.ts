/** Upper bound on `cause` links followed, so a cyclic chain cannot loop forever. */
const MAX_CAUSE_DEPTH = 32;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 * Matches by `instanceof`.
 */
export function unwrapErrorType<T extends Error>(
  // biome-ignore lint/suspicious/noExplicitAny: errorClass needs to handle any type of class handling, hence the any class-type
  errorClass: new (...args: any[]) => T,
  err: unknown,
): T | null {
  let current: unknown = err;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH; depth++) {
    if (!(current instanceof Error)) {
      return null;
    }

    if (current instanceof errorClass) {
      return current;
    }

    current = current.cause;
  }

  return null;
}
