/**
 * Protocol-contract error: the server answered a download resolution with 302
 * but sent no `Location` header.
 */
export class MissingLocationError extends Error {
  /** MissingLocationError error-name */
  static name = 'MissingLocationError';

  constructor(opts?: ErrorOptions) {
    super('missing Location header in redirect response', opts);
    this.name = MissingLocationError.name;
  }
}

/**
 * Type guard for {@link MissingLocationError}.
 */
export function isMissingLocationError(error: unknown): error is MissingLocationError {
  return error instanceof MissingLocationError;
}
