import { TimeoutError } from '../error/timeoutError.js';

/** Abort signal bound to a timer, with a way to stop the timer early. */
export interface TimeoutSignal {
  signal: AbortSignal;
  /** Stops the timer. The signal stays un-aborted if it hadn't fired yet. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError}
 * once `timeoutMs` has elapsed.
 *
 * No signal is created when the timeout is unset or `0`.
 */
export function createTimeoutSignal(timeoutMs?: number): TimeoutSignal | undefined {
  if (!timeoutMs) {
    return undefined;
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);

  return {
    signal: controller.signal,
    clear: () => clearTimeout(timeout),
  };
}
