import { afterEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError } from '../error/timeoutError.js';
import { createTimeoutSignal } from './signals.js';

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});

describe('createTimeoutSignal', () => {
  it('returns undefined when disabled', () => {
    expect(createTimeoutSignal()).toBeUndefined();
    expect(createTimeoutSignal(0)).toBeUndefined();
  });

  it('aborts after the configured timeout with a TimeoutError', async () => {
    vi.useFakeTimers();
    const timeout = createTimeoutSignal(50);

    expect(timeout?.signal.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(49);
    expect(timeout?.signal.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(timeout?.signal.aborted).toBe(true);
    expect(timeout?.signal.reason).toBeInstanceOf(TimeoutError);
    expect((timeout?.signal.reason as TimeoutError).message).toBe('error request timed out after 50ms');
  });

  it('never aborts once cleared', async () => {
    vi.useFakeTimers();
    const timeout = createTimeoutSignal(50);

    timeout?.clear();
    expect(vi.getTimerCount()).toBe(0);

    await vi.advanceTimersByTimeAsync(100);
    expect(timeout?.signal.aborted).toBe(false);
  });
});
