import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

class CustomError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CustomError';
  }
}

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => 42);

    expect(err).toBeNull();
    expect(data).toBe(42);
  });

  it('returns [error, null] when the function throws', () => {
    const [err, data] = safeWrap(() => {
      throw new CustomError('custom boom');
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(CustomError);
    expect(err?.message).toBe('custom boom');
  });

  it('wraps thrown non-errors, keeping the value as cause', () => {
    const [err, data] = safeWrap(() => {
      throw 'plain string';
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(Error);
    expect(err?.message).toBe('non-error value thrown: plain string');
    expect(err?.cause).toBe('plain string');
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.resolve('ok'));

    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  it('returns [error, null] when the promise rejects', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.reject(new Error('async boom')));

    expect(data).toBeNull();
    expect(err?.message).toBe('async boom');
  });

  it('captures a synchronous throw from the factory', async () => {
    const [err, data] = await safeWrapAsync((): Promise<string> => {
      throw new CustomError('thrown before promise');
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(CustomError);
  });
});

describe('toError', () => {
  it('returns errors unchanged', () => {
    const original = new Error('same');

    expect(toError(original)).toBe(original);
  });

  it('wraps numbers', () => {
    const err = toError(404);

    expect(err.message).toBe('non-error value thrown: 404');
    expect(err.cause).toBe(404);
  });
});
