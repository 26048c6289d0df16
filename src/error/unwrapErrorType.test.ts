import { describe, expect, it } from 'vitest';
import { unwrapErrorType } from './unwrapErrorType.js';

class CustomError extends Error {}

class NonRecoverableError extends Error {
  constructor(message: string, key: string, options?: ErrorOptions) {
    super(`${NonRecoverableError.name}: ${key} - ${message}`, options);
  }
}

describe('unwrapErrorType', () => {
  it('non-error correctly returns null', () => {
    expect(unwrapErrorType(CustomError, { foo: 'bar' })).toEqual(null);
  });

  it('unwrap simplest layer', () => {
    const err = new NonRecoverableError('non-recoverable-test', 'this-key');

    expect(unwrapErrorType(NonRecoverableError, err)).toBe(err);
  });

  it('unwrap 5 layers', () => {
    const err = new NonRecoverableError('non-recoverable-test', 'this-key');
    let wrapped: Error = err;
    for (let i = 0; i < 5; i++) {
      wrapped = new Error(`err${i}`, { cause: wrapped });
    }

    const unwrapped = unwrapErrorType(NonRecoverableError, wrapped);
    expect(unwrapped).toBe(err);
    expect(unwrapped?.message).toBe('NonRecoverableError: this-key - non-recoverable-test');
  });

  it('returns the outermost match', () => {
    const inner = new CustomError('inner');
    const outer = new CustomError('outer', { cause: new Error('middle', { cause: inner }) });

    expect(unwrapErrorType(CustomError, outer)).toBe(outer);
  });

  it('gives up on a cyclic cause chain', () => {
    const a = new Error('a');
    const b = new Error('b', { cause: a });
    Object.defineProperty(a, 'cause', { value: b });

    expect(unwrapErrorType(CustomError, b)).toBeNull();
  });
});
