import { describe, expect, it } from 'vitest';
import { isErrorType } from './isErrorType.js';

class CustomError extends Error {}

class CustomOtherError extends Error {}

class DifferentError extends Error {}

describe('isErrorType', () => {
  it('non-error correctly returns false', () => {
    expect(isErrorType(CustomError, { foo: 'bar' })).toEqual(false);
  });

  it('expect shallow to correctly return true', () => {
    expect(isErrorType(CustomError, new CustomError('test'))).toEqual(true);
  });

  it('expect 4 layers deep to correctly return true, even though self wraps another', () => {
    const original = new Error('first');
    const err = new CustomError('test', { cause: original });
    const wrapped1 = new Error('err1', { cause: err });
    const wrapped2 = new CustomOtherError('err2', { cause: wrapped1 });
    const wrapped3 = new Error('err3', { cause: wrapped2 });

    expect(isErrorType(CustomError, wrapped3)).toEqual(true);
  });

  it('expect false on wrapped different error', () => {
    const err = new DifferentError('err');
    const err1 = new Error('err1', { cause: err });
    const err2 = new DifferentError('err2', { cause: err1 });

    expect(isErrorType(CustomError, err2)).toEqual(false);
  });

  it('stops at a non-error cause', () => {
    const err = new Error('err', { cause: 'not an error' });

    expect(isErrorType(CustomError, err)).toEqual(false);
  });
});
