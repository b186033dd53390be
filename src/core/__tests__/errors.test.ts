// src/core/__tests__/errors.test.ts
import { describe, it, expect } from '@jest/globals';
import { ErrorCode, LikedropError, errorMessage, hasErrnoCode, isFatal, isLikedropError } from '../errors.js';

describe('LikedropError', () => {
  it('should create error with all properties', () => {
    const error = new LikedropError(
      ErrorCode.NETWORK_ERROR,
      'Network connection failed',
      true,
      'Check your internet connection',
      { url: 'https://example.com' }
    );

    expect(error).toBeInstanceOf(LikedropError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('LikedropError');
    expect(error.code).toBe(ErrorCode.NETWORK_ERROR);
    expect(error.message).toBe('Network connection failed');
    expect(error.retryable).toBe(true);
    expect(error.suggestion).toBe('Check your internet connection');
    expect(error.context).toEqual({ url: 'https://example.com' });
  });

  it('should create error with minimal properties', () => {
    const error = new LikedropError(ErrorCode.DOWNLOAD_FAILED, 'HTTP 404');

    expect(error.retryable).toBe(false);
    expect(error.suggestion).toBeUndefined();
    expect(error.context).toBeUndefined();
  });
});

describe('isLikedropError', () => {
  it('matches the class and optionally the code', () => {
    const error = new LikedropError(ErrorCode.NOT_FOUND, 'gone');

    expect(isLikedropError(error)).toBe(true);
    expect(isLikedropError(error, ErrorCode.NOT_FOUND)).toBe(true);
    expect(isLikedropError(error, ErrorCode.API_ERROR)).toBe(false);
    expect(isLikedropError(new Error('gone'))).toBe(false);
  });
});

describe('isFatal', () => {
  it.each([
    { code: ErrorCode.AUTH_FAILED, fatal: true },
    { code: ErrorCode.RATE_LIMITED, fatal: true },
    { code: ErrorCode.LOCAL_IO, fatal: true },
    { code: ErrorCode.CONFIG_INVALID, fatal: true },
    { code: ErrorCode.INVALID_ARGUMENT, fatal: true },
    { code: ErrorCode.NETWORK_ERROR, fatal: false },
    { code: ErrorCode.API_ERROR, fatal: false },
    { code: ErrorCode.DOWNLOAD_FAILED, fatal: false },
    { code: ErrorCode.MEDIA_LIBRARY, fatal: false },
  ])('$code fatal: $fatal', ({ code, fatal }) => {
    expect(isFatal(new LikedropError(code, 'x'))).toBe(fatal);
  });

  it('treats unexpected errors as fatal', () => {
    expect(isFatal(new TypeError('undefined is not a function'))).toBe(true);
  });
});

describe('helpers', () => {
  it('errorMessage reads errors and other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });

  it('hasErrnoCode checks the code property of errors', () => {
    const enoent = Object.assign(new Error('missing'), { code: 'ENOENT' });
    expect(hasErrnoCode(enoent, 'ENOENT')).toBe(true);
    expect(hasErrnoCode(enoent, 'EACCES')).toBe(false);
    expect(hasErrnoCode({ code: 'ENOENT' }, 'ENOENT')).toBe(false);
  });
});
