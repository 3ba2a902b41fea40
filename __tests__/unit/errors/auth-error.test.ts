import { describe, it, expect } from 'vitest';
import { FirebaseError } from 'firebase/app';
import {
  AuthError,
  UNKNOWN_ERROR_CODE,
  classifyAuthErrorCode,
  extractErrorCode,
  isAuthError,
} from '../../../src/errors.js';

describe('classifyAuthErrorCode', () => {
  it('should classify a known code', () => {
    expect(classifyAuthErrorCode('auth/wrong-password')).toEqual({
      kind: 'wrong_password',
      code: 'auth/wrong-password',
    });
  });

  it('should fall back to other carrying the original code', () => {
    expect(classifyAuthErrorCode('auth/made-up-code')).toEqual({
      kind: 'other',
      code: 'auth/made-up-code',
    });
  });

  it('should accept arbitrary strings', () => {
    expect(classifyAuthErrorCode('not a code at all')).toEqual({
      kind: 'other',
      code: 'not a code at all',
    });
  });
});

describe('extractErrorCode', () => {
  it('should read code from a FirebaseError', () => {
    const error = new FirebaseError('auth/user-disabled', 'Firebase: Error (auth/user-disabled).');
    expect(extractErrorCode(error)).toBe('auth/user-disabled');
  });

  it('should read code from a plain object', () => {
    expect(extractErrorCode({ code: 'auth/too-many-requests' })).toBe('auth/too-many-requests');
  });

  it('should return the unknown code when there is no string code', () => {
    expect(extractErrorCode(new Error('boom'))).toBe(UNKNOWN_ERROR_CODE);
    expect(extractErrorCode({ code: 42 })).toBe(UNKNOWN_ERROR_CODE);
    expect(extractErrorCode(null)).toBe(UNKNOWN_ERROR_CODE);
    expect(extractErrorCode('auth/wrong-password')).toBe(UNKNOWN_ERROR_CODE);
  });
});

describe('AuthError', () => {
  it('should classify the code and keep the original error as cause', () => {
    const original = new FirebaseError(
      'auth/wrong-password',
      'Firebase: Error (auth/wrong-password).'
    );
    const error = new AuthError('auth/wrong-password', { cause: original });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('AuthError');
    expect(error.kind).toBe('wrong_password');
    expect(error.code).toBe('auth/wrong-password');
    expect(error.message).toBe('Firebase: Error (auth/wrong-password).');
    expect(error.cause).toBe(original);
    expect(error.retryable).toBe(false);
    expect(error.severity).toBe('warn');
  });

  it('should mark network failures as retryable', () => {
    const error = new AuthError('auth/network-request-failed');
    expect(error.retryable).toBe(true);
    expect(error.severity).toBe('error');
  });

  it('should prefer an explicit message', () => {
    const error = new AuthError('auth/missing-continue-uri', {
      message: 'A continue URL must be provided in the request.',
    });
    expect(error.message).toBe('A continue URL must be provided in the request.');
    expect(Object.prototype.hasOwnProperty.call(error, 'cause')).toBe(false);
  });

  it('should describe the code when nothing else provides a message', () => {
    const error = new AuthError('auth/made-up-code', { cause: { code: 'auth/made-up-code' } });
    expect(error.message).toBe('Firebase Auth error (auth/made-up-code)');
    expect(error.kind).toBe('other');
  });

  describe('from', () => {
    it('should wrap an SDK error', () => {
      const original = new FirebaseError('auth/user-not-found', 'Firebase: Error (auth/user-not-found).');
      const error = AuthError.from(original, 'signInWithEmailAndPassword');

      expect(error.kind).toBe('user_not_found');
      expect(error.operation).toBe('signInWithEmailAndPassword');
      expect(error.cause).toBe(original);
    });

    it('should return an existing AuthError unchanged', () => {
      const existing = new AuthError('auth/weak-password', { operation: 'createUserWithEmailAndPassword' });
      expect(AuthError.from(existing, 'signOut')).toBe(existing);
    });

    it('should wrap values without a code as other', () => {
      const error = AuthError.from(new TypeError('fetch failed'));

      expect(error.kind).toBe('other');
      expect(error.code).toBe(UNKNOWN_ERROR_CODE);
      expect(error.message).toBe('fetch failed');
    });
  });

  describe('isAuthError', () => {
    it('should narrow AuthError values only', () => {
      expect(isAuthError(new AuthError('auth/weak-password'))).toBe(true);
      expect(isAuthError(new Error('x'))).toBe(false);
      expect(isAuthError({ code: 'auth/weak-password', kind: 'weak_password' })).toBe(false);
    });
  });
});
