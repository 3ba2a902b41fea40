import { describe, it, expect, vi } from 'vitest';
import { FirebaseError } from 'firebase/app';
import { bridge } from '../../../src/bridge/async-bridge.js';
import { DiagnosticLogger, type OperationLogEntry } from '../../../src/debug/diagnostic-logger.js';
import { AuthError } from '../../../src/errors.js';

function operationEntries(logger: DiagnosticLogger): OperationLogEntry[] {
  return logger
    .getLogs()
    .filter((entry): entry is OperationLogEntry => entry.category === 'operation');
}

describe('bridge', () => {
  it('should pass the SDK result through unchanged', async () => {
    const result = { user: { uid: 'uid-1' }, providerId: 'password', operationType: 'signIn' };

    await expect(
      bridge('signInWithEmailAndPassword', () => Promise.resolve(result))
    ).resolves.toBe(result);
  });

  it('should rethrow SDK failures as AuthError with the original as cause', async () => {
    const original = new FirebaseError(
      'auth/wrong-password',
      'Firebase: Error (auth/wrong-password).'
    );

    const error = await bridge('signInWithEmailAndPassword', () => Promise.reject(original)).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(AuthError);
    if (!(error instanceof AuthError)) return;
    expect(error.kind).toBe('wrong_password');
    expect(error.operation).toBe('signInWithEmailAndPassword');
    expect(error.cause).toBe(original);
    expect(error.message).toBe('Firebase: Error (auth/wrong-password).');
  });

  it('should classify synchronous throws the same way', async () => {
    await expect(
      bridge('signOut', () => {
        throw new FirebaseError('auth/app-deleted', 'Firebase: Error (auth/app-deleted).');
      })
    ).rejects.toMatchObject({ kind: 'app_deleted', operation: 'signOut' });
  });

  it('should call the SDK exactly once', async () => {
    const call = vi.fn().mockRejectedValue({ code: 'auth/network-request-failed' });

    await expect(bridge('signOut', call)).rejects.toMatchObject({
      kind: 'network_request_failed',
      retryable: true,
    });
    expect(call).toHaveBeenCalledTimes(1);
  });

  describe('logging', () => {
    it('should log start and success', async () => {
      const logger = new DiagnosticLogger({ enabled: true });

      await bridge('signInWithEmailLink', () => Promise.resolve('ok'), {
        logger,
        metadata: { email: 'alice@example.com' },
      });

      const entries = operationEntries(logger);
      expect(entries.map((e) => e.phase)).toEqual(['start', 'success']);
      expect(entries[0].metadata).toEqual({ email: 'a***@example.com' });
      expect(entries[1].durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should log failures with code and kind', async () => {
      const logger = new DiagnosticLogger({ enabled: true });

      await bridge('createUserWithEmailAndPassword', () =>
        Promise.reject({ code: 'auth/email-already-in-use' }), { logger }
      ).catch(() => undefined);

      const failure = operationEntries(logger)[1];
      expect(failure.phase).toBe('failure');
      expect(failure.level).toBe('warn');
      expect(failure.errorCode).toBe('auth/email-already-in-use');
      expect(failure.errorKind).toBe('email_already_in_use');
    });
  });
});
