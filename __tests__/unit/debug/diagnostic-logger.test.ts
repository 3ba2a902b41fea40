import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DiagnosticLogger,
  createConsoleDebugLogger,
  createDiagnosticLogger,
  type DebugLogger,
} from '../../../src/debug/diagnostic-logger.js';

describe('DiagnosticLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should collect nothing when disabled', () => {
    const logger = new DiagnosticLogger({ enabled: false });

    logger.logOperation({ operation: 'signOut', phase: 'start' });
    logger.logAuthState({ signedIn: false });

    expect(logger.isEnabled()).toBe(false);
    expect(logger.getLogs()).toEqual([]);
  });

  it('should tag entries with the diagnostic session id', () => {
    const logger = new DiagnosticLogger({ enabled: true, sessionId: 'session-1' });

    logger.logAuthState({ signedIn: true, uid: 'uid-1' });

    expect(logger.getLogs()[0]).toMatchObject({
      diagnosticSessionId: 'session-1',
      category: 'auth-state',
      level: 'info',
      signedIn: true,
      uid: 'uid-1',
    });
  });

  it('should sanitize operation metadata', () => {
    const logger = new DiagnosticLogger({ enabled: true });

    logger.logOperation({
      operation: 'signInWithEmailAndPassword',
      phase: 'start',
      metadata: { email: 'alice@example.com', password: 'test-password-value' },
    });

    expect(logger.getLogs()[0].metadata).toEqual({
      email: 'a***@example.com',
      password: 'test...alue',
    });
  });

  it('should drop the oldest entries beyond maxLogs', () => {
    const logger = new DiagnosticLogger({ enabled: true, maxLogs: 2 });

    logger.logAuthState({ signedIn: true, uid: 'uid-1' });
    logger.logAuthState({ signedIn: true, uid: 'uid-2' });
    logger.logAuthState({ signedIn: true, uid: 'uid-3' });

    expect(
      logger.getLogs().map((entry) => (entry.category === 'auth-state' ? entry.uid : null))
    ).toEqual(['uid-2', 'uid-3']);
  });

  it('should echo entries to the debug logger', () => {
    const debugLogger: DebugLogger = { log: vi.fn() };
    const logger = new DiagnosticLogger({ enabled: true, debugLogger });

    logger.logOperation({
      operation: 'signOut',
      phase: 'failure',
      errorCode: 'auth/network-request-failed',
      errorKind: 'network_request_failed',
    });

    expect(debugLogger.log).toHaveBeenCalledWith(
      'warn',
      '[DIAGNOSTIC] operation',
      expect.objectContaining({ operation: 'signOut', phase: 'failure' })
    );
  });

  it('should export logs as JSON', () => {
    const logger = new DiagnosticLogger({ enabled: true });
    logger.logAuthState({ signedIn: false });

    const exported: unknown = JSON.parse(logger.exportLogs());

    expect(exported).toEqual([expect.objectContaining({ category: 'auth-state', signedIn: false })]);
  });

  it('should clear logs and rotate the session id on reset', () => {
    const logger = new DiagnosticLogger({ enabled: true, sessionId: 'session-1' });
    logger.logAuthState({ signedIn: false });

    logger.resetSession();

    expect(logger.getLogs()).toEqual([]);
    expect(logger.getDiagnosticSessionId()).not.toBe('session-1');
  });

  describe('createDiagnosticLogger', () => {
    it('should return null unless enabled', () => {
      expect(createDiagnosticLogger()).toBeNull();
      expect(createDiagnosticLogger({ enabled: false })).toBeNull();
      expect(createDiagnosticLogger({ enabled: true })).toBeInstanceOf(DiagnosticLogger);
    });
  });

  describe('createConsoleDebugLogger', () => {
    it('should route levels to the matching console method', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      const logger = createConsoleDebugLogger();

      logger.log('warn', 'something happened', { code: 'auth/x' });
      logger.log('debug', 'detail');

      expect(warn).toHaveBeenCalledWith('[FirebaseAuth] something happened', { code: 'auth/x' });
      expect(debug).toHaveBeenCalledWith('[FirebaseAuth] detail');
    });
  });
});
