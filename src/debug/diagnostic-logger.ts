/**
 * Diagnostic Logger
 *
 * Structured, in-memory diagnostic logging for bridged auth operations
 * and auth-state notifications.
 *
 * Features:
 * - diagnosticSessionId for correlating entries from one client
 * - bounded in-memory log buffer
 * - JSON export
 * - DebugLogger (console) output integration
 */

import type { AuthOperation } from "../errors.js";
import type { AuthErrorKind } from "../utils/error-mapping.js";
import { sanitizeForLogging } from "../utils/sensitive-data.js";

/**
 * Diagnostic log level
 */
export type DiagnosticLogLevel = "debug" | "info" | "warn" | "error";

/**
 * Sink for log output
 */
export interface DebugLogger {
  log(level: DiagnosticLogLevel, message: string, data?: unknown): void;
}

/**
 * Base diagnostic log entry
 */
export interface BaseDiagnosticLogEntry {
  /** Unique log entry ID */
  id: string;

  /** Diagnostic session ID (one per logger) */
  diagnosticSessionId: string;

  /** Log category */
  category: string;

  /** Log level */
  level: DiagnosticLogLevel;

  /** Timestamp (Unix epoch in milliseconds) */
  timestamp: number;

  /** Additional metadata, sanitized before storage */
  metadata?: Record<string, unknown>;
}

/**
 * Bridged operation log entry
 */
export interface OperationLogEntry extends BaseDiagnosticLogEntry {
  category: "operation";

  operation: AuthOperation;

  phase: "start" | "success" | "failure";

  /** Time since the matching start entry (success / failure only) */
  durationMs?: number;

  errorCode?: string;

  errorKind?: AuthErrorKind;
}

/**
 * Auth state notification log entry
 */
export interface AuthStateLogEntry extends BaseDiagnosticLogEntry {
  category: "auth-state";

  signedIn: boolean;

  uid?: string;
}

/**
 * Union type of all diagnostic log entries
 */
export type DiagnosticLogEntry = OperationLogEntry | AuthStateLogEntry;

/**
 * Diagnostic logger options
 */
export interface DiagnosticLoggerOptions {
  /** Enable diagnostic logging */
  enabled: boolean;

  /** Underlying debug logger */
  debugLogger?: DebugLogger;

  /** Maximum number of logs to collect (default: 1000) */
  maxLogs?: number;

  /** Use existing diagnosticSessionId */
  sessionId?: string;
}

/**
 * Console-backed debug logger
 *
 * @param prefix - Prepended to every message (default: '[FirebaseAuth]')
 */
export function createConsoleDebugLogger(prefix = "[FirebaseAuth]"): DebugLogger {
  return {
    log(level, message, data) {
      const line = `${prefix} ${message}`;
      const args = data === undefined ? [line] : [line, data];
      switch (level) {
        case "debug":
          console.debug(...args);
          break;
        case "info":
          console.info(...args);
          break;
        case "warn":
          console.warn(...args);
          break;
        case "error":
          console.error(...args);
          break;
      }
    },
  };
}

export class DiagnosticLogger {
  private diagnosticSessionId: string;
  private readonly enabled: boolean;
  private readonly debugLogger?: DebugLogger;
  private readonly maxLogs: number;
  private logs: DiagnosticLogEntry[] = [];

  constructor(options: DiagnosticLoggerOptions) {
    this.enabled = options.enabled;
    this.debugLogger = options.debugLogger;
    this.maxLogs = options.maxLogs ?? 1000;
    this.diagnosticSessionId = options.sessionId ?? this.generateSessionId();
  }

  getDiagnosticSessionId(): string {
    return this.diagnosticSessionId;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Log one phase of a bridged operation
   */
  logOperation(options: {
    operation: AuthOperation;
    phase: OperationLogEntry["phase"];
    durationMs?: number;
    errorCode?: string;
    errorKind?: AuthErrorKind;
    metadata?: Record<string, unknown>;
  }): void {
    if (!this.enabled) return;

    const entry: OperationLogEntry = {
      id: this.generateEntryId(),
      diagnosticSessionId: this.diagnosticSessionId,
      category: "operation",
      level: options.phase === "failure" ? "warn" : "debug",
      timestamp: Date.now(),
      operation: options.operation,
      phase: options.phase,
      durationMs: options.durationMs,
      errorCode: options.errorCode,
      errorKind: options.errorKind,
      metadata: options.metadata && sanitizeForLogging(options.metadata),
    };

    this.writeLog(entry);
  }

  /**
   * Log an auth state notification
   */
  logAuthState(options: { signedIn: boolean; uid?: string }): void {
    if (!this.enabled) return;

    const entry: AuthStateLogEntry = {
      id: this.generateEntryId(),
      diagnosticSessionId: this.diagnosticSessionId,
      category: "auth-state",
      level: "info",
      timestamp: Date.now(),
      signedIn: options.signedIn,
      uid: options.uid,
    };

    this.writeLog(entry);
  }

  /**
   * Get all collected logs
   */
  getLogs(): DiagnosticLogEntry[] {
    return [...this.logs];
  }

  /**
   * Export logs as JSON string
   */
  exportLogs(): string {
    return JSON.stringify(this.logs, null, 2);
  }

  clearLogs(): void {
    this.logs = [];
  }

  /**
   * Reset diagnostic session (new sessionId)
   */
  resetSession(): void {
    this.diagnosticSessionId = this.generateSessionId();
    this.clearLogs();
  }

  private writeLog(entry: DiagnosticLogEntry): void {
    if (this.debugLogger) {
      this.debugLogger.log(
        entry.level,
        `[DIAGNOSTIC] ${entry.category}`,
        entry,
      );
    }

    this.logs.push(entry);

    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }
  }

  private generateSessionId(): string {
    return crypto.randomUUID();
  }

  private generateEntryId(): string {
    return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
  }
}

/**
 * Create a diagnostic logger, or null when logging is disabled
 */
export function createDiagnosticLogger(
  options?: DiagnosticLoggerOptions,
): DiagnosticLogger | null {
  if (!options?.enabled) {
    return null;
  }
  return new DiagnosticLogger(options);
}
