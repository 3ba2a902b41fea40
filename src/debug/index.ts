/**
 * Debug Module
 */

export {
  DiagnosticLogger,
  createDiagnosticLogger,
  createConsoleDebugLogger,
} from "./diagnostic-logger.js";
export type {
  DebugLogger,
  DiagnosticLogLevel,
  BaseDiagnosticLogEntry,
  OperationLogEntry,
  AuthStateLogEntry,
  DiagnosticLogEntry,
  DiagnosticLoggerOptions,
} from "./diagnostic-logger.js";
