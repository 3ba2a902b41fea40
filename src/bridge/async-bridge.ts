/**
 * Async Bridge
 *
 * Runs one SDK call and converts its rejection into {@link AuthError}.
 * Success values pass through untouched. No timeout, retry or
 * cancellation is added: the SDK owns all of that.
 */

import type { DiagnosticLogger } from "../debug/diagnostic-logger.js";
import { AuthError, type AuthOperation } from "../errors.js";

export interface BridgeOptions {
  logger?: DiagnosticLogger | null;
  /** Logged with the start entry (sanitized) */
  metadata?: Record<string, unknown>;
}

export async function bridge<T>(
  operation: AuthOperation,
  call: () => Promise<T>,
  options: BridgeOptions = {},
): Promise<T> {
  const logger = options.logger ?? null;
  const startedAt = Date.now();

  logger?.logOperation({
    operation,
    phase: "start",
    metadata: options.metadata,
  });

  let result: T;
  try {
    result = await call();
  } catch (error) {
    const authError = AuthError.from(error, operation);
    logger?.logOperation({
      operation,
      phase: "failure",
      durationMs: Date.now() - startedAt,
      errorCode: authError.code,
      errorKind: authError.kind,
    });
    throw authError;
  }

  logger?.logOperation({
    operation,
    phase: "success",
    durationMs: Date.now() - startedAt,
  });
  return result;
}
