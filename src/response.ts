/**
 * Response Conversion Utilities
 *
 * Convert a bridged call's outcome into the { data, error } AuthResponse
 * shape for callers that would rather branch than catch.
 */

import { AuthError } from "./errors.js";
import type { AuthErrorInfo, AuthResponse } from "./types.js";

/**
 * Convert AuthError to AuthErrorInfo
 */
export function toAuthErrorInfo(error: AuthError): AuthErrorInfo {
  return {
    code: error.code,
    kind: error.kind,
    message: error.message,
    retryable: error.retryable,
    severity: error.severity,
    cause: error,
  };
}

/**
 * Create a success response
 */
export function success<T>(data: T): AuthResponse<T> {
  return { data, error: null };
}

/**
 * Create an error response
 */
export function failure<T>(error: AuthError): AuthResponse<T> {
  return { data: null, error: toAuthErrorInfo(error) };
}

/**
 * Settle a bridged call into an AuthResponse
 *
 * Rejections that are not AuthErrors are classified the same way the
 * bridge does.
 */
export async function toAuthResponse<T>(
  operation: Promise<T>,
): Promise<AuthResponse<T>> {
  try {
    return success(await operation);
  } catch (error) {
    return failure(AuthError.from(error));
  }
}
