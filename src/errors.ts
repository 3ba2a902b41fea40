/**
 * AuthError
 *
 * The single error type thrown by every bridged operation. Wraps the
 * SDK's error as `cause` and adds the classified kind.
 */

import {
  getAuthErrorKind,
  getKindSeverity,
  isRetryableKind,
  type AuthErrorKind,
  type AuthErrorSeverity,
} from "./utils/error-mapping.js";

/**
 * Code assigned to thrown values that carry no `code` string
 */
export const UNKNOWN_ERROR_CODE = "auth/unknown";

/**
 * Operations that go through the bridge
 */
export type AuthOperation =
  | "createUserWithEmailAndPassword"
  | "signInWithEmailAndPassword"
  | "signInWithEmailLink"
  | "sendSignInLinkToEmail"
  | "signOut"
  | "onAuthStateChanged"
  | "actionCodeSettings";

/**
 * Result of classifying a code string
 */
export interface ClassifiedAuthError {
  kind: AuthErrorKind;
  /** The code exactly as received */
  code: string;
}

/**
 * Classify an error code
 *
 * Total: any string is accepted, and codes missing from the table come
 * back as `{ kind: "other", code }`.
 */
export function classifyAuthErrorCode(code: string): ClassifiedAuthError {
  return { kind: getAuthErrorKind(code), code };
}

/**
 * Read the `code` string from an unknown thrown value
 */
export function extractErrorCode(error: unknown): string {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return UNKNOWN_ERROR_CODE;
}

function extractErrorMessage(error: unknown, code: string): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  if (typeof error === "string" && error) {
    return error;
  }
  return `Firebase Auth error (${code})`;
}

export interface AuthErrorOptions {
  /** Error received from the SDK */
  cause?: unknown;
  /** Overrides the message taken from `cause` */
  message?: string;
  operation?: AuthOperation;
}

export class AuthError extends Error {
  readonly kind: AuthErrorKind;
  readonly code: string;
  readonly retryable: boolean;
  readonly severity: AuthErrorSeverity;
  readonly operation?: AuthOperation;

  constructor(code: string, options: AuthErrorOptions = {}) {
    super(
      options.message ?? extractErrorMessage(options.cause, code),
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = "AuthError";
    this.code = code;
    this.kind = getAuthErrorKind(code);
    this.retryable = isRetryableKind(this.kind);
    this.severity = getKindSeverity(this.kind);
    this.operation = options.operation;
  }

  /**
   * Build an AuthError from whatever the SDK rejected with
   */
  static from(error: unknown, operation?: AuthOperation): AuthError {
    if (error instanceof AuthError) {
      return error;
    }
    return new AuthError(extractErrorCode(error), { cause: error, operation });
  }
}

export function isAuthError(value: unknown): value is AuthError {
  return value instanceof AuthError;
}
