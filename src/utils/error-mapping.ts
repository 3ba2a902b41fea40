/**
 * Error Code Mapping
 *
 * Static table from Firebase Auth error codes (`auth/<reason>`) to the
 * error kinds exposed by this package, plus per-kind metadata.
 */

/**
 * Known Firebase Auth error codes and their kinds
 */
export const AUTH_ERROR_KIND_MAP = {
  // Project / configuration errors
  "auth/app-deleted": "app_deleted",
  "auth/app-not-authorized": "app_not_authorized",
  "auth/argument-error": "argument_error",
  "auth/invalid-api-key": "invalid_api_key",
  "auth/invalid-tenant-id": "invalid_tenant_id",
  "auth/operation-not-allowed": "operation_not_allowed",
  "auth/unauthorized-domain": "unauthorized_domain",
  "auth/web-storage-unsupported": "web_storage_unsupported",

  // Session errors
  "auth/invalid-user-token": "invalid_user_token",
  "auth/requires-recent-login": "requires_recent_login",
  "auth/user-token-expired": "user_token_expired",

  // Transport errors
  "auth/network-request-failed": "network_request_failed",
  "auth/too-many-requests": "too_many_requests",

  // Account errors
  "auth/user-disabled": "user_disabled",
  "auth/invalid-email": "invalid_email",
  "auth/user-not-found": "user_not_found",
  "auth/wrong-password": "wrong_password",
  "auth/invalid-credential": "invalid_credential",
  "auth/email-already-in-use": "email_already_in_use",
  "auth/weak-password": "weak_password",

  // Email action errors
  "auth/missing-android-pkg-name": "missing_android_pkg_name",
  "auth/missing-continue-uri": "missing_continue_uri",
  "auth/missing-ios-bundle-id": "missing_ios_bundle_id",
  "auth/invalid-continue-uri": "invalid_continue_uri",
  "auth/unauthorized-continue-uri": "unauthorized_continue_uri",
  "auth/expired-action-code": "expired_action_code",
  "auth/invalid-action-code": "invalid_action_code",
} as const;

export type KnownAuthErrorCode = keyof typeof AUTH_ERROR_KIND_MAP;

export type KnownAuthErrorKind = (typeof AUTH_ERROR_KIND_MAP)[KnownAuthErrorCode];

/**
 * Error kind; `"other"` covers every code missing from the table
 */
export type AuthErrorKind = KnownAuthErrorKind | "other";

/**
 * Error severity level
 */
export type AuthErrorSeverity = "info" | "warn" | "error" | "critical";

/**
 * Check whether a code is in the known table
 *
 * Only own keys count, so names like `toString` are not codes.
 */
export function isKnownAuthErrorCode(code: string): code is KnownAuthErrorCode {
  return Object.prototype.hasOwnProperty.call(AUTH_ERROR_KIND_MAP, code);
}

/**
 * Get the error kind for a code
 */
export function getAuthErrorKind(code: string): AuthErrorKind {
  return isKnownAuthErrorCode(code) ? AUTH_ERROR_KIND_MAP[code] : "other";
}

const RETRYABLE_KINDS: ReadonlySet<AuthErrorKind> = new Set<AuthErrorKind>([
  "network_request_failed",
  "too_many_requests",
]);

// Caused by what the user typed or clicked
const USER_INPUT_KINDS: ReadonlySet<AuthErrorKind> = new Set<AuthErrorKind>([
  "invalid_email",
  "user_not_found",
  "wrong_password",
  "invalid_credential",
  "email_already_in_use",
  "weak_password",
  "expired_action_code",
  "invalid_action_code",
]);

// Only fixable in the Firebase project or the calling code
const CONFIGURATION_KINDS: ReadonlySet<AuthErrorKind> = new Set<AuthErrorKind>([
  "app_deleted",
  "app_not_authorized",
  "argument_error",
  "invalid_api_key",
  "invalid_tenant_id",
  "operation_not_allowed",
  "unauthorized_domain",
  "web_storage_unsupported",
  "missing_android_pkg_name",
  "missing_continue_uri",
  "missing_ios_bundle_id",
  "invalid_continue_uri",
  "unauthorized_continue_uri",
]);

/**
 * Whether the same call may succeed if repeated later
 */
export function isRetryableKind(kind: AuthErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

/**
 * Map an error kind to a severity level
 */
export function getKindSeverity(kind: AuthErrorKind): AuthErrorSeverity {
  if (USER_INPUT_KINDS.has(kind)) return "warn";
  if (CONFIGURATION_KINDS.has(kind)) return "critical";
  return "error";
}
