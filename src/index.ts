/**
 * typed-firebase-auth
 *
 * Typed bindings for the Firebase Authentication JS SDK
 *
 * Features:
 * - One AuthError type with a classified kind for every `auth/*` code
 * - Email / password and email link sign-in returning typed credentials
 * - Validated action code settings serialized for the SDK
 * - Auth state observers with unsubscribe, or as an async iterable
 * - Event system for auth lifecycle
 */

// =============================================================================
// Main Entry Point
// =============================================================================

export { createAuthClient, createFirebaseAuth } from "./firebase-auth.js";

// =============================================================================
// Type Definitions
// =============================================================================

export type {
  // Configuration
  AuthClientConfig,
  AuthClientOptions,
  FirebaseAuthConfig,
  DiagnosticLoggingOptions,

  // Response types (Discriminated Union)
  AuthResponse,
  AuthErrorInfo,

  // Main interface
  AuthClient,

  // Namespaces
  PasswordNamespace,
  EmailLinkNamespace,

  // Events
  AuthEventName,
  AuthEventHandler,
  AuthEventPayloads,
  SignInMethod,
} from "./types.js";

// =============================================================================
// Errors
// =============================================================================

export {
  AuthError,
  isAuthError,
  classifyAuthErrorCode,
  extractErrorCode,
  UNKNOWN_ERROR_CODE,
  type AuthErrorOptions,
  type AuthOperation,
  type ClassifiedAuthError,
} from "./errors.js";

export {
  AUTH_ERROR_KIND_MAP,
  getAuthErrorKind,
  isKnownAuthErrorCode,
  isRetryableKind,
  getKindSeverity,
  type AuthErrorKind,
  type AuthErrorSeverity,
  type KnownAuthErrorCode,
  type KnownAuthErrorKind,
  maskEmail,
  maskValue,
  sanitizeForLogging,
} from "./utils/index.js";

// =============================================================================
// Credentials & Settings
// =============================================================================

export { AuthCredential } from "./credential.js";

export {
  ActionCodeSettings,
  defineActionCodeSettings,
  serializeActionCodeSettings,
  type ActionCodeSettingsInit,
  type AndroidActionCodeSettings,
  type IOSActionCodeSettings,
} from "./settings/action-code-settings.js";

// =============================================================================
// Response Utilities (for advanced use cases)
// =============================================================================

export { success, failure, toAuthResponse, toAuthErrorInfo } from "./response.js";

// =============================================================================
// SDK Binding
// =============================================================================

export {
  firebaseAuthSdk,
  getFirebaseAuth,
  type AuthSdk,
  type FirebaseAuthSdk,
  type SdkUserCredential,
  type Unsubscribe,
} from "./providers/index.js";

export { bridge, type BridgeOptions } from "./bridge/async-bridge.js";

export {
  PasswordAuthImpl,
  EmailLinkAuthImpl,
  type PasswordAuthOptions,
  type EmailLinkAuthOptions,
} from "./direct-auth/index.js";

// =============================================================================
// Auth State
// =============================================================================

export {
  AuthStateChannel,
  observeAuthState,
  type AuthStateChannelOptions,
  type AuthStateObserver,
  type ObserveAuthStateOptions,
} from "./session/index.js";

// =============================================================================
// Debug Utilities
// =============================================================================

export {
  DiagnosticLogger,
  createDiagnosticLogger,
  createConsoleDebugLogger,
  type DebugLogger,
  type DiagnosticLogLevel,
  type DiagnosticLogEntry,
  type DiagnosticLoggerOptions,
  type OperationLogEntry,
  type AuthStateLogEntry,
} from "./debug/index.js";
