/**
 * Client Type Definitions
 */

import type { FirebaseApp } from "firebase/app";
import type { Auth } from "firebase/auth";
import type { AuthCredential } from "./credential.js";
import type { DebugLogger, DiagnosticLogger } from "./debug/diagnostic-logger.js";
import type { AuthError, AuthOperation } from "./errors.js";
import type { AuthSdk, SdkUserCredential, Unsubscribe } from "./providers/auth-sdk.js";
import type { AuthStateChannel, AuthStateChannelOptions } from "./session/auth-state-channel.js";
import type { AuthStateObserver } from "./session/auth-state.js";
import type {
  ActionCodeSettings,
  ActionCodeSettingsInit,
} from "./settings/action-code-settings.js";
import type { AuthErrorKind, AuthErrorSeverity } from "./utils/error-mapping.js";

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Diagnostic logging options
 */
export interface DiagnosticLoggingOptions {
  /** Enable diagnostic logging */
  enabled: boolean;

  /**
   * Maximum number of logs to collect
   *
   * Default: 1000
   */
  maxLogs?: number;

  /**
   * Where entries are echoed as they are written
   *
   * Default: none (entries are only collected in memory)
   */
  debugLogger?: DebugLogger;
}

/**
 * Options shared by every client
 */
export interface AuthClientOptions {
  diagnosticLogging?: DiagnosticLoggingOptions;
}

/**
 * Client configuration for a custom SDK binding
 */
export interface AuthClientConfig<
  TAuth,
  TUser,
  TCredential extends SdkUserCredential<TUser>,
> extends AuthClientOptions {
  sdk: AuthSdk<TAuth, TUser, TCredential>;
  /** Auth instance every call runs against */
  auth: TAuth;
}

/**
 * Client configuration for the Firebase JS SDK
 */
export interface FirebaseAuthConfig extends AuthClientOptions {
  /** App passed to `getAuth` (default app when omitted) */
  app?: FirebaseApp;
  /** Existing Auth instance; takes precedence over `app` */
  auth?: Auth;
}

// =============================================================================
// Response Types (Discriminated Union)
// =============================================================================

/**
 * Serializable error details
 */
export interface AuthErrorInfo {
  /** Firebase error code (`auth/<reason>`) */
  code: string;
  kind: AuthErrorKind;
  /** Human-readable error message */
  message: string;
  /** Whether the operation can be retried */
  retryable: boolean;
  /** Error severity level */
  severity: AuthErrorSeverity;
  /** The AuthError itself */
  cause: AuthError;
}

/**
 * AuthResponse - Discriminated Union for callers that prefer not to catch
 *
 * Usage:
 * ```typescript
 * const { data, error } = await toAuthResponse(auth.password.signIn(email, password));
 * if (error) {
 *   console.error(error.kind, error.message);
 *   return;
 * }
 * console.log('User:', data.user);
 * ```
 */
export type AuthResponse<T> =
  | { data: T; error: null }
  | { data: null; error: AuthErrorInfo };

// =============================================================================
// Event Types
// =============================================================================

/**
 * Auth event names with prefix convention
 */
export type AuthEventName =
  | "auth:login"
  | "auth:logout"
  | "auth:error"
  | "link:sent";

/**
 * Sign-in method reported with `auth:login`
 */
export type SignInMethod = "password" | "emailLink";

/**
 * Event payloads for each event type
 */
export interface AuthEventPayloads<TUser> {
  "auth:login": {
    user: TUser;
    method: SignInMethod;
    operationType: string;
  };
  "auth:logout": Record<string, never>;
  "auth:error": { error: AuthError; operation: AuthOperation };
  "link:sent": { email: string };
}

/**
 * Event handler type
 */
export type AuthEventHandler<TUser, E extends AuthEventName> = (
  payload: AuthEventPayloads<TUser>[E],
) => void;

// =============================================================================
// Namespaces
// =============================================================================

/**
 * Email / password namespace
 */
export interface PasswordNamespace<TUser, TCredential extends SdkUserCredential<TUser>> {
  /** Create an account and sign it in */
  signUp(email: string, password: string): Promise<AuthCredential<TUser, TCredential>>;
  signIn(email: string, password: string): Promise<AuthCredential<TUser, TCredential>>;
}

/**
 * Email link namespace
 */
export interface EmailLinkNamespace<TUser, TCredential extends SdkUserCredential<TUser>> {
  send(email: string, settings: ActionCodeSettings | ActionCodeSettingsInit): Promise<void>;
  signIn(email: string, emailLink: string): Promise<AuthCredential<TUser, TCredential>>;
  isSignInLink(emailLink: string): boolean;
}

/**
 * Auth client
 */
export interface AuthClient<
  TAuth,
  TUser,
  TCredential extends SdkUserCredential<TUser> = SdkUserCredential<TUser>,
> {
  /** The SDK's Auth instance */
  readonly auth: TAuth;

  password: PasswordNamespace<TUser, TCredential>;
  emailLink: EmailLinkNamespace<TUser, TCredential>;

  signOut(): Promise<void>;

  /**
   * Register an auth state observer
   *
   * Errors on the SDK's state stream go to `onError` and are emitted as
   * `auth:error`.
   *
   * @returns Function that unregisters the observer
   */
  onStateChanged(
    observer: AuthStateObserver<TUser>,
    onError?: (error: AuthError) => void,
  ): Unsubscribe;

  /**
   * Auth state notifications as an async iterable
   *
   * The channel stays registered with the SDK and buffers every unread
   * notification until it is closed; set `maxPending` to bound the buffer.
   * A stream error ends the channel: buffered notifications are still
   * yielded, then the read rejects with the AuthError.
   */
  stateChanges(options?: AuthStateChannelOptions): AuthStateChannel<TUser>;

  on<E extends AuthEventName>(
    event: E,
    handler: AuthEventHandler<TUser, E>,
  ): () => void;

  /** Null when diagnostic logging is disabled */
  getDiagnosticLogger(): DiagnosticLogger | null;
}
