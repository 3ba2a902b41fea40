/**
 * Client Entry Point
 *
 * Assembles the password, email link and auth state pieces into one
 * client bound to a single Auth instance.
 */

import type { Auth, User, UserCredential } from "firebase/auth";

import { bridge } from "./bridge/async-bridge.js";
import type { AuthCredential } from "./credential.js";
import { createDiagnosticLogger } from "./debug/diagnostic-logger.js";
import { EmailLinkAuthImpl } from "./direct-auth/email-link.js";
import { PasswordAuthImpl } from "./direct-auth/password.js";
import { AuthError, type AuthOperation } from "./errors.js";
import {
  firebaseAuthSdk,
  getFirebaseAuth,
  type SdkUserCredential,
} from "./providers/auth-sdk.js";
import { AuthStateChannel } from "./session/auth-state-channel.js";
import { observeAuthState } from "./session/auth-state.js";
import type {
  AuthClient,
  AuthClientConfig,
  AuthEventHandler,
  AuthEventName,
  AuthEventPayloads,
  EmailLinkNamespace,
  FirebaseAuthConfig,
  PasswordNamespace,
  SignInMethod,
} from "./types.js";

type AuthEventHandlers<TUser> = {
  [E in AuthEventName]: Set<AuthEventHandler<TUser, E>>;
};

/**
 * Event emitter for auth events
 */
class AuthEventEmitter<TUser> {
  private readonly handlers: AuthEventHandlers<TUser> = {
    "auth:login": new Set(),
    "auth:logout": new Set(),
    "auth:error": new Set(),
    "link:sent": new Set(),
  };

  on<E extends AuthEventName>(
    event: E,
    handler: AuthEventHandler<TUser, E>,
  ): () => void {
    const handlers: Set<AuthEventHandler<TUser, E>> = this.handlers[event];
    handlers.add(handler);

    // Return unsubscribe function
    return () => {
      handlers.delete(handler);
    };
  }

  emit<E extends AuthEventName>(
    event: E,
    payload: AuthEventPayloads<TUser>[E],
  ): void {
    const handlers: Set<AuthEventHandler<TUser, E>> = this.handlers[event];
    for (const handler of handlers) {
      try {
        handler(payload);
      } catch (error) {
        console.error(`[FirebaseAuth] Error in event handler for ${event}:`, error);
      }
    }
  }
}

/**
 * Create an auth client over any AuthSdk binding
 *
 * @example
 * ```typescript
 * const client = createAuthClient({ sdk: firebaseAuthSdk, auth: getAuth(app) });
 * ```
 */
export function createAuthClient<
  TAuth,
  TUser,
  TCredential extends SdkUserCredential<TUser>,
>(
  config: AuthClientConfig<TAuth, TUser, TCredential>,
): AuthClient<TAuth, TUser, TCredential> {
  const { sdk, auth } = config;
  const logger = createDiagnosticLogger(config.diagnosticLogging);
  const emitter = new AuthEventEmitter<TUser>();

  const passwordImpl = new PasswordAuthImpl({ sdk, auth, logger });
  const emailLinkImpl = new EmailLinkAuthImpl({ sdk, auth, logger });

  /**
   * Run an operation, reporting failures as `auth:error`
   */
  async function track<T>(
    operation: AuthOperation,
    run: () => Promise<T>,
  ): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const authError = AuthError.from(error, operation);
      emitter.emit("auth:error", {
        error: authError,
        operation: authError.operation ?? operation,
      });
      throw authError;
    }
  }

  function signedIn(
    credential: AuthCredential<TUser, TCredential>,
    method: SignInMethod,
  ): AuthCredential<TUser, TCredential> {
    emitter.emit("auth:login", {
      user: credential.user,
      method,
      operationType: credential.operationType,
    });
    return credential;
  }

  // ==========================================================================
  // Password Namespace
  // ==========================================================================

  const password: PasswordNamespace<TUser, TCredential> = {
    async signUp(email, pass) {
      const credential = await track("createUserWithEmailAndPassword", () =>
        passwordImpl.signUp(email, pass),
      );
      return signedIn(credential, "password");
    },

    async signIn(email, pass) {
      const credential = await track("signInWithEmailAndPassword", () =>
        passwordImpl.signIn(email, pass),
      );
      return signedIn(credential, "password");
    },
  };

  // ==========================================================================
  // Email Link Namespace
  // ==========================================================================

  const emailLink: EmailLinkNamespace<TUser, TCredential> = {
    async send(email, settings) {
      await track("sendSignInLinkToEmail", () => emailLinkImpl.send(email, settings));
      emitter.emit("link:sent", { email });
    },

    async signIn(email, link) {
      const credential = await track("signInWithEmailLink", () =>
        emailLinkImpl.signIn(email, link),
      );
      return signedIn(credential, "emailLink");
    },

    isSignInLink(link) {
      return emailLinkImpl.isSignInLink(link);
    },
  };

  function emitStateError(error: AuthError): void {
    emitter.emit("auth:error", {
      error,
      operation: error.operation ?? "onAuthStateChanged",
    });
  }

  // ==========================================================================
  // Sign Out
  // ==========================================================================

  async function signOut(): Promise<void> {
    await track("signOut", () =>
      bridge("signOut", () => sdk.signOut(auth), { logger }),
    );
    emitter.emit("auth:logout", {});
  }

  return {
    auth,
    password,
    emailLink,
    signOut,

    onStateChanged(observer, onError) {
      return observeAuthState(sdk, auth, observer, {
        logger,
        onError: (error) => {
          emitStateError(error);
          onError?.(error);
        },
      });
    },

    stateChanges(options) {
      return new AuthStateChannel<TUser>(
        (push, fail) =>
          observeAuthState(sdk, auth, push, {
            logger,
            onError: (error) => {
              emitStateError(error);
              fail(error);
            },
          }),
        options,
      );
    },

    on<E extends AuthEventName>(
      event: E,
      handler: AuthEventHandler<TUser, E>,
    ) {
      return emitter.on(event, handler);
    },

    getDiagnosticLogger() {
      return logger;
    },
  };
}

/**
 * Create an auth client for the Firebase JS SDK
 *
 * @example
 * ```typescript
 * const app = initializeApp(firebaseConfig);
 * const client = createFirebaseAuth({ app });
 *
 * try {
 *   const credential = await client.password.signIn(email, password);
 *   console.log('User:', credential.user.uid);
 * } catch (error) {
 *   if (isAuthError(error) && error.kind === 'wrong_password') {
 *     // ...
 *   }
 * }
 * ```
 */
export function createFirebaseAuth(
  config: FirebaseAuthConfig = {},
): AuthClient<Auth, User, UserCredential> {
  return createAuthClient({
    sdk: firebaseAuthSdk,
    auth: config.auth ?? getFirebaseAuth(config.app),
    diagnosticLogging: config.diagnosticLogging,
  });
}
