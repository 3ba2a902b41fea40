/**
 * Auth State Observation
 *
 * Registers an observer with the SDK's auth-state notifications. The SDK
 * calls it on sign-in, sign-out and when a token refresh changes the
 * signed-in user; `null` means nobody is signed in. Calls arrive in the
 * SDK's dispatch order, one at a time.
 */

import type { DiagnosticLogger } from "../debug/diagnostic-logger.js";
import { AuthError } from "../errors.js";
import type { AuthSdk, SdkUserCredential, Unsubscribe } from "../providers/auth-sdk.js";

export type AuthStateObserver<TUser> = (user: TUser | null) => void;

export interface ObserveAuthStateOptions {
  logger?: DiagnosticLogger | null;
  /**
   * Called if the SDK reports an error on the state stream; the error is
   * classified with operation `onAuthStateChanged`
   */
  onError?: (error: AuthError) => void;
}

function readUid(user: unknown): string | undefined {
  if (
    typeof user === "object" &&
    user !== null &&
    "uid" in user &&
    typeof user.uid === "string"
  ) {
    return user.uid;
  }
  return undefined;
}

/**
 * Register an auth state observer
 *
 * @returns Function that unregisters the observer
 */
export function observeAuthState<
  TAuth,
  TUser,
  TCredential extends SdkUserCredential<TUser>,
>(
  sdk: AuthSdk<TAuth, TUser, TCredential>,
  auth: TAuth,
  observer: AuthStateObserver<TUser>,
  options: ObserveAuthStateOptions = {},
): Unsubscribe {
  const logger = options.logger ?? null;
  const onError = options.onError;

  return sdk.onAuthStateChanged(
    auth,
    (user) => {
      logger?.logAuthState({ signedIn: user !== null, uid: readUid(user) });
      try {
        observer(user);
      } catch (error) {
        // Keep one failing observer from breaking the SDK's dispatch
        console.error("[FirebaseAuth] Error in auth state observer:", error);
      }
    },
    onError === undefined
      ? undefined
      : (error) => {
        const authError = AuthError.from(error, "onAuthStateChanged");
        logger?.logOperation({
          operation: "onAuthStateChanged",
          phase: "failure",
          errorCode: authError.code,
          errorKind: authError.kind,
        });
        onError(authError);
      },
  );
}
