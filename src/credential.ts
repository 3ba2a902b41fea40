/**
 * Auth Credential
 *
 * Read-only view over a credential returned by the SDK. The SDK object is
 * held by reference; nothing is copied or validated.
 */

import type { SdkUserCredential } from "./providers/auth-sdk.js";

export class AuthCredential<
  TUser,
  TCredential extends SdkUserCredential<TUser> = SdkUserCredential<TUser>,
> {
  constructor(private readonly credential: TCredential) {}

  /** Signed-in user */
  get user(): TUser {
    return this.credential.user;
  }

  /** Provider that issued the credential, e.g. `password` */
  get providerId(): string | null {
    return this.credential.providerId;
  }

  /** `signIn`, `link` or `reauthenticate` */
  get operationType(): string {
    return this.credential.operationType;
  }

  /**
   * The SDK's own credential object
   */
  get raw(): TCredential {
    return this.credential;
  }
}
