/**
 * Email / Password Authentication
 */

import { bridge } from "../bridge/async-bridge.js";
import { AuthCredential } from "../credential.js";
import type { DiagnosticLogger } from "../debug/diagnostic-logger.js";
import type { AuthSdk, SdkUserCredential } from "../providers/auth-sdk.js";

/**
 * Password authentication options
 */
export interface PasswordAuthOptions<
  TAuth,
  TUser,
  TCredential extends SdkUserCredential<TUser>,
> {
  sdk: AuthSdk<TAuth, TUser, TCredential>;
  /** Auth instance every call runs against */
  auth: TAuth;
  logger?: DiagnosticLogger | null;
}

export class PasswordAuthImpl<
  TAuth,
  TUser,
  TCredential extends SdkUserCredential<TUser>,
> {
  private readonly sdk: AuthSdk<TAuth, TUser, TCredential>;
  private readonly auth: TAuth;
  private readonly logger: DiagnosticLogger | null;

  constructor(options: PasswordAuthOptions<TAuth, TUser, TCredential>) {
    this.sdk = options.sdk;
    this.auth = options.auth;
    this.logger = options.logger ?? null;
  }

  /**
   * Create an account and sign it in
   */
  async signUp(
    email: string,
    password: string,
  ): Promise<AuthCredential<TUser, TCredential>> {
    const credential = await bridge(
      "createUserWithEmailAndPassword",
      () => this.sdk.createUserWithEmailAndPassword(this.auth, email, password),
      { logger: this.logger, metadata: { email } },
    );
    return new AuthCredential<TUser, TCredential>(credential);
  }

  async signIn(
    email: string,
    password: string,
  ): Promise<AuthCredential<TUser, TCredential>> {
    const credential = await bridge(
      "signInWithEmailAndPassword",
      () => this.sdk.signInWithEmailAndPassword(this.auth, email, password),
      { logger: this.logger, metadata: { email } },
    );
    return new AuthCredential<TUser, TCredential>(credential);
  }
}
