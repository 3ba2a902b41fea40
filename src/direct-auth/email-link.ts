/**
 * Email Link Authentication
 *
 * Passwordless sign-in: send a link to the user's inbox, then complete
 * sign-in with the same email and the link the user opened.
 */

import { bridge } from "../bridge/async-bridge.js";
import { AuthCredential } from "../credential.js";
import type { DiagnosticLogger } from "../debug/diagnostic-logger.js";
import type { AuthSdk, SdkUserCredential } from "../providers/auth-sdk.js";
import {
  defineActionCodeSettings,
  serializeActionCodeSettings,
  type ActionCodeSettings,
  type ActionCodeSettingsInit,
} from "../settings/action-code-settings.js";

/**
 * Email link authentication options
 */
export interface EmailLinkAuthOptions<
  TAuth,
  TUser,
  TCredential extends SdkUserCredential<TUser>,
> {
  sdk: AuthSdk<TAuth, TUser, TCredential>;
  auth: TAuth;
  logger?: DiagnosticLogger | null;
}

export class EmailLinkAuthImpl<
  TAuth,
  TUser,
  TCredential extends SdkUserCredential<TUser>,
> {
  private readonly sdk: AuthSdk<TAuth, TUser, TCredential>;
  private readonly auth: TAuth;
  private readonly logger: DiagnosticLogger | null;

  constructor(options: EmailLinkAuthOptions<TAuth, TUser, TCredential>) {
    this.sdk = options.sdk;
    this.auth = options.auth;
    this.logger = options.logger ?? null;
  }

  /**
   * Send a sign-in link to an email address
   *
   * Plain settings objects are validated first, so invalid settings fail
   * with an AuthError before anything reaches the SDK.
   */
  async send(
    email: string,
    settings: ActionCodeSettings | ActionCodeSettingsInit,
  ): Promise<void> {
    const actionCodeSettings = serializeActionCodeSettings(
      defineActionCodeSettings(settings),
    );

    await bridge(
      "sendSignInLinkToEmail",
      () => this.sdk.sendSignInLinkToEmail(this.auth, email, actionCodeSettings),
      {
        logger: this.logger,
        metadata: { email, url: actionCodeSettings.url },
      },
    );
  }

  /**
   * Complete sign-in with a link from {@link send}
   */
  async signIn(
    email: string,
    emailLink: string,
  ): Promise<AuthCredential<TUser, TCredential>> {
    const credential = await bridge(
      "signInWithEmailLink",
      () => this.sdk.signInWithEmailLink(this.auth, email, emailLink),
      { logger: this.logger, metadata: { email } },
    );
    return new AuthCredential<TUser, TCredential>(credential);
  }

  /**
   * Check whether a URL is a sign-in link
   */
  isSignInLink(emailLink: string): boolean {
    return this.sdk.isSignInWithEmailLink(this.auth, emailLink);
  }
}
