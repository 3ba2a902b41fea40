/**
 * Action Code Settings
 *
 * Settings for sign-in-link emails: where the link continues to and which
 * mobile app should open it. Validated once at construction, then
 * serialized into the object `sendSignInLinkToEmail` expects.
 */

import type { ActionCodeSettings as SdkActionCodeSettings } from "firebase/auth";
import { AuthError } from "../errors.js";

export interface AndroidActionCodeSettings {
  packageName: string;
  /** Minimum app version; older installs go to the Play Store */
  minimumVersion?: string;
  /** Offer to install the app when it is missing */
  installApp?: boolean;
}

export interface IOSActionCodeSettings {
  bundleId: string;
}

export interface ActionCodeSettingsInit {
  /** Continue URL embedded in the link (required) */
  url: string;
  android?: AndroidActionCodeSettings;
  ios?: IOSActionCodeSettings;
  /** Open the link in the app instead of the web widget */
  handleCodeInApp?: boolean;
  dynamicLinkDomain?: string;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function settingsError(code: string, message: string): AuthError {
  return new AuthError(code, { message, operation: "actionCodeSettings" });
}

function isParsableUrl(url: string): boolean {
  try {
    return new URL(url).protocol.length > 0;
  } catch {
    return false;
  }
}

/**
 * Validated action code settings
 *
 * Construction throws {@link AuthError} for settings the SDK would reject:
 * - `auth/missing-continue-uri` when `url` is not a string at all
 * - `auth/invalid-continue-uri` when `url` is empty or does not parse
 * - `auth/missing-android-pkg-name` when `android.packageName` is missing
 * - `auth/missing-ios-bundle-id` when `ios.bundleId` is missing
 */
export class ActionCodeSettings {
  readonly url: string;
  readonly android?: Readonly<AndroidActionCodeSettings>;
  readonly ios?: Readonly<IOSActionCodeSettings>;
  readonly handleCodeInApp?: boolean;
  readonly dynamicLinkDomain?: string;

  constructor(init: ActionCodeSettingsInit) {
    if (typeof init.url !== "string") {
      throw settingsError(
        "auth/missing-continue-uri",
        "A continue URL must be provided in the request.",
      );
    }
    if (!isParsableUrl(init.url)) {
      throw settingsError(
        "auth/invalid-continue-uri",
        `The continue URL is not a valid URL: ${init.url}`,
      );
    }
    if (init.android !== undefined && !isNonEmptyString(init.android.packageName)) {
      throw settingsError(
        "auth/missing-android-pkg-name",
        "An Android package name must be provided if the Android app is required to be installed.",
      );
    }
    if (init.ios !== undefined && !isNonEmptyString(init.ios.bundleId)) {
      throw settingsError(
        "auth/missing-ios-bundle-id",
        "An iOS bundle ID must be provided if an App Store ID is provided.",
      );
    }

    this.url = init.url;
    this.android = init.android && { ...init.android };
    this.ios = init.ios && { ...init.ios };
    this.handleCodeInApp = init.handleCodeInApp;
    this.dynamicLinkDomain = init.dynamicLinkDomain;
  }
}

export function defineActionCodeSettings(
  init: ActionCodeSettingsInit | ActionCodeSettings,
): ActionCodeSettings {
  return init instanceof ActionCodeSettings ? init : new ActionCodeSettings(init);
}

function serializeAndroid(
  android: Readonly<AndroidActionCodeSettings>,
): NonNullable<SdkActionCodeSettings["android"]> {
  const serialized: NonNullable<SdkActionCodeSettings["android"]> = {
    packageName: android.packageName,
  };
  if (android.installApp !== undefined) {
    serialized.installApp = android.installApp;
  }
  if (android.minimumVersion !== undefined) {
    serialized.minimumVersion = android.minimumVersion;
  }
  return serialized;
}

/**
 * Serialize settings for `sendSignInLinkToEmail`
 *
 * Fields left `undefined` are omitted; `false` and `""` are kept. The iOS
 * block is written under the SDK's `iOS` key.
 */
export function serializeActionCodeSettings(
  settings: ActionCodeSettings,
): SdkActionCodeSettings {
  const serialized: SdkActionCodeSettings = { url: settings.url };

  if (settings.android !== undefined) {
    serialized.android = serializeAndroid(settings.android);
  }
  if (settings.ios !== undefined) {
    serialized.iOS = { bundleId: settings.ios.bundleId };
  }
  if (settings.handleCodeInApp !== undefined) {
    serialized.handleCodeInApp = settings.handleCodeInApp;
  }
  if (settings.dynamicLinkDomain !== undefined) {
    serialized.dynamicLinkDomain = settings.dynamicLinkDomain;
  }

  return serialized;
}
