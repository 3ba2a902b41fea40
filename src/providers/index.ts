/**
 * SDK Providers
 */

export {
  firebaseAuthSdk,
  getFirebaseAuth,
  type AuthSdk,
  type FirebaseAuthSdk,
  type SdkUserCredential,
  type Unsubscribe,
} from "./auth-sdk.js";
