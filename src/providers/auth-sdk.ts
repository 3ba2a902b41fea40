/**
 * Auth SDK Provider
 *
 * The Firebase Auth functions this package calls, gathered behind one
 * interface. The default implementation binds the modular `firebase/auth`
 * SDK; tests pass an in-process implementation instead.
 */

import type { FirebaseApp } from "firebase/app";
import {
  createUserWithEmailAndPassword,
  getAuth,
  isSignInWithEmailLink,
  onAuthStateChanged,
  sendSignInLinkToEmail,
  signInWithEmailAndPassword,
  signInWithEmailLink,
  signOut,
  type ActionCodeSettings,
  type Auth,
  type User,
  type UserCredential,
} from "firebase/auth";

/**
 * Fields read from a credential returned by the SDK
 */
export interface SdkUserCredential<TUser> {
  user: TUser;
  providerId: string | null;
  operationType: string;
}

export type Unsubscribe = () => void;

/**
 * Firebase Auth surface used by the client
 *
 * `TAuth`, `TUser` and `TCredential` are the SDK's own handle types and
 * are never inspected beyond the fields of {@link SdkUserCredential}.
 */
export interface AuthSdk<
  TAuth,
  TUser,
  TCredential extends SdkUserCredential<TUser> = SdkUserCredential<TUser>,
> {
  createUserWithEmailAndPassword(
    auth: TAuth,
    email: string,
    password: string,
  ): Promise<TCredential>;

  signInWithEmailAndPassword(
    auth: TAuth,
    email: string,
    password: string,
  ): Promise<TCredential>;

  signInWithEmailLink(
    auth: TAuth,
    email: string,
    emailLink: string,
  ): Promise<TCredential>;

  sendSignInLinkToEmail(
    auth: TAuth,
    email: string,
    actionCodeSettings: ActionCodeSettings,
  ): Promise<void>;

  isSignInWithEmailLink(auth: TAuth, emailLink: string): boolean;

  signOut(auth: TAuth): Promise<void>;

  onAuthStateChanged(
    auth: TAuth,
    next: (user: TUser | null) => void,
    error?: (error: Error) => void,
  ): Unsubscribe;
}

/**
 * AuthSdk bound to the modular Firebase JS SDK
 */
export type FirebaseAuthSdk = AuthSdk<Auth, User, UserCredential>;

export const firebaseAuthSdk: FirebaseAuthSdk = {
  createUserWithEmailAndPassword,
  signInWithEmailAndPassword,
  signInWithEmailLink,
  sendSignInLinkToEmail,
  isSignInWithEmailLink,
  signOut,
  onAuthStateChanged(auth, next, error) {
    return onAuthStateChanged(auth, next, error);
  },
};

/**
 * Get the Auth instance for an app (the default app when omitted)
 */
export function getFirebaseAuth(app?: FirebaseApp): Auth {
  return getAuth(app);
}
