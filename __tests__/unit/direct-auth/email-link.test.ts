import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EmailLinkAuthImpl } from '../../../src/direct-auth/email-link.js';
import { defineActionCodeSettings } from '../../../src/settings/action-code-settings.js';
import {
  FakeAuthSdk,
  authError,
  createFakeAuth,
  type FakeAuth,
  type FakeCredential,
  type FakeUser,
} from '../../helpers/fake-auth-sdk.js';

describe('EmailLinkAuthImpl', () => {
  let sdk: FakeAuthSdk;
  let auth: FakeAuth;
  let emailLink: EmailLinkAuthImpl<FakeAuth, FakeUser, FakeCredential>;

  beforeEach(() => {
    sdk = new FakeAuthSdk();
    auth = createFakeAuth();
    emailLink = new EmailLinkAuthImpl({ sdk, auth });
  });

  describe('send', () => {
    it('should pass serialized settings to the SDK', async () => {
      await emailLink.send('alice@example.com', {
        url: 'https://app.example.com/finish',
        handleCodeInApp: true,
        android: { packageName: 'com.app', installApp: true },
      });

      expect(sdk.sentLinks).toHaveLength(1);
      expect(sdk.sentLinks[0].email).toBe('alice@example.com');
      expect(sdk.sentLinks[0].settings).toEqual({
        url: 'https://app.example.com/finish',
        android: { packageName: 'com.app', installApp: true },
        handleCodeInApp: true,
      });
    });

    it('should accept settings built ahead of time', async () => {
      const settings = defineActionCodeSettings({ url: 'https://app.example.com/finish' });

      await emailLink.send('alice@example.com', settings);

      expect(sdk.sentLinks[0].settings).toEqual({ url: 'https://app.example.com/finish' });
    });

    it('should reject invalid settings before calling the SDK', async () => {
      const spy = vi.spyOn(sdk, 'sendSignInLinkToEmail');

      await expect(emailLink.send('alice@example.com', { url: '' })).rejects.toMatchObject({
        code: 'auth/invalid-continue-uri',
        kind: 'invalid_continue_uri',
      });
      expect(spy).not.toHaveBeenCalled();
    });

    it('should classify SDK failures', async () => {
      sdk.failNextWith(authError('auth/unauthorized-continue-uri'));

      await expect(
        emailLink.send('alice@example.com', { url: 'https://evil.example.com' })
      ).rejects.toMatchObject({
        kind: 'unauthorized_continue_uri',
        operation: 'sendSignInLinkToEmail',
      });
    });
  });

  describe('signIn', () => {
    it('should sign in with a link that was sent', async () => {
      await emailLink.send('alice@example.com', { url: 'https://app.example.com/finish' });
      const { link } = sdk.sentLinks[0];

      const credential = await emailLink.signIn('alice@example.com', link);

      expect(credential.user.email).toBe('alice@example.com');
      expect(credential.providerId).toBe('emailLink');
      expect(credential.operationType).toBe('signIn');
    });

    it('should reject an unknown link with invalid_action_code', async () => {
      await expect(
        emailLink.signIn('alice@example.com', 'https://app.example.com/finish?mode=signIn&oobCode=nope')
      ).rejects.toMatchObject({
        kind: 'invalid_action_code',
        operation: 'signInWithEmailLink',
      });
    });

    it('should surface expired_action_code', async () => {
      await emailLink.send('alice@example.com', { url: 'https://app.example.com/finish' });
      sdk.failNextWith(authError('auth/expired-action-code'));

      await expect(
        emailLink.signIn('alice@example.com', sdk.sentLinks[0].link)
      ).rejects.toMatchObject({ kind: 'expired_action_code' });
    });
  });

  describe('isSignInLink', () => {
    it('should delegate to the SDK', async () => {
      await emailLink.send('alice@example.com', { url: 'https://app.example.com/finish' });

      expect(emailLink.isSignInLink(sdk.sentLinks[0].link)).toBe(true);
      expect(emailLink.isSignInLink('https://app.example.com/finish')).toBe(false);
    });
  });
});
