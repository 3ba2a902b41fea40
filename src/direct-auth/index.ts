/**
 * Direct Auth Module
 *
 * Email / password and email link sign-in.
 */

export { PasswordAuthImpl, type PasswordAuthOptions } from "./password.js";
export { EmailLinkAuthImpl, type EmailLinkAuthOptions } from "./email-link.js";
