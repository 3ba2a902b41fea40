/**
 * Sensitive Data Handling Utilities
 *
 * Masking for values that end up in diagnostic logs.
 */

/**
 * Field names whose string values are masked
 */
const SENSITIVE_FIELDS = new Set([
  "password",
  "newPassword",
  "oobCode",
  "emailLink",
  "link",
  "token",
  "idToken",
  "accessToken",
  "refreshToken",
  "apiKey",
  "secret",
  "credential",
]);

/**
 * Mask a sensitive value for logging
 *
 * @param value - The value to mask
 * @param visibleChars - Number of characters to show at start and end (default: 4)
 */
export function maskValue(value: string, visibleChars = 4): string {
  if (!value || value.length <= visibleChars * 2) {
    return "***";
  }
  const start = value.slice(0, visibleChars);
  const end = value.slice(-visibleChars);
  return `${start}...${end}`;
}

/**
 * Mask the local part of an email address
 *
 * `alice@example.com` becomes `a***@example.com`. Strings without an
 * `@` are masked entirely.
 */
export function maskEmail(email: string): string {
  const at = email.lastIndexOf("@");
  if (at <= 0) {
    return "***";
  }
  return `${email[0]}***${email.slice(at)}`;
}

/**
 * Create a sanitized copy of an object with sensitive fields masked
 *
 * `email` fields go through {@link maskEmail}; nested objects are
 * sanitized recursively.
 *
 * @param additionalFields - Additional field names to mask
 */
export function sanitizeForLogging(
  obj: Record<string, unknown>,
  additionalFields?: string[],
): Record<string, unknown> {
  const fieldsToMask = new Set([
    ...SENSITIVE_FIELDS,
    ...(additionalFields || []),
  ]);
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (key === "email" && typeof value === "string") {
      sanitized[key] = maskEmail(value);
    } else if (fieldsToMask.has(key) && typeof value === "string") {
      sanitized[key] = maskValue(value);
    } else if (isPlainRecord(value)) {
      sanitized[key] = sanitizeForLogging(value, additionalFields);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
