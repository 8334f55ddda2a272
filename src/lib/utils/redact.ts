/**
 * Redact sensitive values from strings before logging
 */

const SENSITIVE_KEYS = "password|token|secret|value";

/**
 * Discord-style bot tokens: three dot-separated base64url segments
 */
const TOKEN_LIKE = /[\w-]{24,}\.[\w-]{6}\.[\w-]{27,}/g;

/**
 * Redacts sensitive values from JSON-like strings
 * Matches patterns like "password":"value", token: 'value'
 * and replaces the value portion with [REDACTED]. Bare token-shaped
 * substrings are redacted as well.
 */
export function redactSensitive(input: string): string {
  return input
    .replace(
      new RegExp(`"(${SENSITIVE_KEYS})"\\s*:\\s*"([^"]*)"`, "gi"),
      '"$1":"[REDACTED]"'
    )
    .replace(
      new RegExp(`'(${SENSITIVE_KEYS})'\\s*:\\s*'([^']*)'`, "gi"),
      "'$1':'[REDACTED]'"
    )
    .replace(
      new RegExp(`\\b(${SENSITIVE_KEYS})\\s*:\\s*"([^"]*)"`, "gi"),
      '$1:"[REDACTED]"'
    )
    .replace(
      new RegExp(`\\b(${SENSITIVE_KEYS})\\s*:\\s*'([^']*)'`, "gi"),
      "$1:'[REDACTED]'"
    )
    .replace(TOKEN_LIKE, "[REDACTED]");
}

/**
 * Masked preview of a secret, e.g. "abcd...wxyz". Values of 8 characters
 * or fewer are fully masked.
 */
export function maskSecret(value: string): string {
  if (!value) return "";
  return value.length > 8 ? `${value.slice(0, 4)}...${value.slice(-4)}` : "****";
}
