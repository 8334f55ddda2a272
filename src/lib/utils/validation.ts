import { z } from "zod";
import {
  MINIMUM_PASSWORD_LENGTH,
  MINIMUM_SECRET_LENGTH,
  UID_PATTERN,
} from "../config/credentials.js";

/**
 * Outcome of a policy check. Never thrown.
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; reason: string };

/**
 * Validate a credential uid (identifier characters only)
 */
export function isValidUid(uid: string): boolean {
  return UID_PATTERN.test(uid);
}

/**
 * Zod schema for credential uid
 */
export const uidSchema = z.string().refine((val) => isValidUid(val), {
  message:
    "Credential ID must be a non-empty identifier (letters, digits, underscores; not starting with a digit)",
});

/**
 * Check a secret value against the storage policy
 */
export function validateSecretValue(
  candidate: string,
  pattern?: RegExp
): ValidationResult {
  if (!candidate) {
    return { valid: false, reason: "The value cannot be empty." };
  }
  if (candidate.length < MINIMUM_SECRET_LENGTH) {
    return {
      valid: false,
      reason: `The value must be at least ${MINIMUM_SECRET_LENGTH} characters long.`,
    };
  }
  if (pattern && !matchesFully(pattern, candidate)) {
    return { valid: false, reason: "The value does not have the expected format." };
  }
  return { valid: true };
}

/**
 * Check a password against the minimum length policy
 */
export function validatePasswordPolicy(candidate: string): ValidationResult {
  if (candidate.length < MINIMUM_PASSWORD_LENGTH) {
    return {
      valid: false,
      reason: `Your password must be at least ${MINIMUM_PASSWORD_LENGTH} characters long.`,
    };
  }
  return { valid: true };
}

function matchesFully(pattern: RegExp, text: string): boolean {
  // Copy without g/y so lastIndex state never leaks between calls
  const flags = pattern.flags.replace(/[gy]/g, "");
  const match = new RegExp(pattern.source, flags).exec(text);
  return match !== null && match.index === 0 && match[0].length === text.length;
}
