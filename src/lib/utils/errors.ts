import { redactSensitive } from "./redact.js";

/**
 * Base error class for botkeys
 */
export class BotkeysError extends Error {
  public readonly suggestion: string;

  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown,
    suggestion?: string
  ) {
    super(message);
    this.name = "BotkeysError";
    this.suggestion =
      suggestion ??
      "Run: botkeys list to check which credentials are saved";
  }
}

/**
 * Error for an invalid project configuration file
 */
export class ConfigError extends BotkeysError {
  constructor(message: string, details?: unknown) {
    super(
      message,
      "CONFIG_ERROR",
      details,
      "Check botkeys.json against the documented format, or remove it to use the default credential"
    );
    this.name = "ConfigError";
  }
}

/**
 * Error for unknown or duplicate credential IDs
 */
export class RegistryError extends BotkeysError {
  constructor(message: string, public readonly uid?: string) {
    super(
      message,
      "REGISTRY_ERROR",
      uid === undefined ? undefined : { uid },
      "Run: botkeys list to see the registered credential IDs"
    );
    this.name = "RegistryError";
  }
}

/**
 * The key file or storage directory cannot be read or written. Never retried.
 */
export class StorageIOError extends BotkeysError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown
  ) {
    super(
      message,
      "STORAGE_IO_ERROR",
      { filePath, cause: describeCause(cause) },
      "Check that the storage directory exists and is writable, or set BOTKEYS_DIR"
    );
    this.name = "StorageIOError";
  }
}

export type DecryptionFailure = "format" | "authentication" | "content";

/**
 * Wrong key, unrecognized file format, tampered ciphertext, or decrypted
 * content that no longer passes validation.
 */
export class DecryptionError extends BotkeysError {
  constructor(message: string, public readonly reason: DecryptionFailure) {
    super(
      message,
      "DECRYPTION_ERROR",
      { reason },
      "Double-check your password. If forgotten, delete the credential with: botkeys delete <id>"
    );
    this.name = "DecryptionError";
  }
}

/**
 * A secret value or password does not meet the storage policy
 */
export class ValidationError extends BotkeysError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR", undefined, "Enter a different value and try again");
    this.name = "ValidationError";
  }
}

/**
 * The user declined to continue or interrupted a prompt
 */
export class UserAbortedError extends BotkeysError {
  constructor(
    message: string,
    public readonly exitCode: number = 0
  ) {
    super(message, "USER_ABORTED", undefined, "Run the command again when ready");
    this.name = "UserAbortedError";
  }
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) return undefined;
  if (cause instanceof Error) {
    return "code" in cause && typeof cause.code === "string"
      ? cause.code
      : cause.message;
  }
  return String(cause);
}

/**
 * Format error for CLI output
 */
export function formatError(error: unknown): {
  message: string;
  code?: string;
  details?: unknown;
  suggestion?: string;
} {
  if (error instanceof BotkeysError) {
    return {
      message: redactSensitive(error.message),
      code: error.code,
      details: error.details,
      suggestion: error.suggestion,
    };
  }

  if (error instanceof Error) {
    return { message: redactSensitive(error.message) };
  }

  return { message: "Unknown error occurred" };
}
