import os from "os";
import path from "path";

/**
 * Default storage directory for key files.
 * Override with the BOTKEYS_DIR environment variable.
 */
export const DEFAULT_STORAGE_DIR = process.env.BOTKEYS_DIR
  ? path.resolve(process.env.BOTKEYS_DIR)
  : path.join(os.homedir(), ".botkeys");

/**
 * Program name shown as the prefix of status lines.
 * Override with the BOTKEYS_NAME environment variable or the "name" field
 * of botkeys.json.
 */
export const DEFAULT_PROGRAM_NAME = process.env.BOTKEYS_NAME || "bot";

export const PROJECT_CONFIG_FILE = "botkeys.json";

// Key file naming: ".<uid>.key" inside the storage directory
export const KEY_FILE_PREFIX = ".";
export const KEY_FILE_SUFFIX = ".key";
export const KEY_FILE_PATTERN = /^\.([A-Za-z_][A-Za-z0-9_]*)\.key$/;

// Deliberately outside the key file naming convention
export const INSTALLATION_FILE = ".botkeys-installation";
export const INSTALLATION_SECRET_BYTES = 32;

export const UID_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const MINIMUM_SECRET_LENGTH = 8;
export const MINIMUM_PASSWORD_LENGTH = 8;

/**
 * Password attempts allowed before offering to discard the key file
 */
export const MAX_UNLOCK_ATTEMPTS = 3;

// Exit codes
export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

/**
 * Discord bot token shape: 24+ / 6 / 27+ base64url characters
 */
export const BOT_TOKEN_PATTERN = /^[\w-]{24,}\.[\w-]{6}\.[\w-]{27,}$/;
export const BOT_TOKEN_SEARCH_PATTERN = /[\w-]{24,}\.[\w-]{6}\.[\w-]{27,}/;

export function getKeyFileName(uid: string): string {
  return `${KEY_FILE_PREFIX}${uid}${KEY_FILE_SUFFIX}`;
}
