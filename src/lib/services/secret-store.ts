import path from "path";
import type { CredentialDescriptor } from "./credential-registry.js";
import {
  type BlobHeader,
  decrypt,
  deriveKey,
  encrypt,
  parseHeader,
} from "../utils/encryption.js";
import { DecryptionError, ValidationError } from "../utils/errors.js";
import {
  type KeyFileEntry,
  fileExists,
  getKeyFilePath,
  listKeyFiles,
  loadInstallationSecret,
  readBytes,
  removeFile,
  writeBytesAtomic,
} from "../utils/storage.js";
import {
  type ValidationResult,
  validatePasswordPolicy,
  validateSecretValue,
} from "../utils/validation.js";

/**
 * Encrypted at-rest storage for one credential's secret value.
 *
 * Never prints or prompts: every outcome is a return value or a typed
 * error (StorageIOError, DecryptionError, ValidationError).
 */
export class SecretStore {
  constructor(readonly descriptor: CredentialDescriptor) {}

  get filePath(): string {
    return this.descriptor.filePath;
  }

  /**
   * Whether a key file exists for the given uid in a directory
   */
  static exists(storageDir: string, uid: string): Promise<boolean> {
    return fileExists(getKeyFilePath(storageDir, uid));
  }

  /**
   * Every file in the directory matching the key file naming convention,
   * registered or not.
   */
  static listKeyFiles(storageDir: string): Promise<KeyFileEntry[]> {
    return listKeyFiles(path.resolve(storageDir));
  }

  exists(): Promise<boolean> {
    return fileExists(this.filePath);
  }

  validate(candidate: string): ValidationResult {
    return validateSecretValue(candidate, this.descriptor.pattern);
  }

  /**
   * Password policy check. Always valid for credentials without a password.
   */
  validatePassword(candidate: string): ValidationResult {
    return this.descriptor.requiresPassword
      ? validatePasswordPolicy(candidate)
      : { valid: true };
  }

  /**
   * Encrypt and atomically overwrite the key file.
   *
   * @param password - required (and policy-checked) when the credential
   * requires one, ignored otherwise
   */
  async write(plaintext: string, password?: string): Promise<void> {
    const check = this.validate(plaintext);
    if (!check.valid) {
      throw new ValidationError(
        `Attempted to write invalid data for "${this.descriptor.uid}": ${check.reason}`
      );
    }

    const key = await this.resolveKey(password, true);
    const blob = encrypt(plaintext, key, {
      passwordProtected: this.descriptor.requiresPassword,
    });
    await writeBytesAtomic(this.filePath, blob);
  }

  /**
   * Decrypt the key file.
   *
   * Throws StorageIOError if the file is missing or unreadable, and
   * DecryptionError for a wrong key, unrecognized format, tampering, or
   * content that does not pass validation.
   */
  async read(password?: string): Promise<string> {
    const blob = await readBytes(this.filePath);
    const key = await this.resolveKey(password, false);
    const plaintext = decrypt(blob, key);

    if (!this.validate(plaintext).valid) {
      throw new DecryptionError(
        `Decrypted data for "${this.descriptor.uid}" is not a valid value`,
        "content"
      );
    }
    return plaintext;
  }

  /**
   * Header metadata of the key file, without decrypting it
   */
  async inspect(): Promise<BlobHeader> {
    return parseHeader(await readBytes(this.filePath));
  }

  /**
   * Delete the key file. No error if it is already gone.
   */
  clear(): Promise<void> {
    return removeFile(this.filePath);
  }

  private async resolveKey(
    password: string | undefined,
    enforcePolicy: boolean
  ): Promise<Buffer> {
    const { requiresPassword, uid, storageDirectory } = this.descriptor;

    if (requiresPassword) {
      if (!password) {
        throw enforcePolicy
          ? new ValidationError(`Password is required to write "${uid}"`)
          : new DecryptionError(`Password is required to read "${uid}"`, "authentication");
      }
      if (enforcePolicy) {
        const check = validatePasswordPolicy(password);
        if (!check.valid) throw new ValidationError(check.reason);
      }
    }

    const installationSecret = await loadInstallationSecret(storageDirectory);
    return deriveKey(installationSecret, requiresPassword ? password : undefined);
  }
}
