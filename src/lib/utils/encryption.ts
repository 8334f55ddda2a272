import crypto from "crypto";
import { DecryptionError } from "./errors.js";

/**
 * Key file layout (all integers big-endian):
 *
 *   magic "BKEY" (4) | version (1) | flags (1) | createdAt ms (8)
 *   | IV (12) | GCM auth tag (16) | ciphertext (n)
 *
 * Everything before the auth tag is authenticated as AAD, so any flipped
 * byte in the file fails decryption.
 */
const MAGIC = Buffer.from("BKEY", "ascii");
const CURRENT_VERSION = 1;
const FLAG_PASSWORD = 0b0000_0001;

const IV_BYTES = 12; // GCM recommended IV length (96 bits)
const TAG_BYTES = 16;
const KEY_BYTES = 32; // 256 bits for AES-256

const VERSION_OFFSET = MAGIC.length;
const FLAGS_OFFSET = VERSION_OFFSET + 1;
const TIMESTAMP_OFFSET = FLAGS_OFFSET + 1;
const IV_OFFSET = TIMESTAMP_OFFSET + 8;
const TAG_OFFSET = IV_OFFSET + IV_BYTES;
export const HEADER_BYTES = TAG_OFFSET + TAG_BYTES;

// Scrypt parameters - memory-hard to resist GPU/ASIC attacks
const SCRYPT_PARAMS = {
  N: 16384, // 2^14 - CPU/memory cost
  r: 8, // Block size
  p: 1, // Parallelization
};

/**
 * Metadata readable without the key
 */
export interface BlobHeader {
  version: number;
  passwordProtected: boolean;
  createdAt: Date;
}

/**
 * Derive the 32-byte AES key for a credential.
 *
 * With a password: scrypt(password, installationSecret).
 * Without: SHA-256 of the installation secret alone.
 */
export function deriveKey(
  installationSecret: Buffer,
  password?: string
): Promise<Buffer> {
  if (!password) {
    return Promise.resolve(
      crypto.createHash("sha256").update(installationSecret).digest()
    );
  }

  return new Promise((resolve, reject) => {
    crypto.scrypt(
      password.normalize("NFKC"),
      installationSecret,
      KEY_BYTES,
      SCRYPT_PARAMS,
      (err, derivedKey) => {
        if (err) {
          reject(err);
        } else {
          resolve(derivedKey);
        }
      }
    );
  });
}

/**
 * Encrypt plaintext into a self-describing key file payload
 */
export function encrypt(
  plaintext: string,
  key: Buffer,
  options: { passwordProtected: boolean; createdAt?: Date }
): Buffer {
  const header = Buffer.alloc(TAG_OFFSET);
  MAGIC.copy(header, 0);
  header.writeUInt8(CURRENT_VERSION, VERSION_OFFSET);
  header.writeUInt8(options.passwordProtected ? FLAG_PASSWORD : 0, FLAGS_OFFSET);
  header.writeBigUInt64BE(
    BigInt((options.createdAt ?? new Date()).getTime()),
    TIMESTAMP_OFFSET
  );
  crypto.randomBytes(IV_BYTES).copy(header, IV_OFFSET);

  const cipher = crypto.createCipheriv(
    "aes-256-gcm",
    key,
    header.subarray(IV_OFFSET, TAG_OFFSET)
  );
  cipher.setAAD(header);
  const ciphertext = Buffer.concat([
    cipher.update(plaintext, "utf8"),
    cipher.final(),
  ]);

  return Buffer.concat([header, cipher.getAuthTag(), ciphertext]);
}

/**
 * Read the unauthenticated header fields.
 * Throws DecryptionError("format") if the payload is not a key file.
 */
export function parseHeader(blob: Buffer): BlobHeader {
  if (blob.length <= HEADER_BYTES || !blob.subarray(0, MAGIC.length).equals(MAGIC)) {
    throw new DecryptionError("Not a botkeys key file", "format");
  }

  const version = blob.readUInt8(VERSION_OFFSET);
  if (version !== CURRENT_VERSION) {
    throw new DecryptionError(`Unsupported key file version: ${version}`, "format");
  }

  return {
    version,
    passwordProtected: (blob.readUInt8(FLAGS_OFFSET) & FLAG_PASSWORD) !== 0,
    createdAt: new Date(Number(blob.readBigUInt64BE(TIMESTAMP_OFFSET))),
  };
}

/**
 * Decrypt a key file payload.
 * Throws DecryptionError on wrong key, bad format, or tampering.
 */
export function decrypt(blob: Buffer, key: Buffer): string {
  parseHeader(blob);

  const header = blob.subarray(0, TAG_OFFSET);
  const decipher = crypto.createDecipheriv(
    "aes-256-gcm",
    key,
    blob.subarray(IV_OFFSET, TAG_OFFSET)
  );
  decipher.setAAD(header);
  decipher.setAuthTag(blob.subarray(TAG_OFFSET, HEADER_BYTES));

  try {
    const decrypted = Buffer.concat([
      decipher.update(blob.subarray(HEADER_BYTES)),
      decipher.final(),
    ]);
    return decrypted.toString("utf8");
  } catch {
    throw new DecryptionError(
      "Decryption failed - invalid password or corrupted key file",
      "authentication"
    );
  }
}

/**
 * Generate cryptographically secure random bytes
 */
export function randomBytes(length: number): Buffer {
  return crypto.randomBytes(length);
}
