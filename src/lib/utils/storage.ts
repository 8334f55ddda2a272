import fs from "fs/promises";
import path from "path";
import {
  INSTALLATION_FILE,
  INSTALLATION_SECRET_BYTES,
  KEY_FILE_PATTERN,
  getKeyFileName,
} from "../config/credentials.js";
import { randomBytes } from "./encryption.js";
import { StorageIOError } from "./errors.js";

/**
 * A key file found on disk
 */
export interface KeyFileEntry {
  uid: string;
  filePath: string;
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * Resolve the key file path for a uid, refusing anything that would land
 * outside the storage directory.
 */
export function getKeyFilePath(storageDir: string, uid: string): string {
  const root = path.resolve(storageDir);
  const filePath = path.join(root, getKeyFileName(uid));
  if (path.dirname(filePath) !== root) {
    throw new StorageIOError(
      `Key file for "${uid}" would be outside the storage directory`,
      filePath
    );
  }
  return filePath;
}

/**
 * Create the storage directory (owner-only) if it does not exist
 */
export async function ensureStorageDir(storageDir: string): Promise<void> {
  try {
    await fs.mkdir(storageDir, { recursive: true, mode: 0o700 });
  } catch (err) {
    throw new StorageIOError(
      `Cannot create storage directory: ${storageDir}`,
      storageDir,
      err
    );
  }

  const stat = await fs.stat(storageDir);
  if (!stat.isDirectory()) {
    throw new StorageIOError(
      `Expected a directory, but found a file: ${storageDir}`,
      storageDir
    );
  }
}

/**
 * Check whether a regular file exists at the given path
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return false;
    throw new StorageIOError(`Cannot access ${filePath}`, filePath, err);
  }
}

/**
 * Read a file's bytes
 */
export async function readBytes(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    const reason = isErrnoCode(err, "ENOENT") ? "does not exist" : "cannot be read";
    throw new StorageIOError(`Key file ${reason}: ${filePath}`, filePath, err);
  }
}

/**
 * Write bytes atomically (temp file + rename).
 * File is written with mode 0o600 (owner read/write only).
 */
export async function writeBytesAtomic(
  filePath: string,
  data: Buffer
): Promise<void> {
  await ensureStorageDir(path.dirname(filePath));

  const tempFile = `${filePath}.tmp`;
  try {
    await fs.writeFile(tempFile, data, { mode: 0o600 });
    await fs.rename(tempFile, filePath);
  } catch (err) {
    await fs.rm(tempFile, { force: true });
    throw new StorageIOError(`Cannot write key file: ${filePath}`, filePath, err);
  }
}

/**
 * Delete a file. A missing file is not an error.
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if (!isErrnoCode(err, "ENOENT")) {
      throw new StorageIOError(`Cannot delete key file: ${filePath}`, filePath, err);
    }
  }
}

/**
 * List key files in a directory. Missing directory yields an empty list.
 */
export async function listKeyFiles(storageDir: string): Promise<KeyFileEntry[]> {
  let names: string[];
  try {
    names = await fs.readdir(storageDir);
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return [];
    throw new StorageIOError(`Cannot list storage directory: ${storageDir}`, storageDir, err);
  }

  const entries: KeyFileEntry[] = [];
  for (const name of names.sort()) {
    const match = KEY_FILE_PATTERN.exec(name);
    if (!match) continue;
    const filePath = path.join(storageDir, name);
    if (await fileExists(filePath)) {
      entries.push({ uid: match[1], filePath });
    }
  }
  return entries;
}

/**
 * Load the per-installation secret, generating it on first use.
 */
export async function loadInstallationSecret(storageDir: string): Promise<Buffer> {
  const secretPath = path.join(storageDir, INSTALLATION_FILE);

  if (await fileExists(secretPath)) {
    const secret = await readBytes(secretPath);
    if (secret.length !== INSTALLATION_SECRET_BYTES) {
      throw new StorageIOError(
        `Installation secret is corrupt (expected ${INSTALLATION_SECRET_BYTES} bytes)`,
        secretPath
      );
    }
    return secret;
  }

  const secret = randomBytes(INSTALLATION_SECRET_BYTES);
  await writeBytesAtomic(secretPath, secret);
  return secret;
}
