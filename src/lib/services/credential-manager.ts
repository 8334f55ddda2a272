import { MESSAGES } from "../config/messages.js";
import { DecryptionError, RegistryError } from "../utils/errors.js";
import type { KeyFileEntry } from "../utils/storage.js";
import { removeFile } from "../utils/storage.js";
import type { CredentialDescriptor, CredentialRegistry } from "./credential-registry.js";
import { SecretStore } from "./secret-store.js";
import type { TerminalSession } from "./terminal-session.js";

/**
 * A registered credential that has a key file on disk
 */
export interface SavedCredential {
  uid: string;
  displayName: string;
  requiresPassword: boolean;
  filePath: string;
  createdAt: string | null;
}

/**
 * A key file not owned by a registered credential.
 *
 * `label` is the uid, or `uid@storageDirectory` when the uid is registered
 * or shared by another orphan.
 */
export interface OrphanedKeyFile extends KeyFileEntry {
  storageDirectory: string;
  label: string;
}

/**
 * View and delete saved credentials, including orphaned key files.
 */
export class CredentialManager {
  constructor(private readonly registry: CredentialRegistry) {}

  async listSaved(): Promise<SavedCredential[]> {
    const saved: SavedCredential[] = [];
    for (const descriptor of this.registry.descriptors) {
      const store = new SecretStore(descriptor);
      if (!(await store.exists())) continue;
      saved.push({
        uid: descriptor.uid,
        displayName: descriptor.displayName,
        requiresPassword: descriptor.requiresPassword,
        filePath: descriptor.filePath,
        createdAt: await readCreatedAt(store),
      });
    }
    return saved;
  }

  async listOrphans(): Promise<OrphanedKeyFile[]> {
    const found: Array<KeyFileEntry & { storageDirectory: string }> = [];
    for (const storageDirectory of this.registry.storageDirectories) {
      for (const entry of await SecretStore.listKeyFiles(storageDirectory)) {
        const owner = this.registry.get(entry.uid);
        if (owner && owner.storageDirectory === storageDirectory) continue;
        found.push({ ...entry, storageDirectory });
      }
    }

    return found.map((orphan) => {
      const ambiguous =
        this.registry.has(orphan.uid) ||
        found.some((o) => o.uid === orphan.uid && o.filePath !== orphan.filePath);
      const label = ambiguous ? `${orphan.uid}@${orphan.storageDirectory}` : orphan.uid;
      return { ...orphan, label };
    });
  }

  /**
   * Delete a saved credential's key file, or an orphan by its label.
   * Returns the deleted file path.
   */
  async delete(id: string): Promise<string> {
    const orphan = (await this.listOrphans()).find((o) => o.label === id);
    if (orphan) {
      await removeFile(orphan.filePath);
      return orphan.filePath;
    }

    const descriptor = this.registry.get(id);
    if (!descriptor) {
      throw new RegistryError(`No saved credential or key file with ID "${id}"`, id);
    }
    const store = new SecretStore(descriptor);
    if (!(await store.exists())) {
      throw new RegistryError(`Credential "${id}" has no saved key file`, id);
    }
    await store.clear();
    return descriptor.filePath;
  }

  /**
   * Interactive flow: show what is saved, then optionally delete one.
   */
  async manage(session: TerminalSession): Promise<void> {
    const saved = await this.listSaved();
    const orphans = await this.listOrphans();
    const deletable = [...saved.map((s) => s.uid), ...orphans.map((o) => o.label)];

    if (deletable.length === 0) {
      session.printStatus(MESSAGES.manageNone);
      return;
    }

    if (saved.length > 0) {
      session.printStatus(
        [MESSAGES.manageList, ...saved.map((s) => `  * ${s.uid} (${s.displayName})`)].join("\n")
      );
    }
    if (orphans.length > 0) {
      session.printStatus(
        [MESSAGES.manageOrphans, ...orphans.map((o) => `  * ${o.label} -> ${o.filePath}`)].join("\n")
      );
    }

    if (!(await session.confirm(MESSAGES.deletePrompt))) return;

    let uid = await session.promptLine(MESSAGES.deleteCue);
    while (!deletable.includes(uid)) {
      session.printStatus(MESSAGES.deleteMismatch(deletable), true);
      if (!(await session.confirm(MESSAGES.deleteRetry))) return;
      uid = await session.promptLine(MESSAGES.deleteCue);
    }

    await this.delete(uid);
    session.printStatus(MESSAGES.deleteSuccess);
  }
}

async function readCreatedAt(store: SecretStore): Promise<string | null> {
  try {
    const header = await store.inspect();
    return header.createdAt.toISOString();
  } catch (error) {
    // Unrecognized key files still count as saved
    if (error instanceof DecryptionError) return null;
    throw error;
  }
}

export function describeDescriptor(descriptor: CredentialDescriptor): Record<string, unknown> {
  return {
    uid: descriptor.uid,
    displayName: descriptor.displayName,
    requiresPassword: descriptor.requiresPassword,
    filePath: descriptor.filePath,
  };
}
