import path from "path";
import {
  BOT_TOKEN_PATTERN,
  DEFAULT_STORAGE_DIR,
} from "../config/credentials.js";
import { RegistryError } from "../utils/errors.js";
import { getKeyFilePath } from "../utils/storage.js";
import { isValidUid } from "../utils/validation.js";

/**
 * Identifies one named secret. Immutable once registered.
 */
export interface CredentialDescriptor {
  readonly uid: string;
  readonly displayName: string;
  readonly requiresPassword: boolean;
  /** Absolute directory holding this credential's key file */
  readonly storageDirectory: string;
  /** `<storageDirectory>/.<uid>.key` */
  readonly filePath: string;
  /** Optional shape the plaintext must fully match */
  readonly pattern?: RegExp;
}

export interface CredentialOptions {
  uid: string;
  displayName?: string;
  requiresPassword?: boolean;
  storageDirectory?: string;
  pattern?: RegExp;
}

export function createDescriptor(options: CredentialOptions): CredentialDescriptor {
  if (!isValidUid(options.uid)) {
    throw new RegistryError(
      `Credential ID must be a valid non-empty identifier: "${options.uid}"`,
      options.uid
    );
  }

  const storageDirectory = path.resolve(options.storageDirectory ?? DEFAULT_STORAGE_DIR);
  return Object.freeze({
    uid: options.uid,
    displayName: options.displayName || options.uid,
    requiresPassword: options.requiresPassword ?? false,
    storageDirectory,
    filePath: getKeyFilePath(storageDirectory, options.uid),
    ...(options.pattern ? { pattern: options.pattern } : {}),
  });
}

// ---------------------------------------------------------------------------
// Presets
// ---------------------------------------------------------------------------

export const PRESETS = {
  default: { uid: "default", pattern: BOT_TOKEN_PATTERN },
  dev: { uid: "dev", displayName: "development", pattern: BOT_TOKEN_PATTERN },
  prod: {
    uid: "prod",
    displayName: "production",
    requiresPassword: true,
    pattern: BOT_TOKEN_PATTERN,
  },
} satisfies Record<string, CredentialOptions>;

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/**
 * Read-only uid → descriptor mapping, built once at startup and passed to
 * whatever needs it.
 */
export class CredentialRegistry {
  private readonly byUid: ReadonlyMap<string, CredentialDescriptor>;

  private constructor(descriptors: CredentialDescriptor[]) {
    this.byUid = new Map(descriptors.map((d) => [d.uid, d]));
    Object.freeze(this);
  }

  static builder(): CredentialRegistryBuilder {
    return new CredentialRegistryBuilder((descriptors) => new CredentialRegistry(descriptors));
  }

  static of(...options: CredentialOptions[]): CredentialRegistry {
    const builder = CredentialRegistry.builder();
    for (const opts of options) builder.register(opts);
    return builder.build();
  }

  get size(): number {
    return this.byUid.size;
  }

  get uids(): string[] {
    return [...this.byUid.keys()];
  }

  get descriptors(): CredentialDescriptor[] {
    return [...this.byUid.values()];
  }

  /**
   * The first registered credential
   */
  get defaultDescriptor(): CredentialDescriptor {
    const [first] = this.byUid.values();
    return first;
  }

  /**
   * Distinct storage directories across all credentials
   */
  get storageDirectories(): string[] {
    return [...new Set(this.descriptors.map((d) => d.storageDirectory))];
  }

  has(uid: string): boolean {
    return this.byUid.has(uid);
  }

  get(uid: string): CredentialDescriptor | undefined {
    return this.byUid.get(uid);
  }

  require(uid: string): CredentialDescriptor {
    const descriptor = this.byUid.get(uid);
    if (!descriptor) {
      throw new RegistryError(
        `Unknown credential: "${uid}". Expected one of: ${this.uids.join(", ")}`,
        uid
      );
    }
    return descriptor;
  }
}

export class CredentialRegistryBuilder {
  private readonly descriptors = new Map<string, CredentialDescriptor>();

  constructor(
    private readonly finish: (descriptors: CredentialDescriptor[]) => CredentialRegistry
  ) {}

  /**
   * Register a credential. A duplicate uid throws unless allowOverwrites
   * is set, in which case the new descriptor replaces the old one.
   */
  register(
    options: CredentialOptions,
    { allowOverwrites = false }: { allowOverwrites?: boolean } = {}
  ): this {
    const descriptor = createDescriptor(options);
    if (!allowOverwrites && this.descriptors.has(descriptor.uid)) {
      throw new RegistryError(
        `A credential with ID "${descriptor.uid}" is already registered`,
        descriptor.uid
      );
    }
    this.descriptors.set(descriptor.uid, descriptor);
    return this;
  }

  /**
   * Freeze the registry. With nothing registered, the "default"
   * credential is registered automatically.
   */
  build(): CredentialRegistry {
    if (this.descriptors.size === 0) {
      this.register(PRESETS.default);
    }
    return this.finish([...this.descriptors.values()]);
  }
}
