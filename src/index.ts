export {
  CredentialRegistry,
  CredentialRegistryBuilder,
  PRESETS,
  createDescriptor,
} from "./lib/services/credential-registry.js";
export type { CredentialDescriptor, CredentialOptions } from "./lib/services/credential-registry.js";
export { SecretStore } from "./lib/services/secret-store.js";
export {
  CredentialResolver,
  isTerminal,
  resolveCredential,
} from "./lib/services/credential-resolver.js";
export type { ResolverOptions, ResolverState, TerminalState } from "./lib/services/credential-resolver.js";
export { ClackTerminalSession, formatStatus } from "./lib/services/terminal-session.js";
export type { TerminalSession } from "./lib/services/terminal-session.js";
export { CredentialManager } from "./lib/services/credential-manager.js";
export type { OrphanedKeyFile, SavedCredential } from "./lib/services/credential-manager.js";
export { scanForTokens } from "./lib/services/token-scanner.js";
export type { ScanMatch, ScanResult } from "./lib/services/token-scanner.js";
export { loadProject, parseProjectConfig, buildRegistry } from "./lib/config/project.js";
export type { LoadedProject, ProjectConfig } from "./lib/config/project.js";
export {
  BotkeysError,
  ConfigError,
  DecryptionError,
  RegistryError,
  StorageIOError,
  UserAbortedError,
  ValidationError,
} from "./lib/utils/errors.js";
export type { BlobHeader } from "./lib/utils/encryption.js";
export type { ValidationResult } from "./lib/utils/validation.js";
