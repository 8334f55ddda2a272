import {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  MAX_UNLOCK_ATTEMPTS,
} from "../config/credentials.js";
import { MESSAGES } from "../config/messages.js";
import { DecryptionError, UserAbortedError } from "../utils/errors.js";
import { isOk, tryCatch } from "../utils/result.js";
import type { CredentialDescriptor } from "./credential-registry.js";
import { SecretStore } from "./secret-store.js";
import type { TerminalSession } from "./terminal-session.js";

// ---------------------------------------------------------------------------
// States
// ---------------------------------------------------------------------------

export type ResolverState =
  | { kind: "check-existing" }
  | { kind: "unlock"; attempt: number }
  | { kind: "unlock-failed"; attempt: number; error: DecryptionError }
  | { kind: "create-new" }
  | { kind: "resolved"; value: string }
  | { kind: "aborted"; message: string; isError: boolean; exitCode: number };

export type TerminalState = Extract<ResolverState, { kind: "resolved" | "aborted" }>;

export function isTerminal(state: ResolverState): state is TerminalState {
  return state.kind === "resolved" || state.kind === "aborted";
}

export interface ResolverOptions {
  /** Offer to create the credential when no key file exists (default true) */
  allowCreation?: boolean;
  /** Password attempts before offering to discard the key file */
  maxUnlockAttempts?: number;
  /** After creating a value, ask before handing it back (default false) */
  confirmUse?: boolean;
}

// ---------------------------------------------------------------------------
// Resolver
// ---------------------------------------------------------------------------

/**
 * Turns a credential descriptor into its plaintext value, prompting
 * through the TerminalSession whenever the user has to act.
 *
 *   check-existing ─┬─> unlock ──> resolved
 *                   │     │ ^
 *                   │     v │ (password, attempt < max)
 *                   │  unlock-failed ──> aborted
 *                   │     │ (discard)
 *                   └─> create-new ──> resolved | aborted
 */
export class CredentialResolver {
  readonly store: SecretStore;
  private readonly allowCreation: boolean;
  private readonly maxUnlockAttempts: number;
  private readonly confirmUse: boolean;

  constructor(
    readonly descriptor: CredentialDescriptor,
    private readonly session: TerminalSession,
    options: ResolverOptions = {}
  ) {
    this.store = new SecretStore(descriptor);
    this.allowCreation = options.allowCreation ?? true;
    this.maxUnlockAttempts = Math.max(1, options.maxUnlockAttempts ?? MAX_UNLOCK_ATTEMPTS);
    this.confirmUse = options.confirmUse ?? false;
  }

  /**
   * Run the state machine to completion.
   *
   * On abort the session's exitProcess is called exactly once, and the
   * aborted state is returned in case it does not end the process.
   * StorageIOError is never caught here.
   */
  async resolve(): Promise<TerminalState> {
    let outcome: TerminalState;
    try {
      outcome = await this.run();
    } catch (error) {
      if (!(error instanceof UserAbortedError)) throw error;
      outcome = aborted(error.message, false, error.exitCode);
    }

    if (outcome.kind === "aborted") {
      this.session.exitProcess(outcome.message, outcome.isError, outcome.exitCode);
    }
    return outcome;
  }

  private async run(): Promise<TerminalState> {
    let state: ResolverState = { kind: "check-existing" };
    while (!isTerminal(state)) {
      state = await this.step(state);
    }
    return state;
  }

  /**
   * Single transition from a non-terminal state
   */
  async step(state: ResolverState): Promise<ResolverState> {
    switch (state.kind) {
      case "check-existing":
        return this.checkExisting();
      case "unlock":
        return this.unlock(state.attempt);
      case "unlock-failed":
        return this.handleUnlockFailure(state.attempt);
      case "create-new":
        return this.createNew();
      case "resolved":
      case "aborted":
        return state;
    }
  }

  private get name(): string {
    return this.descriptor.displayName;
  }

  private async checkExisting(): Promise<ResolverState> {
    if (await this.store.exists()) {
      return { kind: "unlock", attempt: 1 };
    }
    if (!this.allowCreation) {
      return aborted(MESSAGES.tokenMissing(this.name), true);
    }
    return { kind: "create-new" };
  }

  private async unlock(attempt: number): Promise<ResolverState> {
    let password: string | undefined;
    if (this.descriptor.requiresPassword) {
      this.session.printStatus(MESSAGES.passwordCue(this.name));
      password = await this.session.promptMasked(MESSAGES.passwordPrompt);
    }

    const result = await tryCatch(() => this.store.read(password));
    if (isOk(result)) {
      return { kind: "resolved", value: result.value };
    }
    if (result.error instanceof DecryptionError) {
      return { kind: "unlock-failed", attempt, error: result.error };
    }
    throw result.error;
  }

  private async handleUnlockFailure(attempt: number): Promise<ResolverState> {
    if (this.descriptor.requiresPassword) {
      this.session.printStatus(
        MESSAGES.unlockFailed(this.name, attempt, this.maxUnlockAttempts),
        true
      );
      if (attempt < this.maxUnlockAttempts) {
        return { kind: "unlock", attempt: attempt + 1 };
      }
    } else {
      // Same key every time, so retrying cannot help
      this.session.printStatus(MESSAGES.unlockFailedNoPassword(this.name), true);
    }

    if (!(await this.session.confirm(MESSAGES.unlockDiscard(this.name)))) {
      return aborted(MESSAGES.exitByChoice, false);
    }
    await this.store.clear();
    return { kind: "create-new" };
  }

  private async createNew(): Promise<ResolverState> {
    if (!(await this.session.confirm(MESSAGES.tokenCreate(this.name)))) {
      return aborted(MESSAGES.exitByChoice, false);
    }

    const value = await this.promptSecretValue();

    let password: string | undefined;
    if (this.descriptor.requiresPassword) {
      password = await this.promptNewPassword();
      if (password === undefined) {
        return aborted(MESSAGES.exitByChoice, false);
      }
    }

    await this.store.write(value, password);
    this.session.printStatus(MESSAGES.tokenSaved);
    if (this.confirmUse && !(await this.session.confirm(MESSAGES.tokenUseNow))) {
      return aborted(MESSAGES.exitByChoice, false);
    }
    return { kind: "resolved", value };
  }

  private async promptSecretValue(): Promise<string> {
    this.session.printStatus(MESSAGES.tokenCreateCue);
    for (;;) {
      const candidate = await this.session.promptMasked(MESSAGES.tokenPrompt);
      const check = this.store.validate(candidate);
      if (check.valid) return candidate;
      this.session.printStatus(MESSAGES.tokenInvalid(check.reason), true);
    }
  }

  /**
   * Ask for a new password twice. Returns undefined when the user gives up.
   */
  private async promptNewPassword(): Promise<string | undefined> {
    this.session.printStatus(MESSAGES.passwordInfo(this.name));
    this.session.printStatus(MESSAGES.passwordCreateCue(this.name));

    let password = await this.session.promptMasked(MESSAGES.passwordPrompt);
    for (;;) {
      const check = this.store.validatePassword(password);
      if (check.valid) break;
      this.session.printStatus(check.reason, true);
      if (!(await this.session.confirm(MESSAGES.passwordRetry))) return undefined;
      password = await this.session.promptMasked(MESSAGES.passwordPrompt);
    }

    this.session.printStatus(MESSAGES.passwordConfirmCue);
    while ((await this.session.promptMasked(MESSAGES.passwordPrompt)) !== password) {
      this.session.printStatus(MESSAGES.passwordConfirmMismatch, true);
      if (!(await this.session.confirm(MESSAGES.passwordConfirmRetry))) return undefined;
    }
    return password;
  }
}

function aborted(
  message: string,
  isError: boolean,
  exitCode: number = isError ? EXIT_FAILURE : EXIT_SUCCESS
): Extract<ResolverState, { kind: "aborted" }> {
  return { kind: "aborted", message, isError, exitCode };
}

/**
 * Resolve a credential, interrupt-safe. Convenience for callers that
 * do not need the state machine itself.
 */
export async function resolveCredential(
  descriptor: CredentialDescriptor,
  session: TerminalSession,
  options?: ResolverOptions
): Promise<string | undefined> {
  const outcome = await new CredentialResolver(descriptor, session, options).resolve();
  return outcome.kind === "resolved" ? outcome.value : undefined;
}
