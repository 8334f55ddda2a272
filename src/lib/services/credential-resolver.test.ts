import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MESSAGES } from "../config/messages.js";
import { ScriptedSession } from "../testing/scripted-session.js";
import { StorageIOError, UserAbortedError } from "../utils/errors.js";
import { type CredentialDescriptor, createDescriptor } from "./credential-registry.js";
import { CredentialResolver, resolveCredential } from "./credential-resolver.js";
import { SecretStore } from "./secret-store.js";

let storageDir: string;

beforeEach(async () => {
  storageDir = await fs.mkdtemp(path.join(os.tmpdir(), "botkeys-resolver-"));
});

afterEach(async () => {
  await fs.rm(storageDir, { recursive: true, force: true });
});

function plainBot(): CredentialDescriptor {
  return createDescriptor({ uid: "bot", storageDirectory: storageDir });
}

function vaultBot(): CredentialDescriptor {
  return createDescriptor({
    uid: "vault",
    displayName: "production",
    storageDirectory: storageDir,
    requiresPassword: true,
  });
}

class InterruptingSession extends ScriptedSession {
  async confirm(message: string): Promise<boolean> {
    this.prompts.push(message);
    throw new UserAbortedError(MESSAGES.exitByInterrupt, 130);
  }
}

describe("CredentialResolver", () => {
  describe("fresh credential", () => {
    it("creates, saves and returns a new value", async () => {
      const session = new ScriptedSession({ confirms: [true], masked: ["abc123XYZ"] });

      const outcome = await new CredentialResolver(plainBot(), session).resolve();

      expect(outcome).toEqual({ kind: "resolved", value: "abc123XYZ" });
      expect(session.statuses).toEqual([
        { message: MESSAGES.tokenCreateCue, isError: false },
        { message: MESSAGES.tokenSaved, isError: false },
      ]);
      expect(session.exits).toEqual([]);
      expect(await new SecretStore(plainBot()).read()).toBe("abc123XYZ");
    });

    it("returns the saved value on the next resolution without prompting", async () => {
      await new CredentialResolver(
        plainBot(),
        new ScriptedSession({ confirms: [true], masked: ["abc123XYZ"] })
      ).resolve();

      const session = new ScriptedSession();
      const outcome = await new CredentialResolver(plainBot(), session).resolve();

      expect(outcome).toEqual({ kind: "resolved", value: "abc123XYZ" });
      expect(session.prompts).toEqual([]);
      expect(session.statuses).toEqual([]);
    });

    it("re-prompts for an invalid value", async () => {
      const session = new ScriptedSession({ confirms: [true], masked: ["short", "abc123XYZ"] });

      const outcome = await new CredentialResolver(plainBot(), session).resolve();

      expect(outcome).toEqual({ kind: "resolved", value: "abc123XYZ" });
      expect(session.errors).toEqual([
        MESSAGES.tokenInvalid("The value must be at least 8 characters long."),
      ]);
    });

    it("exits once and writes nothing when creation is declined", async () => {
      const session = new ScriptedSession({ confirms: [false] });

      const outcome = await new CredentialResolver(plainBot(), session).resolve();

      expect(outcome).toEqual({
        kind: "aborted",
        message: MESSAGES.exitByChoice,
        isError: false,
        exitCode: 0,
      });
      expect(session.exits).toEqual([
        { message: MESSAGES.exitByChoice, isError: false, exitCode: 0 },
      ]);
      expect(await fs.readdir(storageDir)).toEqual([]);
    });

    it("asks before using a new value when confirmUse is set", async () => {
      const session = new ScriptedSession({ confirms: [true, true], masked: ["abc123XYZ"] });

      const value = await resolveCredential(plainBot(), session, { confirmUse: true });

      expect(value).toBe("abc123XYZ");
      expect(session.prompts).toEqual([
        MESSAGES.tokenCreate("bot"),
        MESSAGES.tokenPrompt,
        MESSAGES.tokenUseNow,
      ]);
    });

    it("keeps the saved value but exits when the user declines to use it", async () => {
      const session = new ScriptedSession({ confirms: [true, false], masked: ["abc123XYZ"] });

      const value = await resolveCredential(plainBot(), session, { confirmUse: true });

      expect(value).toBeUndefined();
      expect(session.exits).toEqual([
        { message: MESSAGES.exitByChoice, isError: false, exitCode: 0 },
      ]);
      expect(await new SecretStore(plainBot()).read()).toBe("abc123XYZ");
    });

    it("exits with an error when creation is not allowed", async () => {
      const session = new ScriptedSession();

      await new CredentialResolver(plainBot(), session, { allowCreation: false }).resolve();

      expect(session.exits).toEqual([
        { message: MESSAGES.tokenMissing("bot"), isError: true, exitCode: 1 },
      ]);
      expect(session.prompts).toEqual([]);
    });
  });

  describe("password credential", () => {
    it("creates a value protected by a confirmed password", async () => {
      const session = new ScriptedSession({
        confirms: [true],
        masked: ["test-secret-value", "correct-password", "correct-password"],
      });

      const value = await resolveCredential(vaultBot(), session);

      expect(value).toBe("test-secret-value");
      expect(session.errors).toEqual([]);
      expect(await new SecretStore(vaultBot()).read("correct-password")).toBe(
        "test-secret-value"
      );
    });

    it("asks whether to retry a password that is too short", async () => {
      const session = new ScriptedSession({
        confirms: [true, true],
        masked: ["test-secret-value", "short", "correct-password", "correct-password"],
      });

      const value = await resolveCredential(vaultBot(), session);

      expect(value).toBe("test-secret-value");
      expect(session.errors).toEqual(["Your password must be at least 8 characters long."]);
      expect(session.prompts).toContain(MESSAGES.passwordRetry);
    });

    it("asks again after a mismatched confirmation", async () => {
      const session = new ScriptedSession({
        confirms: [true, true],
        masked: ["test-secret-value", "correct-password", "other-password", "correct-password"],
      });

      const value = await resolveCredential(vaultBot(), session);

      expect(value).toBe("test-secret-value");
      expect(session.errors).toEqual([MESSAGES.passwordConfirmMismatch]);
      expect(session.unused).toBe(0);
    });

    it("aborts without saving when the user gives up on confirming", async () => {
      const session = new ScriptedSession({
        confirms: [true, false],
        masked: ["test-secret-value", "correct-password", "other-password"],
      });

      const value = await resolveCredential(vaultBot(), session);

      expect(value).toBeUndefined();
      expect(session.exits).toEqual([
        { message: MESSAGES.exitByChoice, isError: false, exitCode: 0 },
      ]);
      expect(await new SecretStore(vaultBot()).exists()).toBe(false);
    });

    it("unlocks after two wrong passwords with a distinct message for each", async () => {
      await new SecretStore(vaultBot()).write("test-secret-value", "correct-password");
      const session = new ScriptedSession({
        masked: ["wrong1", "wrong2", "correct-password"],
      });

      const outcome = await new CredentialResolver(vaultBot(), session).resolve();

      expect(outcome).toEqual({ kind: "resolved", value: "test-secret-value" });
      expect(session.errors).toEqual([
        MESSAGES.unlockFailed("production", 1, 3),
        MESSAGES.unlockFailed("production", 2, 3),
      ]);
      expect(session.errors[0]).not.toBe(session.errors[1]);
      expect(session.exits).toEqual([]);
    });

    it("offers to discard after the last failed attempt and exits when declined", async () => {
      await new SecretStore(vaultBot()).write("test-secret-value", "correct-password");
      const session = new ScriptedSession({
        confirms: [false],
        masked: ["wrong1", "wrong2", "wrong3"],
      });

      const outcome = await new CredentialResolver(vaultBot(), session).resolve();

      expect(outcome.kind).toBe("aborted");
      expect(session.prompts).toContain(MESSAGES.unlockDiscard("production"));
      expect(session.exits).toHaveLength(1);
      expect(await new SecretStore(vaultBot()).read("correct-password")).toBe(
        "test-secret-value"
      );
    });

    it("replaces the key file when discarding is accepted", async () => {
      await new SecretStore(vaultBot()).write("test-secret-value", "correct-password");
      const session = new ScriptedSession({
        confirms: [true, true],
        masked: ["wrong1", "new-secret-value", "new-password", "new-password"],
      });

      const outcome = await new CredentialResolver(vaultBot(), session, {
        maxUnlockAttempts: 1,
      }).resolve();

      expect(outcome).toEqual({ kind: "resolved", value: "new-secret-value" });
      expect(session.errors).toEqual([MESSAGES.unlockFailed("production", 1, 1)]);
      expect(await new SecretStore(vaultBot()).read("new-password")).toBe("new-secret-value");
    });
  });

  describe("unreadable key file", () => {
    it("skips retries for credentials without a password", async () => {
      const descriptor = plainBot();
      await fs.writeFile(descriptor.filePath, "not an encrypted key file");
      const session = new ScriptedSession({ confirms: [false] });

      const outcome = await new CredentialResolver(descriptor, session).resolve();

      expect(outcome.kind).toBe("aborted");
      expect(session.errors).toEqual([MESSAGES.unlockFailedNoPassword("bot")]);
      expect(session.prompts).toEqual([MESSAGES.unlockDiscard("bot")]);
    });

    it("propagates storage errors without exiting", async () => {
      const blocker = path.join(storageDir, "not-a-directory");
      await fs.writeFile(blocker, "");
      const session = new ScriptedSession();
      const resolver = new CredentialResolver(
        createDescriptor({ uid: "bot", storageDirectory: blocker }),
        session
      );

      await expect(resolver.resolve()).rejects.toBeInstanceOf(StorageIOError);
      expect(session.exits).toEqual([]);
    });
  });

  it("turns an interrupted prompt into a single exit with code 130", async () => {
    const session = new InterruptingSession();

    const outcome = await new CredentialResolver(plainBot(), session).resolve();

    expect(outcome).toEqual({
      kind: "aborted",
      message: MESSAGES.exitByInterrupt,
      isError: false,
      exitCode: 130,
    });
    expect(session.exits).toEqual([
      { message: MESSAGES.exitByInterrupt, isError: false, exitCode: 130 },
    ]);
  });

  describe("step", () => {
    it("moves from check-existing to create-new when nothing is saved", async () => {
      const resolver = new CredentialResolver(plainBot(), new ScriptedSession());
      expect(await resolver.step({ kind: "check-existing" })).toEqual({ kind: "create-new" });
    });

    it("moves from check-existing to the first unlock attempt when a key file exists", async () => {
      await new SecretStore(plainBot()).write("test-secret-value");
      const resolver = new CredentialResolver(plainBot(), new ScriptedSession());
      expect(await resolver.step({ kind: "check-existing" })).toEqual({
        kind: "unlock",
        attempt: 1,
      });
    });

    it("leaves terminal states unchanged", async () => {
      const resolver = new CredentialResolver(plainBot(), new ScriptedSession());
      const state = { kind: "resolved", value: "test-secret-value" } as const;
      expect(await resolver.step(state)).toBe(state);
    });
  });
});
