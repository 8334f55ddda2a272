import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { MESSAGES } from "../config/messages.js";
import { UserAbortedError } from "../utils/errors.js";
import { ClackTerminalSession, formatStatus } from "./terminal-session.js";

const clack = vi.hoisted(() => ({
  password: vi.fn(),
  text: vi.fn(),
  confirm: vi.fn(),
  isCancel: vi.fn((value: unknown) => typeof value === "symbol"),
  cancel: vi.fn(),
  outro: vi.fn(),
  log: { info: vi.fn(), error: vi.fn() },
}));

vi.mock("@clack/prompts", () => clack);

describe("formatStatus", () => {
  it("prefixes the program name", () => {
    expect(formatStatus("example-bot", "Token saved.")).toBe("example-bot: Token saved.");
  });

  it("labels errors", () => {
    expect(formatStatus("example-bot", "Could not decrypt.", true)).toBe(
      "example-bot: error: Could not decrypt."
    );
  });
});

describe("ClackTerminalSession", () => {
  const session = new ClackTerminalSession("example-bot");

  const exit = vi.spyOn(process, "exit");

  beforeAll(() => {
    exit.mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  afterAll(() => {
    exit.mockRestore();
  });

  it("trims masked input", async () => {
    clack.password.mockResolvedValueOnce("  test-secret-value \n");

    expect(await session.promptMasked("TOKEN")).toBe("test-secret-value");
    expect(clack.password).toHaveBeenCalledWith({ message: "TOKEN", mask: "*" });
  });

  it("trims line input", async () => {
    clack.text.mockResolvedValueOnce(" dev ");

    expect(await session.promptLine("ID")).toBe("dev");
  });

  it("throws UserAbortedError with exit code 130 on a cancelled prompt", async () => {
    clack.password.mockResolvedValueOnce(Symbol("clack:cancel"));

    const error = await session.promptMasked("PASSWORD").catch((thrown: unknown) => thrown);

    expect(error).toBeInstanceOf(UserAbortedError);
    expect(error).toMatchObject({ message: MESSAGES.exitByInterrupt, exitCode: 130 });
  });

  it("treats a cancelled confirmation as an interrupt", async () => {
    clack.confirm.mockResolvedValueOnce(Symbol("clack:cancel"));

    await expect(session.confirm("Continue?")).rejects.toBeInstanceOf(UserAbortedError);
  });

  it("treats anything but an explicit yes as no", async () => {
    clack.confirm.mockResolvedValueOnce(undefined);
    clack.confirm.mockResolvedValueOnce(false);
    clack.confirm.mockResolvedValueOnce(true);

    expect(await session.confirm("Continue?")).toBe(false);
    expect(await session.confirm("Continue?")).toBe(false);
    expect(await session.confirm("Continue?")).toBe(true);
    expect(clack.confirm).toHaveBeenCalledWith({ message: "Continue?", initialValue: false });
  });

  it("routes status lines by severity", () => {
    session.printStatus("Token saved.");
    session.printStatus("Could not decrypt.", true);

    expect(clack.log.info).toHaveBeenCalledWith("example-bot: Token saved.");
    expect(clack.log.error).toHaveBeenCalledWith("example-bot: error: Could not decrypt.");
  });

  it("exits with 0 after a non-error message", () => {
    expect(() => session.exitProcess(MESSAGES.exitByChoice, false)).toThrow("process.exit(0)");
    expect(clack.outro).toHaveBeenCalledWith(`${MESSAGES.exitByChoice} ${MESSAGES.exiting}`);
  });

  it("exits with 1 after an error message", () => {
    expect(() => session.exitProcess("Key file missing.")).toThrow("process.exit(1)");
    expect(clack.cancel).toHaveBeenCalledWith(`Key file missing. ${MESSAGES.exiting}`);
  });

  it("exits with an explicit code", () => {
    expect(() => session.exitProcess(MESSAGES.exitByInterrupt, false, 130)).toThrow(
      "process.exit(130)"
    );
  });
});
