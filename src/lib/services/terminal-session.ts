import * as p from "@clack/prompts";
import { EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_SUCCESS } from "../config/credentials.js";
import { MESSAGES } from "../config/messages.js";
import { UserAbortedError } from "../utils/errors.js";

/**
 * Everything the interactive flows need from a terminal.
 */
export interface TerminalSession {
  /** Read a line without echoing it */
  promptMasked(message: string): Promise<string>;
  /** Read a line with normal echo */
  promptLine(message: string): Promise<string>;
  /** Yes/no question. Empty or ambiguous input counts as "no". */
  confirm(message: string): Promise<boolean>;
  /** Print a line prefixed with the program name */
  printStatus(message: string, isError?: boolean): void;
  /**
   * Print the message and end the process. The exit code defaults to 1
   * for errors and 0 otherwise.
   */
  exitProcess(message: string, isError?: boolean, exitCode?: number): void;
}

/**
 * "<name>: message" or "<name>: error: message"
 */
export function formatStatus(programName: string, message: string, isError = false): string {
  return [`${programName}:`, isError ? MESSAGES.errorLabel : "", message]
    .filter(Boolean)
    .join(" ");
}

/**
 * TerminalSession backed by @clack/prompts.
 * A cancelled prompt (Ctrl+C / Esc) throws UserAbortedError.
 */
export class ClackTerminalSession implements TerminalSession {
  constructor(readonly programName: string) {}

  async promptMasked(message: string): Promise<string> {
    const value = await p.password({ message, mask: "*" });
    return this.unwrap(value).trim();
  }

  async promptLine(message: string): Promise<string> {
    const value = await p.text({ message });
    return this.unwrap(value).trim();
  }

  async confirm(message: string): Promise<boolean> {
    const value = await p.confirm({ message, initialValue: false });
    return this.unwrap(value) === true;
  }

  printStatus(message: string, isError = false): void {
    const line = formatStatus(this.programName, message, isError);
    if (isError) {
      p.log.error(line);
    } else {
      p.log.info(line);
    }
  }

  exitProcess(message: string, isError = true, exitCode?: number): never {
    const line = `${message} ${MESSAGES.exiting}`;
    if (isError) {
      p.cancel(line);
    } else {
      p.outro(line);
    }
    process.exit(exitCode ?? (isError ? EXIT_FAILURE : EXIT_SUCCESS));
  }

  private unwrap<T>(value: T | symbol): T {
    if (p.isCancel(value)) {
      throw new UserAbortedError(MESSAGES.exitByInterrupt, EXIT_INTERRUPTED);
    }
    return value;
  }
}
