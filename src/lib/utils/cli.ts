/**
 * Shared CLI output helpers.
 */

import { EXIT_FAILURE } from "../config/credentials.js";
import { MESSAGES } from "../config/messages.js";
import { BotkeysError, UserAbortedError, formatError } from "./errors.js";

/**
 * Print any value as formatted JSON to stdout.
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Print an error as JSON and exit.
 *
 * UserAbortedError exits with its own code and a plain message; every other
 * error exits with code 1. BotkeysError output includes code and suggestion
 * so the user knows what to do next. Messages are redacted.
 */
export function handleError(error: unknown): never {
  if (error instanceof UserAbortedError) {
    console.error(`${error.message} ${MESSAGES.exiting}`);
    process.exit(error.exitCode);
  }

  const formatted = formatError(error);
  const output: Record<string, unknown> = { error: formatted.message };
  if (error instanceof BotkeysError) {
    output.code = formatted.code;
    output.suggestion = formatted.suggestion;
    if (formatted.details !== undefined) {
      output.details = formatted.details;
    }
  }
  printJson(output);
  process.exit(EXIT_FAILURE);
}
