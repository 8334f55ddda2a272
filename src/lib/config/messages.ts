/**
 * User-facing text for the interactive flows.
 * Functions take the credential's display name.
 */

export const MESSAGES = {
  exitByChoice: "Received a non-affirmative response.",
  exitByInterrupt: "Received a keyboard interrupt.",
  exiting: "Exiting process.",
  errorLabel: "error:",

  passwordPrompt: "PASSWORD",
  passwordCue: (name: string) =>
    `Please enter the password to decrypt your ${name} token.`,
  passwordInfo: (name: string) =>
    `To keep your ${name} token extra safe, it will be encrypted with a password.\n` +
    "The password is never stored. You will need it every time the token is decrypted.",
  passwordCreateCue: (name: string) =>
    `Please enter a password for your ${name} token.`,
  passwordRetry: "Would you like to try a different one?",
  passwordConfirmCue: "Please re-enter the same password to confirm.",
  passwordConfirmMismatch: "That password doesn't match your original password.",
  passwordConfirmRetry: "Would you like to try again?",

  tokenPrompt: "TOKEN",
  tokenMissing: (name: string) => `Key file for the ${name} token doesn't exist.`,
  tokenCreate: (name: string) =>
    `You currently don't have a saved ${name} token. Would you like to add one now?`,
  tokenCreateCue: "Please enter your token now. It will be hidden for security reasons.",
  tokenInvalid: (reason: string) => `That doesn't look like a valid token: ${reason}`,
  tokenSaved: "Your token has been successfully encrypted and saved.",
  tokenUseNow: "Do you want to use this token to run your bot now?",
  unlockFailed: (name: string, attempt: number, maxAttempts: number) =>
    `Could not decrypt the ${name} token (attempt ${attempt} of ${maxAttempts}).`,
  unlockFailedNoPassword: (name: string) =>
    `The key file for the ${name} token is unreadable or was changed.`,
  unlockDiscard: (name: string) =>
    `Would you like to delete the saved ${name} token and enter a new one?`,

  manageList: "You currently have the following tokens saved:",
  manageNone: "You currently don't have any saved tokens.",
  manageOrphans: "Key files not matching any registered token:",
  deletePrompt: "Would you like to permanently delete any of these tokens?",
  deleteCue: "ID of the token to delete",
  deleteMismatch: (ids: string[]) =>
    `That doesn't match any of your saved tokens. Expected one of: ${ids.join(", ")}`,
  deleteRetry: "Would you like to try again?",
  deleteConfirm: (name: string) => `Permanently delete the ${name} token?`,
  deleteSuccess: "Token successfully deleted.",
} as const;
