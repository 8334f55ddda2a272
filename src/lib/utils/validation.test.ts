import { describe, expect, it } from "vitest";
import { BOT_TOKEN_PATTERN } from "../config/credentials.js";
import {
  isValidUid,
  uidSchema,
  validatePasswordPolicy,
  validateSecretValue,
} from "./validation.js";

describe("isValidUid", () => {
  it.each(["bot", "_private", "Prod2", "a_b_c"])("accepts %j", (uid) => {
    expect(isValidUid(uid)).toBe(true);
  });

  it.each(["", "2fa", "my-bot", "a.b", "dir/bot"])("rejects %j", (uid) => {
    expect(isValidUid(uid)).toBe(false);
  });

  it("backs the zod schema", () => {
    expect(uidSchema.safeParse("bot").success).toBe(true);
    expect(uidSchema.safeParse("my-bot").success).toBe(false);
  });
});

describe("validateSecretValue", () => {
  it("checks the bot token shape when given the pattern", () => {
    const token = `${"a".repeat(24)}.${"b".repeat(6)}.${"c".repeat(27)}`;
    expect(validateSecretValue(token, BOT_TOKEN_PATTERN)).toEqual({ valid: true });
    expect(validateSecretValue("abc123XYZ", BOT_TOKEN_PATTERN)).toEqual({
      valid: false,
      reason: "The value does not have the expected format.",
    });
  });
});

describe("validatePasswordPolicy", () => {
  it("requires at least 8 characters", () => {
    expect(validatePasswordPolicy("1234567")).toEqual({
      valid: false,
      reason: "Your password must be at least 8 characters long.",
    });
    expect(validatePasswordPolicy("12345678")).toEqual({ valid: true });
  });
});
