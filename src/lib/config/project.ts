/**
 * Project configuration: botkeys.json
 *
 * Declares the program name and the credentials a bot uses. Relative
 * storage directories are resolved against the file's own directory.
 *
 *   {
 *     "name": "example-bot",
 *     "storageDirectory": ".botkeys",
 *     "credentials": [
 *       { "uid": "dev", "displayName": "development" },
 *       { "uid": "prod", "displayName": "production", "requiresPassword": true }
 *     ]
 *   }
 */

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { DEFAULT_PROGRAM_NAME, PROJECT_CONFIG_FILE } from "./credentials.js";
import { CredentialRegistry } from "../services/credential-registry.js";
import { ConfigError } from "../utils/errors.js";
import { uidSchema } from "../utils/validation.js";

const patternSchema = z.string().min(1).refine(
  (val) => {
    try {
      new RegExp(val);
      return true;
    } catch {
      return false;
    }
  },
  { message: "Invalid regular expression" }
);

export const CredentialConfigSchema = z.object({
  uid: uidSchema.describe("Unique credential identifier"),
  displayName: z.string().min(1).optional().describe("Label shown in prompts"),
  requiresPassword: z.boolean().default(false),
  storageDirectory: z.string().min(1).optional(),
  pattern: patternSchema.optional().describe("Regular expression the value must fully match"),
});

export const ProjectConfigSchema = z
  .object({
    name: z.string().min(1).optional().describe("Program name shown in status lines"),
    storageDirectory: z.string().min(1).optional(),
    credentials: z.array(CredentialConfigSchema).default([]),
  })
  .strict();

export type CredentialConfig = z.infer<typeof CredentialConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * A loaded project: program name plus the frozen registry
 */
export interface LoadedProject {
  programName: string;
  registry: CredentialRegistry;
  configPath: string | null;
}

/**
 * Parse and validate raw config JSON
 */
export function parseProjectConfig(raw: string, source: string): ProjectConfig {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${source} is not valid JSON`, String(error));
  }

  const parsed = ProjectConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration in ${source}`, issues);
  }
  return parsed.data;
}

/**
 * Build the registry declared by a config, resolving relative
 * directories against baseDir.
 */
export function buildRegistry(config: ProjectConfig, baseDir: string): CredentialRegistry {
  const builder = CredentialRegistry.builder();
  const sharedDir = config.storageDirectory
    ? path.resolve(baseDir, config.storageDirectory)
    : undefined;

  for (const credential of config.credentials) {
    const storageDirectory = credential.storageDirectory
      ? path.resolve(baseDir, credential.storageDirectory)
      : sharedDir;
    builder.register({
      uid: credential.uid,
      displayName: credential.displayName,
      requiresPassword: credential.requiresPassword,
      storageDirectory,
      pattern: credential.pattern ? new RegExp(credential.pattern) : undefined,
    });
  }
  return builder.build();
}

/**
 * Load botkeys.json. An explicit path must exist; the default path in cwd
 * is optional, and its absence yields the default registry.
 */
export async function loadProject(
  configPath?: string,
  cwd: string = process.cwd()
): Promise<LoadedProject> {
  const explicit = configPath !== undefined;
  const resolved = path.resolve(cwd, configPath ?? PROJECT_CONFIG_FILE);

  let raw: string;
  try {
    raw = await fs.readFile(resolved, "utf8");
  } catch (err) {
    const missing = err instanceof Error && "code" in err && err.code === "ENOENT";
    if (missing && !explicit) {
      return {
        programName: DEFAULT_PROGRAM_NAME,
        registry: CredentialRegistry.builder().build(),
        configPath: null,
      };
    }
    throw new ConfigError(`Cannot read config file: ${resolved}`, String(err));
  }

  const config = parseProjectConfig(raw, resolved);
  return {
    programName: config.name ?? DEFAULT_PROGRAM_NAME,
    registry: buildRegistry(config, path.dirname(resolved)),
    configPath: resolved,
  };
}
