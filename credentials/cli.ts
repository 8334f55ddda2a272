#!/usr/bin/env node
/**
 * botkeys CLI
 * Encrypted bot token storage under ~/.botkeys (or the directories
 * declared in botkeys.json)
 *
 * Usage: botkeys <subcommand> [options]
 */

import { Command } from "commander";
import { EXIT_FAILURE, EXIT_INTERRUPTED } from "../src/lib/config/credentials.js";
import { MESSAGES } from "../src/lib/config/messages.js";
import { loadProject } from "../src/lib/config/project.js";
import {
  CredentialManager,
  describeDescriptor,
} from "../src/lib/services/credential-manager.js";
import { CredentialResolver } from "../src/lib/services/credential-resolver.js";
import { ClackTerminalSession } from "../src/lib/services/terminal-session.js";
import { scanForTokens } from "../src/lib/services/token-scanner.js";
import { handleError, printJson } from "../src/lib/utils/cli.js";
import { maskSecret } from "../src/lib/utils/redact.js";

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("botkeys")
  .description(
    "Encrypted at-rest storage for bot tokens. Create, unlock, and manage saved credentials."
  )
  .version("0.1.0")
  .option("-c, --config <path>", "Path to botkeys.json (default: ./botkeys.json)");

function configPath(): string | undefined {
  return program.opts<{ config?: string }>().config;
}

process.on("SIGINT", () => {
  console.error(`\n${MESSAGES.exitByInterrupt} ${MESSAGES.exiting}`);
  process.exit(EXIT_INTERRUPTED);
});

// ---------------------------------------------------------------------------
// unlock
// ---------------------------------------------------------------------------

program
  .command("unlock")
  .description(
    "Decrypt a saved credential (prompting for its password), or create it if missing"
  )
  .argument("[id]", "Credential ID (default: first registered credential)")
  .option("--no-create", "Fail instead of offering to create a missing credential")
  .action(async (id: string | undefined, opts: { create: boolean }) => {
    try {
      const project = await loadProject(configPath());
      const descriptor =
        id === undefined ? project.registry.defaultDescriptor : project.registry.require(id);
      const session = new ClackTerminalSession(project.programName);

      const outcome = await new CredentialResolver(descriptor, session, {
        allowCreation: opts.create,
      }).resolve();

      if (outcome.kind === "resolved") {
        printJson({
          success: true,
          id: descriptor.uid,
          displayName: descriptor.displayName,
          maskedValue: maskSecret(outcome.value),
        });
      }
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

program
  .command("list")
  .description("List registered credentials, which are saved, and orphaned key files")
  .action(async () => {
    try {
      const project = await loadProject(configPath());
      const manager = new CredentialManager(project.registry);
      const saved = await manager.listSaved();
      const savedIds = new Set(saved.map((s) => s.uid));

      printJson({
        configPath: project.configPath,
        credentials: project.registry.descriptors.map((descriptor) => ({
          ...describeDescriptor(descriptor),
          saved: savedIds.has(descriptor.uid),
          createdAt: saved.find((s) => s.uid === descriptor.uid)?.createdAt ?? null,
        })),
        orphans: await manager.listOrphans(),
      });
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// manage
// ---------------------------------------------------------------------------

program
  .command("manage")
  .description("Interactively view saved credentials and delete any of them")
  .action(async () => {
    try {
      const project = await loadProject(configPath());
      const session = new ClackTerminalSession(project.programName);
      await new CredentialManager(project.registry).manage(session);
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// delete
// ---------------------------------------------------------------------------

program
  .command("delete")
  .description("Permanently delete a saved credential or orphaned key file")
  .argument("<id>", "Credential ID to delete")
  .option("-y, --yes", "Skip the confirmation prompt")
  .action(async (id: string, opts: { yes?: boolean }) => {
    try {
      const project = await loadProject(configPath());
      const displayName = project.registry.get(id)?.displayName ?? id;

      if (!opts.yes) {
        const session = new ClackTerminalSession(project.programName);
        if (!(await session.confirm(MESSAGES.deleteConfirm(displayName)))) {
          session.exitProcess(MESSAGES.exitByChoice, false);
        }
      }

      const filePath = await new CredentialManager(project.registry).delete(id);
      printJson({
        success: true,
        deleted: id,
        filePath,
        message: MESSAGES.deleteSuccess,
      });
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// scan
// ---------------------------------------------------------------------------

program
  .command("scan")
  .description("Scan files for plaintext bot tokens (exits 1 if any are found)")
  .argument("[paths...]", "Files or directories to scan (default: current directory)")
  .action(async (paths: string[]) => {
    try {
      const result = await scanForTokens(paths);
      printJson({
        clean: result.matches.length === 0,
        scanned: result.scanned,
        skipped: result.skipped,
        matches: result.matches,
      });
      if (result.matches.length > 0) {
        process.exit(EXIT_FAILURE);
      }
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// Parse
// ---------------------------------------------------------------------------

program.parseAsync(process.argv).catch(handleError);
