import fs from "fs/promises";
import path from "path";
import { BOT_TOKEN_SEARCH_PATTERN } from "../config/credentials.js";

const IGNORED_DIRS = new Set([".git", "node_modules", "dist", "coverage", ".botkeys"]);
const IGNORED_DIR_PATTERN = /^\..*_cache$/;
const BINARY_SNIFF_BYTES = 8192;

export interface ScanMatch {
  /** Path relative to the scan root */
  file: string;
  /** 1-based line numbers containing a token-shaped string */
  lines: number[];
}

export interface ScanResult {
  scanned: number;
  skipped: string[];
  matches: ScanMatch[];
}

/**
 * Search files for plaintext bot tokens.
 *
 * Paths may be files or directories; directories are walked recursively,
 * skipping VCS, dependency and build folders. Files with a NUL byte in
 * their first 8 KiB are treated as binary and skipped.
 */
export async function scanForTokens(
  paths: string[],
  root: string = process.cwd()
): Promise<ScanResult> {
  const result: ScanResult = { scanned: 0, skipped: [], matches: [] };
  const targets = paths.length > 0 ? paths : ["."];

  for (const target of targets) {
    for (const file of await collectFiles(path.resolve(root, target))) {
      const relative = path.relative(root, file) || path.basename(file);
      const content = await fs.readFile(file);

      if (isBinary(content)) {
        result.skipped.push(relative);
        continue;
      }

      result.scanned += 1;
      const lines = findTokenLines(content.toString("utf8"));
      if (lines.length > 0) {
        result.matches.push({ file: relative, lines });
      }
    }
  }

  result.matches.sort((a, b) => a.file.localeCompare(b.file));
  return result;
}

/**
 * 1-based line numbers of every line containing a token-shaped string
 */
export function findTokenLines(text: string): number[] {
  return text
    .split(/\r?\n/)
    .flatMap((line, index) => (BOT_TOKEN_SEARCH_PATTERN.test(line) ? [index + 1] : []));
}

export function isBinary(content: Buffer): boolean {
  return content.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

async function collectFiles(target: string): Promise<string[]> {
  const stat = await fs.stat(target);
  if (stat.isFile()) return [target];
  if (!stat.isDirectory()) return [];

  const files: string[] = [];
  const entries = await fs.readdir(target, { withFileTypes: true });
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const fullPath = path.join(target, entry.name);
    if (entry.isDirectory()) {
      if (IGNORED_DIRS.has(entry.name) || IGNORED_DIR_PATTERN.test(entry.name)) continue;
      files.push(...(await collectFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}
