/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { parseLogThreshold, type LogThreshold } from "@bookshelf/sdk";

export const DEFAULT_LIBRARY_FILE = "./library.json";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the library file
 * Priority: CLI option > BOOKSHELF_FILE env var > default "./library.json"
 */
export function resolveLibraryFile(cliFile?: string): string {
  const file = cliFile ?? process.env.BOOKSHELF_FILE ?? DEFAULT_LIBRARY_FILE;
  return path.resolve(expandTilde(file));
}

/**
 * Resolve the log threshold
 * Priority: --verbose or BOOKSHELF_DEBUG=1 > BOOKSHELF_LOG_LEVEL > "warn"
 */
export function resolveLogThreshold(verbose = false): LogThreshold {
  if (verbose || process.env.BOOKSHELF_DEBUG === "1") {
    return "debug";
  }
  return parseLogThreshold(process.env.BOOKSHELF_LOG_LEVEL) ?? "warn";
}
