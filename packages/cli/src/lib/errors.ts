/**
 * CLI error handling and exit code mapping
 */

import { BookshelfError } from "@bookshelf/sdk";

/**
 * Exit codes
 * - 0: success
 * - 1: usage/validation/IO/id generation/unknown error
 * - 2: book not found
 * - 3: library file is corrupt
 */
export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  notFound: 2,
  corruptData: 3,
} as const;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_CODES.failure;
  }
}

/**
 * Map an error to a process exit code
 */
export function mapErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof BookshelfError) {
    switch (error.code) {
      case "NOT_FOUND":
        return EXIT_CODES.notFound;
      case "CORRUPT_DATA":
        return EXIT_CODES.corruptData;
      case "ID_GENERATION":
        return EXIT_CODES.failure;
    }
  }

  return EXIT_CODES.failure;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause !== undefined) {
      const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
      message += `\n  Cause: ${cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
