/**
 * CLI testing utilities
 */

import { execa } from "execa";

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (undefined if process was killed by signal) */
  exitCode: number | undefined;
  /** Terminating signal when the process didn't exit normally */
  signal: NodeJS.Signals | undefined;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory */
  cwd?: string;
  /** Environment variables */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
}

/**
 * Execute a CLI entry point from its TypeScript source
 *
 * The source is loaded through tsx, with the "development" export condition
 * so that workspace packages resolve to their sources as well. The process
 * never rejects on a non-zero exit.
 * @param cliPath - Path to the CLI entry module
 * @param args - Command arguments
 */
export async function runCli(
  cliPath: string,
  args: string[],
  options: CliExecOptions = {}
): Promise<CliResult> {
  const { cwd, env, input = "" } = options;

  const result = await execa(
    process.execPath,
    ["--conditions=development", "--import", "tsx", cliPath, ...args],
    {
      cwd,
      env,
      input,
      reject: false,
      stripFinalNewline: false,
    }
  );

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode,
    signal: result.signal,
  };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
