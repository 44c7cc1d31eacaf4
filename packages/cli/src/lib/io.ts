/**
 * I/O streams for CLI
 */

export type OutputStream = NodeJS.WritableStream & { isTTY?: boolean };
export type InputStream = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Streams a CLI run reads from and writes to
 */
export interface CliIo {
  stdin: InputStream;
  stdout: OutputStream;
  stderr: OutputStream;
}

export const processIo: CliIo = {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
};

/**
 * Write one line
 */
export function writeLine(stream: OutputStream, line: string): void {
  stream.write(line + "\n");
}

/**
 * Write several lines
 */
export function writeLines(stream: OutputStream, lines: readonly string[]): void {
  lines.forEach((line) => writeLine(stream, line));
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(io: CliIo): boolean {
  return io.stdin.isTTY ?? false;
}
