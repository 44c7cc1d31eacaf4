/**
 * Shared helpers for bookshelf tests
 */

export { createTempDir, removeDir, withTempDir, withTempStore } from "./fs.js";
export { runCli, parseJsonOutput } from "./cli.js";
export type { CliResult, CliExecOptions } from "./cli.js";
export { MemoryStream, MemoryInput, createMemoryIo } from "./streams.js";
export type { MemoryIo } from "./streams.js";
