/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openBookStore } from "@bookshelf/sdk";
import type { BookStore, StoreOptions } from "@bookshelf/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "bookshelf-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "bookshelf-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a loaded store backed by `library.json` in a
 * temporary directory, cleaning up after
 * @param options - Optional store options (file will be overridden)
 * @returns Result of fn
 */
export async function withTempStore<T>(
  fn: (store: BookStore, file: string) => Promise<T>,
  options?: Omit<StoreOptions, "file">
): Promise<T> {
  return withTempDir(async (dir) => {
    const file = join(dir, "library.json");
    const store = openBookStore({ ...options, file });
    await store.load();
    return fn(store, file);
  });
}
