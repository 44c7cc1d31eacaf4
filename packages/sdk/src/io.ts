/**
 * Atomic file I/O for the backing file
 *
 * Invariants:
 * - Writes are atomic: readers never observe partial file contents
 * - Temp files live in the same directory as the target (same filesystem for rename)
 * - Temp files are removed on failure paths
 * - A symlinked target is written through; the link itself stays
 * - The target keeps its permission bits
 * - Reads return raw bytes; a missing file reads as null
 *
 * Pattern: write → fsync → rename
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { PersistenceError } from "./errors.js";

/**
 * Extract the errno code from a thrown value
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new PersistenceError(dirPath, "create directory", { cause: err });
  }
}

/**
 * Follow symlinks to the file that actually holds the data
 * @returns The real path, or the given path when nothing exists there yet
 */
async function resolveTarget(filePath: string): Promise<string> {
  try {
    return await fs.realpath(filePath);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return filePath;
    }
    throw new PersistenceError(filePath, "write", { cause: err });
  }
}

/**
 * Permission bits of an existing regular file
 * @returns The mode, or undefined when there is no such file
 */
async function existingMode(filePath: string): Promise<number | undefined> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() ? stats.mode & 0o7777 : undefined;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return undefined;
    }
    throw new PersistenceError(filePath, "write", { cause: err });
  }
}

/**
 * Atomically replace a file's contents
 * @param filePath - Target file path
 * @param content - UTF-8 content to write
 * @throws PersistenceError if any step fails
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const target = await resolveTarget(filePath);
  const dir = dirname(target);
  const tmp = join(dir, `.${basename(target)}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);
  const mode = await existingMode(target);

  let fileHandle: fs.FileHandle | null = null;

  try {
    // New files get 0o666 less the umask, like any other file the user creates
    fileHandle = await fs.open(tmp, "w", mode ?? 0o666);
    if (mode !== undefined) {
      await fileHandle.chmod(mode);
    }
    await fileHandle.writeFile(content, "utf-8");

    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errnoCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, target);
  } catch (err) {
    await discardTempFile(fileHandle, tmp);
    throw new PersistenceError(filePath, "write", { cause: err });
  }
}

/**
 * Close and delete a temp file left by a failed write.
 * Cleanup failures must not replace the write error.
 */
async function discardTempFile(fileHandle: fs.FileHandle | null, tmp: string): Promise<void> {
  if (fileHandle) {
    await Promise.allSettled([fileHandle.close()]);
  }
  await Promise.allSettled([fs.rm(tmp, { force: true })]);
}

/**
 * Read a file's bytes; decoding is left to the codec
 * @param filePath - File path to read
 * @returns File contents, or null if the file does not exist
 * @throws PersistenceError for other read failures
 */
export async function readDocument(filePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return null;
    }
    throw new PersistenceError(filePath, "read", { cause: err });
  }
}
