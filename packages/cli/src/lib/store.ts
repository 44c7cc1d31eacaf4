/**
 * Store adapter for CLI
 */

import { loadBookStore, type BookStore, type Logger } from "@bookshelf/sdk";

/**
 * Open the library file and load it; every command starts here
 * @throws {CorruptDataError} If the file is not a valid book list
 */
export async function openCliStore(file: string, logger: Logger): Promise<BookStore> {
  return loadBookStore({ file, logger });
}
