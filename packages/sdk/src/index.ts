/**
 * Bookshelf SDK
 *
 * A book catalog kept in a single JSON file
 */

// Re-export types
export type { Book, BookStatus, AddBookInput, BookQuery, StoreOptions, BookStore } from "./types.js";
export { BOOK_STATUSES, DEFAULT_STATUS } from "./types.js";

// Re-export utilities
export { matches, filterBooks } from "./query.js";
export {
  isBookStatus,
  validateStatus,
  validateText,
  validateYear,
  parseYearText,
  parseIntegerText,
} from "./validation.js";
export { BookSchema, LibrarySchema, decodeDocument, parseBooks, serializeBooks } from "./codec.js";

// Re-export I/O operations
export { atomicWrite, readDocument, ensureDirectory } from "./io.js";

// Re-export logging
export type {
  Logger,
  LogLevel,
  LogThreshold,
  LogEvent,
  LogFields,
  LogSink,
  JsonLineLoggerOptions,
} from "./observability/logs.js";
export { JsonLineLogger, silentLogger, parseLogThreshold } from "./observability/logs.js";

// Re-export errors
export {
  BookshelfError,
  NotFoundError,
  InvalidStatusError,
  CorruptDataError,
  PersistenceError,
  StoreNotLoadedError,
  ValidationError,
  IdGenerationError,
} from "./errors.js";

export { openBookStore, loadBookStore } from "./store.js";
