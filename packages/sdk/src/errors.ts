/**
 * Error types for book store operations
 *
 * Invariants:
 * - Every error has a stable `name` and `code` for programmatic handling
 * - Errors about the backing file include its absolute path in the message
 * - Underlying failures are kept in `cause`
 */

import { BOOK_STATUSES } from "./types.js";

/**
 * Base class for all book store errors
 */
export abstract class BookshelfError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when no book has the requested id
 */
export class NotFoundError extends BookshelfError {
  readonly code = "NOT_FOUND";

  constructor(
    public readonly id: string,
    options?: ErrorOptions
  ) {
    super(`Book not found: ${id}`, options);
  }
}

/**
 * Thrown when a status outside the allowed set is supplied
 */
export class InvalidStatusError extends BookshelfError {
  readonly code = "INVALID_STATUS";

  constructor(
    public readonly status: string,
    options?: ErrorOptions
  ) {
    const allowed = BOOK_STATUSES.map((s) => `"${s}"`).join(", ");
    super(`Invalid status "${status}". Allowed statuses: ${allowed}`, options);
  }
}

/**
 * Thrown when the backing file exists but does not hold a valid book list
 */
export class CorruptDataError extends BookshelfError {
  readonly code = "CORRUPT_DATA";

  constructor(
    public readonly filePath: string,
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Corrupt data in ${filePath}: ${reason}`, options);
  }
}

/**
 * Thrown when reading or writing the backing file fails
 */
export class PersistenceError extends BookshelfError {
  readonly code = "PERSISTENCE_ERROR";

  constructor(
    public readonly filePath: string,
    action: "read" | "write" | "create directory",
    options?: ErrorOptions
  ) {
    super(`Failed to ${action} ${filePath}`, options);
  }
}

/**
 * Thrown when a store is used before a successful load
 */
export class StoreNotLoadedError extends BookshelfError {
  readonly code = "NOT_LOADED";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Store has not been loaded: ${filePath}`, options);
  }
}

/**
 * Thrown when the id generator keeps producing ids that are empty or taken
 */
export class IdGenerationError extends BookshelfError {
  readonly code = "ID_GENERATION";

  constructor(attempts: number, options?: ErrorOptions) {
    super(`Could not generate a unique book id after ${attempts} attempts`, options);
  }
}

/**
 * Thrown when an input value is rejected
 */
export class ValidationError extends BookshelfError {
  readonly code = "VALIDATION_ERROR";
}
