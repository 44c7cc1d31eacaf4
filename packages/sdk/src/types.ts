/**
 * Core types for the book store
 */

import type { Logger } from "./observability/logs.js";

/**
 * Allowed book statuses, in display order
 */
export const BOOK_STATUSES = ["available", "checked_out"] as const;

export type BookStatus = (typeof BOOK_STATUSES)[number];

/**
 * Status given to new books when none is supplied
 */
export const DEFAULT_STATUS: BookStatus = "available";

/**
 * A catalog entry as held in memory and persisted on disk
 */
export interface Book {
  /** Opaque identifier assigned by the store */
  id: string;
  title: string;
  author: string;
  /** Publication year */
  year: number;
  status: BookStatus;
}

/**
 * Input for {@link BookStore.add}. The status is checked at runtime, so any
 * string is accepted here.
 */
export interface AddBookInput {
  title: string;
  author: string;
  year: number;
  status?: string;
}

/**
 * Single-field search over the catalog
 */
export type BookQuery =
  | { field: "title"; value: string }
  | { field: "author"; value: string }
  | { field: "year"; value: number };

/**
 * Options for opening a store
 */
export interface StoreOptions {
  /** Path of the JSON file backing the store */
  file: string;
  /** Receives store events (default: silent) */
  logger?: Logger;
  /** Id generator for new books (default: crypto.randomUUID) */
  generateId?: () => string;
}

/**
 * File-backed book store
 *
 * Every method other than `load()` requires a successful `load()` first.
 */
export interface BookStore {
  /** Absolute path of the backing file */
  readonly file: string;

  /** Whether `load()` has completed successfully */
  readonly loaded: boolean;

  /** Number of books currently held */
  readonly size: number;

  /**
   * Replace the in-memory list with the file contents.
   * A missing file yields an empty list.
   * @throws {CorruptDataError} If the file is not a valid book list
   * @throws {PersistenceError} If the file cannot be read
   */
  load(): Promise<void>;

  /**
   * Rewrite the backing file with the in-memory list
   * @throws {PersistenceError} If the write fails
   */
  save(): Promise<void>;

  /**
   * Append a new book and persist it
   * @returns The stored book, including its generated id
   * @throws {InvalidStatusError} If `status` is not an allowed status
   */
  add(input: AddBookInput): Promise<Book>;

  /**
   * Remove a book and persist the change
   * @returns The removed book
   * @throws {NotFoundError} If no book has this id
   */
  remove(id: string): Promise<Book>;

  /**
   * Set the status of a book and persist the change.
   * The status is checked before the id is looked up.
   * @throws {InvalidStatusError} If `status` is not an allowed status
   * @throws {NotFoundError} If no book has this id
   */
  changeStatus(id: string, status: string): Promise<Book>;

  get(id: string): Book | undefined;

  /** All books in store order */
  list(): Book[];

  find(query: BookQuery): Book[];

  /** Case-insensitive substring match on the title */
  findByTitle(substring: string): Book[];

  /** Case-insensitive substring match on the author */
  findByAuthor(substring: string): Book[];

  /** Exact match on the publication year */
  findByYear(year: number): Book[];
}
