/**
 * Main store implementation
 */

import { randomUUID } from "node:crypto";
import * as path from "node:path";
import type { AddBookInput, Book, BookQuery, BookStore, StoreOptions } from "./types.js";
import { DEFAULT_STATUS } from "./types.js";
import { atomicWrite, readDocument } from "./io.js";
import { parseBooks, serializeBooks } from "./codec.js";
import { filterBooks } from "./query.js";
import { validateStatus } from "./validation.js";
import { IdGenerationError, NotFoundError, StoreNotLoadedError, ValidationError } from "./errors.js";
import { silentLogger, type Logger } from "./observability/logs.js";

/**
 * Attempts at drawing an unused id before giving up
 */
const MAX_ID_ATTEMPTS = 8;

function copyBook(book: Book): Book {
  return { ...book };
}

/**
 * Book store backed by a single JSON file
 *
 * Holds the whole catalog in memory and rewrites the file after every
 * mutation. If that write fails, the mutation is undone in memory before
 * the error reaches the caller.
 *
 * @example
 * ```typescript
 * const store = openBookStore({ file: './library.json' });
 * await store.load();
 *
 * const book = await store.add({ title: 'Dune', author: 'Herbert', year: 1965 });
 * await store.changeStatus(book.id, 'checked_out');
 * store.findByTitle('dune'); // [{ id: ..., status: 'checked_out', ... }]
 * ```
 */
class JSONBookStore implements BookStore {
  #file: string;
  #books: Book[] = [];
  #loaded = false;
  #logger: Logger;
  #generateId: () => string;

  constructor(options: StoreOptions) {
    this.#file = path.resolve(options.file);
    this.#logger = options.logger ?? silentLogger;
    this.#generateId = options.generateId ?? randomUUID;
  }

  get file(): string {
    return this.#file;
  }

  get loaded(): boolean {
    return this.#loaded;
  }

  get size(): number {
    this.#assertLoaded();
    return this.#books.length;
  }

  async load(): Promise<void> {
    const raw = await readDocument(this.#file);

    if (raw === null) {
      this.#books = [];
      this.#loaded = true;
      this.#logger.debug("store.load", { file: this.#file, count: 0, missing: true });
      return;
    }

    this.#books = parseBooks(raw, this.#file);
    this.#loaded = true;
    this.#logger.debug("store.load", { file: this.#file, count: this.#books.length });
  }

  async save(): Promise<void> {
    this.#assertLoaded();
    await atomicWrite(this.#file, serializeBooks(this.#books));
    this.#logger.debug("store.save", { file: this.#file, count: this.#books.length });
  }

  async add(input: AddBookInput): Promise<Book> {
    this.#assertLoaded();

    const status = validateStatus(input.status ?? DEFAULT_STATUS);
    if (!Number.isInteger(input.year)) {
      throw new ValidationError(`year must be a whole number, got ${input.year}`);
    }

    const book: Book = {
      id: this.#nextId(),
      title: input.title,
      author: input.author,
      year: input.year,
      status,
    };

    this.#books.push(book);
    await this.#commit(() => {
      this.#books = this.#books.filter((candidate) => candidate !== book);
    });

    this.#logger.info("book.added", { id: book.id, title: book.title });
    return copyBook(book);
  }

  async remove(id: string): Promise<Book> {
    this.#assertLoaded();

    const index = this.#books.findIndex((book) => book.id === id);
    if (index === -1) {
      throw new NotFoundError(id);
    }

    const [removed] = this.#books.splice(index, 1);
    await this.#commit(() => {
      this.#books.splice(index, 0, removed);
    });

    this.#logger.info("book.removed", { id });
    return copyBook(removed);
  }

  async changeStatus(id: string, status: string): Promise<Book> {
    this.#assertLoaded();

    // Status legality is checked before the id is looked up
    const next = validateStatus(status);

    const book = this.#books.find((candidate) => candidate.id === id);
    if (!book) {
      throw new NotFoundError(id);
    }

    const previous = book.status;
    book.status = next;
    await this.#commit(() => {
      book.status = previous;
    });

    this.#logger.info("book.status_changed", { id, from: previous, to: next });
    return copyBook(book);
  }

  get(id: string): Book | undefined {
    this.#assertLoaded();
    const book = this.#books.find((candidate) => candidate.id === id);
    return book ? copyBook(book) : undefined;
  }

  list(): Book[] {
    this.#assertLoaded();
    return this.#books.map(copyBook);
  }

  find(query: BookQuery): Book[] {
    this.#assertLoaded();
    return filterBooks(this.#books, query).map(copyBook);
  }

  findByTitle(substring: string): Book[] {
    return this.find({ field: "title", value: substring });
  }

  findByAuthor(substring: string): Book[] {
    return this.find({ field: "author", value: substring });
  }

  findByYear(year: number): Book[] {
    return this.find({ field: "year", value: year });
  }

  /**
   * Persist the current list, undoing the pending mutation if the write fails
   */
  async #commit(rollback: () => void): Promise<void> {
    try {
      await this.save();
    } catch (err) {
      rollback();
      throw err;
    }
  }

  /**
   * Draw an id that is non-empty and not held by any book
   */
  #nextId(): string {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = this.#generateId();
      if (id && !this.#books.some((book) => book.id === id)) {
        return id;
      }
    }
    throw new IdGenerationError(MAX_ID_ATTEMPTS);
  }

  #assertLoaded(): void {
    if (!this.#loaded) {
      throw new StoreNotLoadedError(this.#file);
    }
  }
}

/**
 * Open a book store. Call `load()` before using it.
 * @param options - Store options (backing file, logger, id generator)
 */
export function openBookStore(options: StoreOptions): BookStore {
  return new JSONBookStore(options);
}

/**
 * Open a book store and load its file
 * @throws {CorruptDataError} If the file is not a valid book list
 * @throws {PersistenceError} If the file cannot be read
 */
export async function loadBookStore(options: StoreOptions): Promise<BookStore> {
  const store = openBookStore(options);
  await store.load();
  return store;
}
