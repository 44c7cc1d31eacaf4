/**
 * Interactive menu
 */

import {
  IdGenerationError,
  InvalidStatusError,
  NotFoundError,
  PersistenceError,
  ValidationError,
  parseIntegerText,
  parseYearText,
  validateText,
  BOOK_STATUSES,
  type BookQuery,
  type BookStore,
} from "@bookshelf/sdk";
import { writeLine, writeLines, type OutputStream } from "../lib/io.js";
import { printBooks } from "../lib/render.js";
import type { Prompter } from "../lib/prompt.js";

const COMMANDS = [
  "Commands:",
  "1. Add a book",
  "2. Delete a book",
  "3. Search for books",
  "4. Show all books",
  "5. Change book status",
  "6. Exit",
];

const SEARCH_CRITERIA = ["Search by:", "1. Title", "2. Author", "3. Year"];

export interface MenuOptions {
  /** Clock for the current-year bound on new books */
  now?: () => Date;
}

interface MenuContext {
  store: BookStore;
  prompter: Prompter;
  out: OutputStream;
  now: () => Date;
}

/**
 * Run the menu until the user exits or input ends
 */
export async function runMenu(
  store: BookStore,
  prompter: Prompter,
  out: OutputStream,
  options: MenuOptions = {}
): Promise<void> {
  const ctx: MenuContext = { store, prompter, out, now: options.now ?? (() => new Date()) };

  for (;;) {
    writeLines(out, COMMANDS);
    const choice = await prompter.ask("Choose a command: ");
    if (choice === null) {
      return;
    }

    switch (choice.trim()) {
      case "1":
        await report(ctx, () => addBook(ctx));
        break;
      case "2":
        await report(ctx, () => deleteBook(ctx));
        break;
      case "3":
        await searchBooks(ctx);
        break;
      case "4":
        printBooks(out, store.list(), { emptyMessage: "The library has no books." });
        break;
      case "5":
        await report(ctx, () => changeStatus(ctx));
        break;
      case "6":
        writeLine(out, "Goodbye.");
        return;
      default:
        writeLine(out, "Invalid choice. Please try again.");
    }
  }
}

/**
 * Run an action, printing the store errors a user can act on
 */
async function report(ctx: MenuContext, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (
      err instanceof NotFoundError ||
      err instanceof InvalidStatusError ||
      err instanceof PersistenceError ||
      err instanceof IdGenerationError
    ) {
      writeLine(ctx.out, `Error: ${err.message}`);
      return;
    }
    throw err;
  }
}

/**
 * Ask until the answer parses
 * @returns The parsed answer, or null once input has ended
 */
async function askValid<T>(
  ctx: MenuContext,
  question: string,
  parse: (raw: string) => T
): Promise<T | null> {
  for (;;) {
    const raw = await ctx.prompter.ask(question);
    if (raw === null) {
      return null;
    }
    try {
      return parse(raw);
    } catch (err) {
      if (!(err instanceof ValidationError)) {
        throw err;
      }
      writeLine(ctx.out, err.message);
    }
  }
}

async function addBook(ctx: MenuContext): Promise<void> {
  const title = await askValid(ctx, "Enter the title: ", (raw) => validateText(raw, "title"));
  if (title === null) return;

  const author = await askValid(ctx, "Enter the author: ", (raw) => validateText(raw, "author"));
  if (author === null) return;

  const year = await askValid(ctx, "Enter the publication year: ", (raw) =>
    parseYearText(raw, "year", ctx.now())
  );
  if (year === null) return;

  const book = await ctx.store.add({ title, author, year });
  writeLine(ctx.out, `Book "${book.title}" added with ID ${book.id}.`);
}

async function deleteBook(ctx: MenuContext): Promise<void> {
  const id = await ctx.prompter.ask("Enter the ID of the book to delete: ");
  if (id === null) return;

  const removed = await ctx.store.remove(id.trim());
  writeLine(ctx.out, `Book with ID ${removed.id} removed.`);
}

async function searchBooks(ctx: MenuContext): Promise<void> {
  const field = await askCriterion(ctx);
  if (field === null) return;

  const raw = await ctx.prompter.ask("Enter the search value: ");
  if (raw === null) return;

  const value = raw.trim();
  if (!value) {
    writeLine(ctx.out, "Error: the search value must not be empty.");
    return;
  }

  let query: BookQuery;
  if (field === "year") {
    try {
      query = { field, value: parseIntegerText(value, "year") };
    } catch (err) {
      if (!(err instanceof ValidationError)) {
        throw err;
      }
      writeLine(ctx.out, "Invalid year. Please enter a numeric value.");
      return;
    }
  } else {
    query = { field, value };
  }

  printBooks(ctx.out, ctx.store.find(query), { emptyMessage: "No books found." });
}

/**
 * Ask for a search criterion until a listed one is chosen
 * @returns The field to search, or null once input has ended
 */
async function askCriterion(ctx: MenuContext): Promise<BookQuery["field"] | null> {
  for (;;) {
    writeLines(ctx.out, SEARCH_CRITERIA);
    const choice = await ctx.prompter.ask("Enter the criterion number: ");
    if (choice === null) {
      return null;
    }
    switch (choice.trim()) {
      case "1":
        return "title";
      case "2":
        return "author";
      case "3":
        return "year";
      default:
        writeLine(ctx.out, "Invalid criterion.");
    }
  }
}

async function changeStatus(ctx: MenuContext): Promise<void> {
  const raw = await ctx.prompter.ask("Enter the ID of the book: ");
  if (raw === null) return;

  const id = raw.trim();
  if (!ctx.store.get(id)) {
    throw new NotFoundError(id);
  }

  const status = await ctx.prompter.ask(`Enter the new status (${BOOK_STATUSES.join("/")}): `);
  if (status === null) return;

  const updated = await ctx.store.changeStatus(id, status.trim());
  writeLine(ctx.out, `Status of book ${updated.id} changed to "${updated.status}".`);
}
