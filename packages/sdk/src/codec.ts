/**
 * Persisted representation of the book list
 *
 * The file holds a JSON array of objects with exactly the keys
 * id, title, author, year and status, in store order.
 */

import { z } from "zod";
import { BOOK_STATUSES } from "./types.js";
import type { Book } from "./types.js";
import { CorruptDataError } from "./errors.js";

export const BookSchema = z
  .object({
    id: z.string().min(1),
    title: z.string(),
    author: z.string(),
    year: z.number().int(),
    status: z.enum(BOOK_STATUSES),
  })
  .strict();

export const LibrarySchema = z.array(BookSchema).superRefine((books, ctx) => {
  const seen = new Set<string>();
  books.forEach((book, index) => {
    if (seen.has(book.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "id"],
        message: `duplicate id "${book.id}"`,
      });
    }
    seen.add(book.id);
  });
});

/**
 * Serialize books to file text: 2-space indent, fixed key order, trailing newline
 */
export function serializeBooks(books: readonly Book[]): string {
  const records = books.map(({ id, title, author, year, status }) => ({
    id,
    title,
    author,
    year,
    status,
  }));
  return JSON.stringify(records, null, 2) + "\n";
}

/**
 * Decode file bytes as strict UTF-8; a leading BOM is dropped
 * @throws CorruptDataError on malformed byte sequences
 */
export function decodeDocument(bytes: Uint8Array, source: string): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new CorruptDataError(source, "invalid UTF-8", { cause: err });
  }
}

/**
 * Parse file contents into books
 * @param raw - File text, or the raw bytes as read from disk
 * @param source - Path reported in errors
 * @throws CorruptDataError if the contents are not a valid book list
 */
export function parseBooks(raw: string | Uint8Array, source: string): Book[] {
  const text = typeof raw === "string" ? raw : decodeDocument(raw, source);
  // Strip BOM if present
  const cleaned = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  let data: unknown;
  try {
    data = JSON.parse(cleaned);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CorruptDataError(source, `invalid JSON (${message})`, { cause: err });
  }

  const result = LibrarySchema.safeParse(data);
  if (!result.success) {
    throw new CorruptDataError(source, describeIssue(result.error.issues[0]), {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Render a zod issue as `[index].field: message`
 */
function describeIssue(issue: z.ZodIssue | undefined): string {
  if (!issue) {
    return "unexpected shape";
  }
  const where =
    issue.path.length === 0
      ? "root"
      : issue.path.map((part) => (typeof part === "number" ? `[${part}]` : `.${part}`)).join("");
  return `${where}: ${issue.message}`;
}
