/**
 * Output rendering helpers
 */

import type { Book } from "@bookshelf/sdk";
import { writeLine, type OutputStream } from "./io.js";

type Color = "red" | "green" | "yellow";

/**
 * One-line summary of a book
 */
export function formatBook(book: Book): string {
  return (
    `ID: ${book.id}, Title: ${book.title}, Author: ${book.author}, ` +
    `Year: ${book.year}, Status: ${book.status}`
  );
}

/**
 * Print JSON with 2-space indentation
 */
export function printJson(stream: OutputStream, data: unknown): void {
  writeLine(stream, JSON.stringify(data, null, 2));
}

/**
 * Print books one per line, as JSON, or a message when there are none
 */
export function printBooks(
  stream: OutputStream,
  books: readonly Book[],
  options: { json?: boolean; emptyMessage: string }
): void {
  if (options.json) {
    printJson(stream, books);
    return;
  }

  if (books.length === 0) {
    writeLine(stream, options.emptyMessage);
    return;
  }

  books.forEach((book) => writeLine(stream, formatBook(book)));
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(text: string, color: Color, stream: OutputStream): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
