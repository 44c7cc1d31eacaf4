/**
 * Single-field book search
 */

import type { Book, BookQuery } from "./types.js";

/**
 * Case-insensitive substring test
 */
function includesFolded(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

/**
 * Test whether a book matches a query
 * @returns true if the title/author contains the value (ignoring case) or the year is equal
 */
export function matches(book: Book, query: BookQuery): boolean {
  switch (query.field) {
    case "title":
      return includesFolded(book.title, query.value);
    case "author":
      return includesFolded(book.author, query.value);
    case "year":
      return book.year === query.value;
  }
}

/**
 * Filter books by a query, keeping their order
 */
export function filterBooks(books: readonly Book[], query: BookQuery): Book[] {
  return books.filter((book) => matches(book, query));
}
