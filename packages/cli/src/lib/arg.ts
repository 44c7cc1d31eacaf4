/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { ValidationError, parseIntegerText, parseYearText, validateText } from "@bookshelf/sdk";

/**
 * Re-throw SDK validation failures as commander argument errors
 */
function asArgumentError<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
}

/**
 * Parse a required, non-blank text argument
 */
export function parseText(value: string, name: string): string {
  return asArgumentError(() => validateText(value, name));
}

/**
 * Parse a publication year (1 to the current year)
 */
export function parseYear(value: string, name: string, now: Date = new Date()): number {
  return asArgumentError(() => parseYearText(value, name, now));
}

/**
 * Parse any integer, e.g. a year to search for
 */
export function parseInteger(value: string, name: string): number {
  return asArgumentError(() => parseIntegerText(value, name));
}
