/**
 * Validation utilities for book fields
 */

import { BOOK_STATUSES } from "./types.js";
import type { BookStatus } from "./types.js";
import { InvalidStatusError, ValidationError } from "./errors.js";

const DIGITS_PATTERN = /^\d+$/;
const SIGNED_INTEGER_PATTERN = /^-?\d+$/;

/**
 * Check whether a value is one of the allowed statuses
 */
export function isBookStatus(value: unknown): value is BookStatus {
  return BOOK_STATUSES.some((status) => status === value);
}

/**
 * Validate a status value
 * @throws InvalidStatusError if the value is not an allowed status
 */
export function validateStatus(value: string): BookStatus {
  if (!isBookStatus(value)) {
    throw new InvalidStatusError(value);
  }
  return value;
}

/**
 * Validate a required text field
 * @param value - Raw input
 * @param label - Field name for error messages
 * @returns The trimmed value
 * @throws ValidationError if the value is empty after trimming
 */
export function validateText(value: string, label: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ValidationError(`${label} must not be empty`);
  }
  return trimmed;
}

/**
 * Validate a publication year: a whole number from 1 to the current year
 * @param year - Year to check
 * @param label - Field name for error messages
 * @param now - Reference date for the current year
 * @throws ValidationError if the year is out of range
 */
export function validateYear(year: number, label = "year", now: Date = new Date()): number {
  if (!Number.isInteger(year) || year < 1) {
    throw new ValidationError(`${label} must be a positive whole number, got ${year}`);
  }

  const currentYear = now.getFullYear();
  if (year > currentYear) {
    throw new ValidationError(`${label} must not be later than ${currentYear}, got ${year}`);
  }

  return year;
}

/**
 * Parse and validate a publication year typed by a user
 * @throws ValidationError if the text is not a valid year
 */
export function parseYearText(raw: string, label = "year", now: Date = new Date()): number {
  const trimmed = raw.trim();
  if (!DIGITS_PATTERN.test(trimmed)) {
    throw new ValidationError(`${label} must be a positive whole number, got "${trimmed}"`);
  }
  return validateYear(Number.parseInt(trimmed, 10), label, now);
}

/**
 * Parse an integer typed by a user (no range check)
 * @throws ValidationError if the text is not an integer
 */
export function parseIntegerText(raw: string, label: string): number {
  const trimmed = raw.trim();
  if (!SIGNED_INTEGER_PATTERN.test(trimmed)) {
    throw new ValidationError(`${label} must be a whole number, got "${trimmed}"`);
  }
  return Number.parseInt(trimmed, 10);
}
