import { describe, it, expect } from "vitest";
import {
  isBookStatus,
  validateStatus,
  validateText,
  validateYear,
  parseYearText,
  parseIntegerText,
} from "./validation.js";
import { InvalidStatusError, ValidationError } from "./errors.js";

// Mid-year, local time, so getFullYear() is 2024 in every timezone
const NOW = new Date(2024, 5, 15);

describe("validation", () => {
  describe("status", () => {
    it("should accept the two allowed statuses", () => {
      expect(isBookStatus("available")).toBe(true);
      expect(isBookStatus("checked_out")).toBe(true);
      expect(validateStatus("checked_out")).toBe("checked_out");
    });

    it("should reject anything else", () => {
      expect(isBookStatus("Available")).toBe(false);
      expect(isBookStatus(1)).toBe(false);
      expect(() => validateStatus("bogus")).toThrow(InvalidStatusError);
      expect(() => validateStatus("bogus")).toThrow(
        'Invalid status "bogus". Allowed statuses: "available", "checked_out"'
      );
    });
  });

  describe("validateText", () => {
    it("should return the trimmed value", () => {
      expect(validateText("  Dune ", "title")).toBe("Dune");
    });

    it("should reject blank input", () => {
      expect(() => validateText("   ", "title")).toThrow(ValidationError);
      expect(() => validateText("", "author")).toThrow("author must not be empty");
    });
  });

  describe("validateYear", () => {
    it("should accept 1 through the current year", () => {
      expect(validateYear(1, "year", NOW)).toBe(1);
      expect(validateYear(2024, "year", NOW)).toBe(2024);
    });

    it("should reject zero, negatives and fractions", () => {
      expect(() => validateYear(0, "year", NOW)).toThrow(
        "year must be a positive whole number, got 0"
      );
      expect(() => validateYear(-3, "year", NOW)).toThrow(ValidationError);
      expect(() => validateYear(1999.5, "year", NOW)).toThrow(ValidationError);
    });

    it("should reject future years", () => {
      expect(() => validateYear(2025, "year", NOW)).toThrow(
        "year must not be later than 2024, got 2025"
      );
    });
  });

  describe("parseYearText", () => {
    it("should parse digits", () => {
      expect(parseYearText(" 1965 ", "year", NOW)).toBe(1965);
    });

    it("should reject non-digit text", () => {
      expect(() => parseYearText("abc", "year", NOW)).toThrow(
        'year must be a positive whole number, got "abc"'
      );
      expect(() => parseYearText("-5", "year", NOW)).toThrow(ValidationError);
      expect(() => parseYearText("19.5", "year", NOW)).toThrow(ValidationError);
    });

    it("should apply the year bounds", () => {
      expect(() => parseYearText("0", "year", NOW)).toThrow(ValidationError);
      expect(() => parseYearText("2030", "year", NOW)).toThrow("must not be later than 2024");
    });
  });

  describe("parseIntegerText", () => {
    it("should parse signed integers", () => {
      expect(parseIntegerText("1965", "year")).toBe(1965);
      expect(parseIntegerText(" -12 ", "year")).toBe(-12);
    });

    it("should reject other text", () => {
      expect(() => parseIntegerText("1965a", "year")).toThrow(
        'year must be a whole number, got "1965a"'
      );
    });
  });
});
