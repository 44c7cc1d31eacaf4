import { describe, it, expect } from "vitest";
import { parseBooks, serializeBooks } from "./codec.js";
import { CorruptDataError } from "./errors.js";
import type { Book } from "./types.js";

const SOURCE = "/data/library.json";

const dune: Book = { id: "b1", title: "Dune", author: "Herbert", year: 1965, status: "available" };

function reasonFor(raw: string): string {
  try {
    parseBooks(raw, SOURCE);
  } catch (err) {
    if (err instanceof CorruptDataError) {
      return err.reason;
    }
    throw err;
  }
  throw new Error("expected parseBooks to fail");
}

describe("codec", () => {
  describe("serializeBooks", () => {
    it("should write keys in a fixed order", () => {
      const shuffled: Book = {
        status: "checked_out",
        year: 1815,
        author: "Austen",
        title: "Emma",
        id: "b2",
      };

      expect(serializeBooks([shuffled])).toBe(
        '[\n  {\n    "id": "b2",\n    "title": "Emma",\n    "author": "Austen",\n    "year": 1815,\n    "status": "checked_out"\n  }\n]\n'
      );
    });

    it("should write an empty list as an empty array", () => {
      expect(serializeBooks([])).toBe("[]\n");
    });
  });

  describe("parseBooks", () => {
    it("should parse the documented file format", () => {
      const raw =
        '[{"id":"b1","title":"Dune","author":"Herbert","year":1965,"status":"available"}]';

      expect(parseBooks(raw, SOURCE)).toEqual([dune]);
    });

    it("should read back what it writes", () => {
      const books: Book[] = [dune, { ...dune, id: "b2", status: "checked_out" }];

      expect(parseBooks(serializeBooks(books), SOURCE)).toEqual(books);
    });

    it("should ignore a leading BOM", () => {
      expect(parseBooks("\uFEFF[]", SOURCE)).toEqual([]);
    });

    it("should decode UTF-8 bytes and drop a BOM", () => {
      const bytes = Buffer.from(
        '\uFEFF[{"id":"b1","title":"Caf\u00e9","author":"Herbert","year":1965,"status":"available"}]',
        "utf-8"
      );

      expect(parseBooks(bytes, SOURCE)).toEqual([{ ...dune, title: "Caf\u00e9" }]);
    });

    it("should reject bytes that are not valid UTF-8", () => {
      const bytes = Buffer.concat([
        Buffer.from('[{"id":"b1","title":"Caf'),
        Buffer.from([0xe9]),
        Buffer.from('","author":"Herbert","year":1965,"status":"available"}]'),
      ]);

      expect(() => parseBooks(bytes, SOURCE)).toThrow(
        `Corrupt data in ${SOURCE}: invalid UTF-8`
      );
    });

    it("should report invalid JSON with the file path", () => {
      expect(() => parseBooks("{", SOURCE)).toThrow(CorruptDataError);
      expect(() => parseBooks("{", SOURCE)).toThrow(`Corrupt data in ${SOURCE}: invalid JSON (`);
    });

    it("should treat an empty file as corrupt", () => {
      expect(() => parseBooks("", SOURCE)).toThrow(CorruptDataError);
    });

    it("should require an array at the root", () => {
      expect(reasonFor('{"books":[]}')).toBe("root: Expected array, received object");
    });

    it("should reject an unknown status", () => {
      expect(reasonFor('[{"id":"b1","title":"Dune","author":"Herbert","year":1965,"status":"lost"}]')).toMatch(
        /^\[0\]\.status: /
      );
    });

    it("should reject a missing field", () => {
      expect(reasonFor('[{"id":"b1","title":"Dune","author":"Herbert","status":"available"}]')).toBe(
        "[0].year: Required"
      );
    });

    it("should reject a fractional year", () => {
      expect(reasonFor('[{"id":"b1","title":"Dune","author":"Herbert","year":1965.5,"status":"available"}]')).toMatch(
        /^\[0\]\.year: /
      );
    });

    it("should reject extra keys", () => {
      expect(
        reasonFor(
          '[{"id":"b1","title":"Dune","author":"Herbert","year":1965,"status":"available","isbn":"x"}]'
        )
      ).toBe("[0]: Unrecognized key(s) in object: 'isbn'");
    });

    it("should reject an empty id", () => {
      expect(reasonFor('[{"id":"","title":"Dune","author":"Herbert","year":1965,"status":"available"}]')).toMatch(
        /^\[0\]\.id: /
      );
    });

    it("should reject duplicate ids", () => {
      const raw = JSON.stringify([dune, { ...dune, title: "Copy" }]);

      expect(reasonFor(raw)).toBe('[1].id: duplicate id "b1"');
    });
  });
});
