import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { homedir } from "node:os";
import * as path from "node:path";
import { DEFAULT_LIBRARY_FILE, resolveLibraryFile, resolveLogThreshold } from "./env.js";

const KEYS = ["BOOKSHELF_FILE", "BOOKSHELF_LOG_LEVEL", "BOOKSHELF_DEBUG"] as const;

describe("environment resolution", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved.get(key);
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  describe("resolveLibraryFile", () => {
    it("should default to library.json in the working directory", () => {
      expect(resolveLibraryFile()).toBe(path.resolve(DEFAULT_LIBRARY_FILE));
    });

    it("should use BOOKSHELF_FILE when no option is given", () => {
      process.env.BOOKSHELF_FILE = "/data/books.json";
      expect(resolveLibraryFile()).toBe(path.resolve("/data/books.json"));
    });

    it("should prefer the command-line option over the environment", () => {
      process.env.BOOKSHELF_FILE = "/data/books.json";
      expect(resolveLibraryFile("/tmp/mine.json")).toBe(path.resolve("/tmp/mine.json"));
    });

    it("should resolve relative paths against the working directory", () => {
      expect(resolveLibraryFile("shelf/books.json")).toBe(
        path.join(process.cwd(), "shelf", "books.json")
      );
    });

    it("should expand a leading tilde", () => {
      expect(resolveLibraryFile("~/books.json")).toBe(path.join(homedir(), "books.json"));
      expect(resolveLibraryFile("~")).toBe(homedir());
    });
  });

  describe("resolveLogThreshold", () => {
    it("should default to warn", () => {
      expect(resolveLogThreshold()).toBe("warn");
    });

    it("should use debug under --verbose", () => {
      process.env.BOOKSHELF_LOG_LEVEL = "error";
      expect(resolveLogThreshold(true)).toBe("debug");
    });

    it("should use debug when BOOKSHELF_DEBUG is 1", () => {
      process.env.BOOKSHELF_DEBUG = "1";
      expect(resolveLogThreshold()).toBe("debug");
    });

    it("should read BOOKSHELF_LOG_LEVEL ignoring case", () => {
      process.env.BOOKSHELF_LOG_LEVEL = "INFO";
      expect(resolveLogThreshold()).toBe("info");
    });

    it("should fall back to warn on an unknown level", () => {
      process.env.BOOKSHELF_LOG_LEVEL = "loud";
      expect(resolveLogThreshold()).toBe("warn");
    });
  });
});
