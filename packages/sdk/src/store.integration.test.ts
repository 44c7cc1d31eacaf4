/**
 * Integration tests: store lifecycles across save and load
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadBookStore } from "./store.js";

describe("BookStore persistence", () => {
  let testDir: string;
  let file: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "bookshelf-it-"));
    file = join(testDir, "nested", "library.json");
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("should reload exactly what was saved, in order", async () => {
    const store = await loadBookStore({ file });
    await store.add({ title: "Мастер и Маргарита", author: "Булгаков", year: 1967 });
    await store.add({ title: "Dune", author: "Herbert", year: 1965, status: "checked_out" });
    await store.add({ title: "Emma", author: "Austen", year: 1815 });
    await store.changeStatus(store.list()[2].id, "checked_out");

    const reopened = await loadBookStore({ file });

    expect(reopened.list()).toEqual(store.list());
  });

  it("should keep non-ASCII text readable in the file", async () => {
    const store = await loadBookStore({ file });
    await store.add({ title: "Мастер и Маргарита", author: "Булгаков", year: 1967 });

    const content = await readFile(file, "utf-8");
    expect(content).toContain('"title": "Мастер и Маргарита"');
  });

  it("should leave only the surviving book after add, add, remove", async () => {
    const store = await loadBookStore({ file });
    const a = await store.add({ title: "A", author: "B", year: 2000 });
    const c = await store.add({ title: "C", author: "D", year: 2001 });
    await store.remove(a.id);

    const found = store.findByYear(2001);
    expect(found).toHaveLength(1);
    expect(found[0].title).toBe("C");

    const onDisk = JSON.parse(await readFile(file, "utf-8"));
    expect(onDisk).toEqual([
      { id: c.id, title: "C", author: "D", year: 2001, status: "available" },
    ]);
  });

  it("should find by year exactly one of two neighbouring years", async () => {
    const store = await loadBookStore({ file });
    await store.add({ title: "Dune", author: "Herbert", year: 1965 });
    await store.add({ title: "Other", author: "Someone", year: 1966 });

    const reopened = await loadBookStore({ file });
    expect(reopened.findByYear(1965).map((book) => book.title)).toEqual(["Dune"]);
  });

  it("should not reuse an id held by a loaded book", async () => {
    const first = await loadBookStore({ file, generateId: () => "b1" });
    await first.add({ title: "A", author: "B", year: 2000 });

    const ids = ["b1", "b2"];
    const second = await loadBookStore({ file, generateId: () => ids.shift() ?? "unused" });
    const book = await second.add({ title: "C", author: "D", year: 2001 });

    expect(book.id).toBe("b2");
  });
});
