import { describe, it, expect } from "vitest";
import { MemoryInput, MemoryStream } from "@bookshelf/testkit";
import { LinePrompter } from "./prompt.js";

describe("LinePrompter", () => {
  it("should answer each question with the next line", async () => {
    const out = new MemoryStream();
    const prompter = new LinePrompter(new MemoryInput("first\nsecond\n"), out);

    try {
      expect(await prompter.ask("A? ")).toBe("first");
      expect(await prompter.ask("B? ")).toBe("second");
      expect(await prompter.ask("C? ")).toBeNull();
    } finally {
      prompter.close();
    }

    expect(out.text()).toBe("A? B? C? ");
  });

  it("should return a final line without a newline", async () => {
    const prompter = new LinePrompter(new MemoryInput("last"), new MemoryStream());

    try {
      expect(await prompter.ask("? ")).toBe("last");
      expect(await prompter.ask("? ")).toBeNull();
    } finally {
      prompter.close();
    }
  });
});
