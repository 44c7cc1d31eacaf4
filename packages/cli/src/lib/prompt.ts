/**
 * Line-based prompting for interactive commands
 */

import { createInterface, type Interface } from "node:readline/promises";
import type { InputStream, OutputStream } from "./io.js";

export interface Prompter {
  /**
   * Print a question and wait for one line of input
   * @returns The line without its newline, or null once input has ended
   */
  ask(question: string): Promise<string | null>;
}

/**
 * Prompter over a readline interface
 *
 * Lines are pulled from the interface's async iterator, so input that
 * arrives before a question is asked is kept for that question.
 */
export class LinePrompter implements Prompter {
  #rl: Interface;
  #lines: AsyncIterator<string>;
  #output: OutputStream;

  constructor(input: InputStream, output: OutputStream) {
    this.#rl = createInterface({ input, terminal: false });
    this.#lines = this.#rl[Symbol.asyncIterator]();
    this.#output = output;
  }

  async ask(question: string): Promise<string | null> {
    this.#output.write(question);
    const next = await this.#lines.next();
    return next.done ? null : next.value;
  }

  close(): void {
    this.#rl.close();
  }
}
