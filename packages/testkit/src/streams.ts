/**
 * In-memory streams for running commands in process
 */

import { PassThrough, Writable } from "node:stream";

/**
 * Writable that keeps everything written to it
 */
export class MemoryStream extends Writable {
  #chunks: string[] = [];

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    this.#chunks.push(typeof chunk === "string" ? chunk : chunk.toString("utf-8"));
    callback();
  }

  /** Everything written so far */
  text(): string {
    return this.#chunks.join("");
  }

  /** Written text split into lines, without the trailing empty line */
  lines(): string[] {
    const text = this.text();
    return text === "" ? [] : text.replace(/\n$/, "").split("\n");
  }
}

/**
 * Readable stdin stand-in that can claim to be a terminal
 */
export class MemoryInput extends PassThrough {
  readonly isTTY: boolean;

  constructor(input: string, options: { tty?: boolean } = {}) {
    super();
    this.isTTY = options.tty ?? false;
    this.end(input);
  }
}

export interface MemoryIo {
  stdin: MemoryInput;
  stdout: MemoryStream;
  stderr: MemoryStream;
}

/**
 * Streams for one in-process run: stdin yields `input` then ends
 */
export function createMemoryIo(input = "", options: { tty?: boolean } = {}): MemoryIo {
  return {
    stdin: new MemoryInput(input, options),
    stdout: new MemoryStream(),
    stderr: new MemoryStream(),
  };
}
