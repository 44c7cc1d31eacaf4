/**
 * Structured JSON-line logging
 *
 * Loggers are passed to the components that use them; there is no global instance.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Minimum level to emit; "silent" drops everything
 */
export type LogThreshold = LogLevel | "silent";

const LEVELS: readonly LogThreshold[] = ["debug", "info", "warn", "error", "silent"];

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  [key: string]: unknown;
}

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

/**
 * Anything with a `write(string)` method, e.g. process.stderr
 */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface JsonLineLoggerOptions {
  /** Minimum level to emit (default: "info") */
  level?: LogThreshold;
  /** Destination (default: process.stderr) */
  sink?: LogSink;
  /** Clock used for `ts` */
  now?: () => Date;
}

/**
 * Writes one JSON object per line: `{ ts, level, event, ...fields }`
 */
export class JsonLineLogger implements Logger {
  #minIndex: number;
  #sink: LogSink;
  #now: () => Date;

  constructor(options: JsonLineLoggerOptions = {}) {
    this.#minIndex = LEVELS.indexOf(options.level ?? "info");
    this.#sink = options.sink ?? process.stderr;
    this.#now = options.now ?? (() => new Date());
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= this.#minIndex;
  }

  #log(level: LogLevel, event: string, fields?: LogFields): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEvent = {
      ts: this.#now().toISOString(),
      level,
      event,
      ...fields,
    };

    this.#sink.write(JSON.stringify(entry) + "\n");
  }

  debug(event: string, fields?: LogFields): void {
    this.#log("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.#log("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.#log("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.#log("error", event, fields);
  }
}

/**
 * Logger that discards every event
 */
export const silentLogger: Logger = new JsonLineLogger({ level: "silent" });

/**
 * Parse a threshold name such as "debug" or "WARN"
 * @returns The threshold, or undefined if the value names none
 */
export function parseLogThreshold(value: string | undefined): LogThreshold | undefined {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized);
}
