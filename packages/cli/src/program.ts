/**
 * Command definitions for the bookshelf CLI
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { BOOK_STATUSES, JsonLineLogger, type BookQuery, type BookStore } from "@bookshelf/sdk";
import { openCliStore } from "./lib/store.js";
import { resolveLibraryFile, resolveLogThreshold } from "./lib/env.js";
import { parseInteger, parseText, parseYear } from "./lib/arg.js";
import { isStdinTTY, processIo, writeLine, type CliIo } from "./lib/io.js";
import { colorize, printBooks } from "./lib/render.js";
import { CliError, EXIT_CODES, formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";
import { LinePrompter } from "./lib/prompt.js";
import { runMenu } from "./commands/menu.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

interface GlobalOptions {
  file?: string;
  verbose?: boolean;
  quiet?: boolean;
}

interface FindOptions {
  title?: string;
  author?: string;
  year?: number;
  json?: boolean;
}

/**
 * Read the version from package.json
 */
function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (pkg !== null && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

/**
 * Turn the find options into a query; exactly one criterion is allowed
 */
export function toQuery(options: FindOptions): BookQuery {
  const queries: BookQuery[] = [];
  if (options.title !== undefined) {
    queries.push({ field: "title", value: options.title });
  }
  if (options.author !== undefined) {
    queries.push({ field: "author", value: options.author });
  }
  if (options.year !== undefined) {
    queries.push({ field: "year", value: options.year });
  }

  const [query] = queries;
  if (queries.length !== 1 || !query) {
    throw new CliError("Specify exactly one of --title, --author or --year");
  }
  return query;
}

/**
 * Build the command tree. Output goes to the given streams.
 */
export function createProgram(io: CliIo = processIo): Command {
  const program = new Command();

  program
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(colorize(str, "red", io.stderr)),
    })
    .exitOverride();

  program
    .name("bookshelf")
    .description("Bookshelf - a book catalog kept in a JSON file")
    .version(readVersion())
    .option("--file <path>", "Library file (default: $BOOKSHELF_FILE or ./library.json)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  /**
   * Load the library and run a command against it
   */
  async function withStore(
    label: string,
    fn: (store: BookStore, options: GlobalOptions) => Promise<void>
  ): Promise<void> {
    const options = program.opts<GlobalOptions>();
    const logger = new JsonLineLogger({
      level: resolveLogThreshold(options.verbose),
      sink: io.stderr,
    });

    await withTiming(label, logger, async () => {
      const store = await openCliStore(resolveLibraryFile(options.file), logger);
      await fn(store, options);
    });
  }

  async function confirmRemoval(id: string): Promise<void> {
    if (!isStdinTTY(io)) {
      throw new CliError("Use --force to confirm removal in non-interactive mode");
    }

    const prompter = new LinePrompter(io.stdin, io.stderr);
    try {
      const answer = (await prompter.ask(`Remove book ${id}? (y/N) `)) ?? "";
      if (answer.trim().toLowerCase() !== "y") {
        throw new CliError("Aborted by user");
      }
    } finally {
      prompter.close();
    }
  }

  // Add command
  program
    .command("add")
    .description("Add a book to the library")
    .argument("<title>", "Book title", (value: string) => parseText(value, "title"))
    .argument("<author>", "Book author", (value: string) => parseText(value, "author"))
    .argument("<year>", "Publication year", (value: string) => parseYear(value, "year"))
    .option("--status <status>", `Initial status (${BOOK_STATUSES.join(" or ")})`)
    .action(async (title: string, author: string, year: number, options: { status?: string }) => {
      await withStore("cli.add", async (store, globals) => {
        const book = await store.add({ title, author, year, status: options.status });

        if (!globals.quiet) {
          writeLine(io.stdout, `Book "${book.title}" added with ID ${book.id}.`);
        }
      });
    });

  // Remove command
  program
    .command("rm <id>")
    .description("Remove a book")
    .option("--force", "Remove without confirmation")
    .action(async (id: string, options: { force?: boolean }) => {
      if (!options.force) {
        await confirmRemoval(id);
      }

      await withStore("cli.rm", async (store, globals) => {
        const removed = await store.remove(id);

        if (!globals.quiet) {
          writeLine(io.stdout, `Book with ID ${removed.id} removed.`);
        }
      });
    });

  // List command
  program
    .command("ls")
    .description("List all books")
    .option("--json", "Output as JSON array")
    .action(async (options: { json?: boolean }) => {
      await withStore("cli.ls", async (store) => {
        printBooks(io.stdout, store.list(), {
          json: options.json,
          emptyMessage: "The library has no books.",
        });
      });
    });

  // Find command
  program
    .command("find")
    .description("Search books by title, author or year")
    .option("--title <text>", "Title contains text (ignoring case)", (value: string) =>
      parseText(value, "--title")
    )
    .option("--author <text>", "Author contains text (ignoring case)", (value: string) =>
      parseText(value, "--author")
    )
    .option("--year <year>", "Exact publication year", (value: string) =>
      parseInteger(value, "--year")
    )
    .option("--json", "Output as JSON array")
    .action(async (options: FindOptions) => {
      const query = toQuery(options);

      await withStore("cli.find", async (store) => {
        printBooks(io.stdout, store.find(query), {
          json: options.json,
          emptyMessage: "No books found.",
        });
      });
    });

  // Status command
  program
    .command("status <id> <status>")
    .description(`Change the status of a book (${BOOK_STATUSES.join(" or ")})`)
    .action(async (id: string, status: string) => {
      await withStore("cli.status", async (store, globals) => {
        const updated = await store.changeStatus(id, status);

        if (!globals.quiet) {
          writeLine(io.stdout, `Status of book ${updated.id} changed to "${updated.status}".`);
        }
      });
    });

  // Interactive menu
  program
    .command("menu")
    .description("Start the interactive menu")
    .action(async () => {
      await withStore("cli.menu", async (store) => {
        const prompter = new LinePrompter(io.stdin, io.stdout);
        try {
          await runMenu(store, prompter, io.stdout);
        } finally {
          prompter.close();
        }
      });
    });

  return program;
}

/**
 * Run the CLI with the given arguments (without the node and script paths)
 * @returns Process exit code
 */
export async function run(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync([...argv], { from: "user" });
    return EXIT_CODES.ok;
  } catch (err) {
    // Commander reports its own usage errors before throwing
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = program.opts<GlobalOptions>().verbose === true;
    writeLine(io.stderr, colorize(`Error: ${formatCliError(err, verbose)}`, "red", io.stderr));
    return mapErrorToExitCode(err);
  }
}
