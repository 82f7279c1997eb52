/**
 * TallyDB command line program
 */

import { Command, CommanderError } from "commander";
import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  Database,
  MutableDocument,
  SaveConflictError,
  databaseExists,
  withDatabase,
  type DatabaseConfiguration,
} from "@tallydb/sdk";
import { parseNonNegativeInt, parseProperties } from "./lib/arg.js";
import { resolveDirectory } from "./lib/env.js";
import { CliError, EXIT_NOT_FOUND, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { readTextFile, type CliIO } from "./lib/io.js";
import { colorize, printJson, printLines } from "./lib/render.js";
import { withTiming } from "./lib/telemetry.js";

interface GlobalOptions {
  dir?: string;
  verbose?: boolean;
  quiet?: boolean;
  lockTimeout?: number;
}

interface PutOptions {
  file?: string;
  data?: string;
  expectSequence?: number;
}

/**
 * Version from the nearest package.json that belongs to this CLI
 */
function readVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (true) {
    const candidate = join(dir, "package.json");
    if (existsSync(candidate)) {
      const parsed: unknown = JSON.parse(readFileSync(candidate, "utf-8"));
      if (
        typeof parsed === "object" &&
        parsed !== null &&
        "name" in parsed &&
        (parsed.name === "@tallydb/cli" || parsed.name === "tallydb") &&
        "version" in parsed &&
        typeof parsed.version === "string"
      ) {
        return parsed.version;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return "0.0.0";
    }
    dir = parent;
  }
}

/**
 * Build the command tree; output goes through `io`
 */
export function createProgram(io: CliIO): Command {
  const program = new Command();

  // Settings below are inherited by every subcommand
  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(colorize(str, "red", io.stderrIsTTY)),
    })
    .exitOverride();

  program
    .name("tallydb")
    .description("TallyDB - embedded document database")
    .version(readVersion())
    .option("--dir <path>", "Directory holding the databases")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .option("--lock-timeout <ms>", "Wait this long for another process's lock", (value) =>
      parseNonNegativeInt(value, "--lock-timeout")
    );

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const configFor = (): DatabaseConfiguration => {
    const opts = globals();
    return {
      directory: resolveDirectory(opts.dir, io.env),
      lockTimeoutMs: opts.lockTimeout ?? 0,
    };
  };

  const say = (line: string): void => {
    if (!globals().quiet) {
      io.stdout(`${line}\n`);
    }
  };

  // Info command
  program
    .command("info <name>")
    .description("Show document count and sequence of a database")
    .option("--json", "Output as JSON")
    .action(async (name: string, options: { json?: boolean }) => {
      await withTiming(io, "cli.info", async () => {
        const config = configFor();
        if (!(await databaseExists(name, config.directory))) {
          throw new CliError(`Database not found: ${name}`, { exitCode: EXIT_NOT_FOUND });
        }

        const info = await withDatabase(name, config, (db) => ({
          name: db.name,
          path: db.path,
          count: db.count,
          lastSequence: db.lastSequence,
        }));

        if (options.json) {
          printJson(io, info, { raw: true });
        } else {
          printLines(io, [
            `Database: ${info.name}`,
            `Path: ${info.path}`,
            `Documents: ${info.count}`,
            `Last sequence: ${info.lastSequence}`,
          ]);
        }
      });
    });

  // Get command
  program
    .command("get <name> <id>")
    .description("Print a document")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (name: string, id: string, options: { raw?: boolean }) => {
      await withTiming(io, "cli.get", async () => {
        const doc = await withDatabase(name, configFor(), (db) => db.getDocument(id));

        if (doc === null) {
          throw new CliError(`Document not found: ${name}/${id}`, { exitCode: EXIT_NOT_FOUND });
        }

        printJson(io, doc.toJSON(), { raw: options.raw });
      });
    });

  // Put command
  program
    .command("put <name> <id>")
    .description("Store or replace a document")
    .option("--file <path>", "Read properties from a JSON file")
    .option("--data <json>", "Inline JSON properties")
    .option(
      "--expect-sequence <n>",
      "Only replace the document if it is still at this sequence (0 = must not exist)",
      (value) => parseNonNegativeInt(value, "--expect-sequence", Number.MAX_SAFE_INTEGER)
    )
    .action(async (name: string, id: string, options: PutOptions) => {
      await withTiming(io, "cli.put", async () => {
        if (options.file !== undefined && options.data !== undefined) {
          throw new CliError("Cannot use both --file and --data; choose one or use stdin");
        }

        let text: string;
        let source: string;
        if (options.file !== undefined) {
          text = await readTextFile(options.file);
          source = `file ${options.file}`;
        } else if (options.data !== undefined) {
          text = options.data;
          source = "--data";
        } else {
          if (io.stdinIsTTY) {
            throw new CliError("No input provided. Use --file, --data, or pipe JSON to stdin");
          }
          text = await io.readStdin();
          source = "stdin";
          if (!text.trim()) {
            throw new CliError("stdin is empty");
          }
        }

        const properties = parseProperties(text, source);

        const sequence = await withDatabase(name, configFor(), async (db) => {
          const doc = (await db.getMutableDocument(id)) ?? new MutableDocument(id);
          const expected = options.expectSequence;
          if (expected !== undefined && doc.sequence !== expected) {
            throw new SaveConflictError(id, expected, doc.sequence);
          }
          doc.setProperties(properties);
          await db.save(doc, {
            concurrency: expected === undefined ? "lastWriteWins" : "failOnConflict",
          });
          return doc.sequence;
        });

        say(`Saved ${name}/${id} at sequence ${sequence}`);
      });
    });

  // Delete command
  program
    .command("delete <name> <id>")
    .description("Delete a document")
    .action(async (name: string, id: string) => {
      await withTiming(io, "cli.delete", async () => {
        const deleted = await withDatabase(name, configFor(), (db) => db.deleteDocument(id));

        if (!deleted) {
          throw new CliError(`Document not found: ${name}/${id}`, { exitCode: EXIT_NOT_FOUND });
        }

        say(`Deleted ${name}/${id}`);
      });
    });

  // Compact command
  program
    .command("compact <name>")
    .description("Fold the journal of a database into its snapshot")
    .action(async (name: string) => {
      await withTiming(io, "cli.compact", async () => {
        await withDatabase(name, configFor(), (db) => db.compact());
        say(`Compacted ${name}`);
      });
    });

  // Destroy command
  program
    .command("destroy <name>")
    .description("Delete a database and all of its files")
    .option("--force", "Confirm deletion")
    .action(async (name: string, options: { force?: boolean }) => {
      await withTiming(io, "cli.destroy", async () => {
        if (!options.force) {
          throw new CliError("Use --force to confirm deleting a database");
        }

        await Database.deleteFile(name, configFor().directory);
        say(`Destroyed ${name}`);
      });
    });

  return program;
}

/**
 * Run the program on user arguments and return the exit code
 */
export async function run(argv: string[], io: CliIO): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already written its own errors, help and version text
    if (!(err instanceof CommanderError)) {
      const verbose = program.opts<GlobalOptions>().verbose ?? false;
      io.stderr(`${colorize(`Error: ${formatCliError(err, verbose)}`, "red", io.stderrIsTTY)}\n`);
    }
    return mapSdkErrorToExitCode(err);
  }
}
