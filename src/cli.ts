#!/usr/bin/env node
/**
 * CLI entrypoint for sqlbridge.
 *
 * Usage:
 *   sqlbridge app.db "CREATE TABLE t(x)" "INSERT INTO t VALUES (1)" "SELECT * FROM t"
 */
import { parseArgs } from "node:util";

import { connect } from "./core/connection.js";
import { withResource } from "./core/scope.js";

const USAGE = `
sqlbridge - run SQL against a SQLite database

Usage:
  sqlbridge <database> <sql> [<sql> ...]

Each statement runs in order on one connection. Queries print one JSON
object per row; other statements print the number of affected rows.

Options:
  --readonly   Open the database read-only
  --help       Show this help
`.trim();

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (typeof v === "bigint") return v.toString();
    if (v instanceof Uint8Array) return Buffer.from(v).toString("base64");
    return v;
  });
}

function parseCliArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      readonly: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
    strict: true,
  });
}

/** Run the CLI with `args` (without the node and script paths); returns the exit code. */
export async function runCli(
  args: string[],
  output: CliOutput = consoleOutput,
): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(args);
  } catch (err) {
    output.err(err instanceof Error ? err.message : String(err));
    output.err(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    output.out(USAGE);
    return 0;
  }

  const [database, ...statements] = positionals;
  if (database === undefined || statements.length === 0) {
    output.err(USAGE);
    return 1;
  }

  try {
    await withResource(
      connect(database, { readonly: values.readonly, rowMode: "object" }),
      async (db) => {
        for (const sql of statements) {
          await withResource(db.execute(sql), async (cursor) => {
            if ((await cursor.description()) === null) {
              const count = await cursor.rowcount();
              output.out(`${count} row(s) affected`);
              return;
            }
            for await (const row of cursor) output.out(toJson(row));
          });
        }
      },
    );
  } catch (err) {
    output.err(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    return 1;
  }
  return 0;
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
