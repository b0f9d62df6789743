/**
 * Connection options: validation, defaults, and the database target.
 */
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { LOG_LEVELS, resolveLogLevel } from "./core/logger.js";
import type { ClientOptions } from "./core/types.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

export const ConnectOptionsSchema = z.object({
  /** Open the database read-only. */
  readonly: z.boolean().default(false),
  /** Fail instead of creating a missing database file. */
  fileMustExist: z.boolean().default(false),
  /** Milliseconds to wait on a locked database before SQLITE_BUSY. */
  timeout: z.number().int().nonnegative().default(5000),
  /** Return INTEGER columns as bigint. */
  safeIntegers: z.boolean().default(false),
  rowMode: z.enum(["array", "object"]).default("array"),
  /** null keeps SQLite's autocommit; a level opens a transaction before writes. */
  isolationLevel: z
    .enum(["DEFERRED", "IMMEDIATE", "EXCLUSIVE"])
    .nullable()
    .default(null),
  /** Pragmas set right after opening, e.g. `{ journal_mode: "WAL" }`. */
  pragmas: z.record(z.union([z.string(), z.number()])).default({}),
  /** Rows fetched per step of `for await` over a cursor. */
  iterChunkSize: z.number().int().positive().default(1),
  logLevel: z
    .enum(LOG_LEVELS)
    .default(() => resolveLogLevel(process.env.SQLBRIDGE_LOG_LEVEL)),
});

export type ConnectOptions = z.infer<typeof ConnectOptionsSchema>;
export type ConnectOptionsInput = z.input<typeof ConnectOptionsSchema>;

/** A database path, its UTF-8 bytes, or a `file:` URL. */
export type DatabaseTarget = string | Buffer | URL;

export function parseConnectOptions(
  raw: ConnectOptionsInput = {},
): ConnectOptions {
  return ConnectOptionsSchema.parse(raw);
}

/** The part of the options the SQLite client receives. */
export function clientOptions(options: ConnectOptions): ClientOptions {
  return {
    readonly: options.readonly,
    fileMustExist: options.fileMustExist,
    timeout: options.timeout,
    safeIntegers: options.safeIntegers,
    rowMode: options.rowMode,
    isolationLevel: options.isolationLevel,
    pragmas: options.pragmas,
  };
}

export function resolveDatabase(target: DatabaseTarget): string {
  if (typeof target === "string") return target;
  if (target instanceof URL) return fileURLToPath(target);
  return target.toString("utf8");
}
