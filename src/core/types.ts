/**
 * Value types that cross the thread boundary, with their zod schemas.
 */
import { z } from "zod";

/** A value SQLite can bind or return. Blobs arrive as Uint8Array. */
export const SqlValueSchema = z.union([
  z.number(),
  z.bigint(),
  z.string(),
  z.instanceof(Uint8Array),
  z.null(),
]);
export type SqlValue = z.infer<typeof SqlValueSchema>;

/** Positional (`?`) or named (`:name`, `@name`, `$name`) parameters. */
export const BindParametersSchema = z.union([
  z.array(SqlValueSchema),
  z.record(SqlValueSchema),
]);
export type BindParameters = z.infer<typeof BindParametersSchema>;

/**
 * Parameters as they travel to the client. Values are not checked here:
 * the client rejects what it cannot bind with its own TypeError.
 */
export const ClientBindParametersSchema = z.union([
  z.array(z.unknown()),
  z.record(z.unknown()),
]);
export type ClientBindParameters = z.infer<typeof ClientBindParametersSchema>;

/** A result row: column values in order, or keyed by column name. */
export const RowSchema = z.union([
  z.array(SqlValueSchema),
  z.record(SqlValueSchema),
]);
export type Row = z.infer<typeof RowSchema>;

export const RowsSchema = z.array(RowSchema);

export const ColumnDescriptionSchema = z.object({
  name: z.string(),
  column: z.string().nullable(),
  table: z.string().nullable(),
  database: z.string().nullable(),
  type: z.string().nullable(),
});
export type ColumnDescription = z.infer<typeof ColumnDescriptionSchema>;

export const RowIdSchema = z.union([z.number(), z.bigint()]).nullable();
export type RowId = z.infer<typeof RowIdSchema>;

export type RowMode = "array" | "object";

export type IsolationLevel = "DEFERRED" | "IMMEDIATE" | "EXCLUSIVE";

/** Options handed to the synchronous client when the connection opens. */
export const ClientOptionsSchema = z.object({
  readonly: z.boolean(),
  fileMustExist: z.boolean(),
  timeout: z.number().int().nonnegative(),
  safeIntegers: z.boolean(),
  rowMode: z.enum(["array", "object"]),
  isolationLevel: z.enum(["DEFERRED", "IMMEDIATE", "EXCLUSIVE"]).nullable(),
  pragmas: z.record(z.union([z.string(), z.number()])),
});
export type ClientOptions = z.infer<typeof ClientOptionsSchema>;
