/**
 * Messages exchanged between a connection's event-loop side and its worker.
 *
 * A request names one operation on the synchronous client; the worker
 * answers every request with exactly one response carrying the same id.
 */
import Database from "better-sqlite3";
import { z } from "zod";

import {
  ConnectionClosedError,
  CursorClosedError,
  ProgrammingError,
  ProtocolError,
} from "./exceptions.js";
import { LOG_LEVELS } from "./logger.js";
import {
  ClientBindParametersSchema,
  ClientOptionsSchema,
} from "./types.js";

export const SqliteError = Database.SqliteError;
export type SqliteError = InstanceType<typeof Database.SqliteError>;

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

const CursorId = z.number().int().positive();

export const OperationSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("open"),
    database: z.string(),
    options: ClientOptionsSchema,
  }),
  z.object({ kind: z.literal("close") }),
  z.object({ kind: z.literal("commit") }),
  z.object({ kind: z.literal("rollback") }),
  z.object({ kind: z.literal("cursor") }),
  z.object({
    kind: z.literal("execute"),
    sql: z.string(),
    params: ClientBindParametersSchema,
  }),
  z.object({
    kind: z.literal("executemany"),
    sql: z.string(),
    params: z.array(ClientBindParametersSchema),
  }),
  z.object({ kind: z.literal("executescript"), script: z.string() }),
  z.object({
    kind: z.literal("executeFetchall"),
    sql: z.string(),
    params: ClientBindParametersSchema,
  }),
  z.object({
    kind: z.literal("executeInsert"),
    sql: z.string(),
    params: ClientBindParametersSchema,
  }),
  z.object({ kind: z.literal("inTransaction") }),
  z.object({ kind: z.literal("loadExtension"), path: z.string() }),
  z.object({
    kind: z.literal("cursor.execute"),
    cursorId: CursorId,
    sql: z.string(),
    params: ClientBindParametersSchema,
  }),
  z.object({
    kind: z.literal("cursor.executemany"),
    cursorId: CursorId,
    sql: z.string(),
    params: z.array(ClientBindParametersSchema),
  }),
  z.object({ kind: z.literal("cursor.fetchone"), cursorId: CursorId }),
  z.object({
    kind: z.literal("cursor.fetchmany"),
    cursorId: CursorId,
    size: z.number().int().nonnegative(),
  }),
  z.object({ kind: z.literal("cursor.fetchall"), cursorId: CursorId }),
  z.object({
    kind: z.literal("cursor.attribute"),
    cursorId: CursorId,
    name: z.enum(["rowcount", "description", "lastrowid"]),
  }),
  z.object({ kind: z.literal("cursor.close"), cursorId: CursorId }),
]);
export type Operation = z.infer<typeof OperationSchema>;
export type OperationKind = Operation["kind"];

export const CursorIdSchema = CursorId;

export const RequestSchema = z.object({
  id: z.number().int().positive(),
  operation: OperationSchema,
});
export type Request = z.infer<typeof RequestSchema>;

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export const SerializedErrorSchema = z.object({
  name: z.string(),
  message: z.string(),
  code: z.string().optional(),
  stack: z.string().optional(),
});
export type SerializedError = z.infer<typeof SerializedErrorSchema>;

export const ResponseSchema = z.discriminatedUnion("ok", [
  z.object({ id: z.number().int(), ok: z.literal(true), value: z.unknown() }),
  z.object({
    id: z.number().int(),
    ok: z.literal(false),
    error: SerializedErrorSchema,
  }),
]);
export type Response = z.infer<typeof ResponseSchema>;

export const WorkerDataSchema = z.object({
  logLevel: z.enum(LOG_LEVELS),
});
export type WorkerData = z.infer<typeof WorkerDataSchema>;

/** Schema for operations that resolve to nothing. */
export const VoidSchema = z.null().transform((): void => undefined);

// ---------------------------------------------------------------------------
// Failure codec
// ---------------------------------------------------------------------------

type Rebuild = (message: string, code: string | undefined) => Error;

const REBUILDERS = new Map<string, Rebuild>([
  ["SqliteError", (message, code) => new SqliteError(message, code ?? "SQLITE_ERROR")],
  ["TypeError", (message) => new TypeError(message)],
  ["RangeError", (message) => new RangeError(message)],
  ["ProgrammingError", (message) => new ProgrammingError(message)],
  ["ConnectionClosedError", (message) => new ConnectionClosedError(message)],
  ["CursorClosedError", (message) => new CursorClosedError(message)],
  ["ProtocolError", (message) => new ProtocolError(message)],
]);

export function serializeError(error: unknown): SerializedError {
  if (!(error instanceof Error)) {
    return { name: "Error", message: String(error) };
  }
  const serialized: SerializedError = {
    name: error.name,
    message: error.message,
  };
  if ("code" in error && typeof error.code === "string") {
    serialized.code = error.code;
  }
  if (error.stack !== undefined) {
    serialized.stack = error.stack;
  }
  return serialized;
}

/**
 * Rebuild a failure on the receiving thread as an instance of its original
 * class. Unknown classes come back as a plain Error carrying the same name.
 */
export function deserializeError(data: SerializedError): Error {
  const rebuild = REBUILDERS.get(data.name);
  let error: Error;
  if (rebuild) {
    error = rebuild(data.message, data.code);
  } else {
    error = new Error(data.message);
    error.name = data.name;
    if (data.code !== undefined) Object.assign(error, { code: data.code });
  }
  if (data.stack !== undefined) error.stack = data.stack;
  return error;
}
