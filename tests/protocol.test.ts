/**
 * Unit tests for request/response schemas and the failure codec.
 */
import { describe, test, expect } from "vitest";

import {
  ConnectionClosedError,
  CursorClosedError,
  ProgrammingError,
} from "../src/core/exceptions.js";
import {
  deserializeError,
  RequestSchema,
  ResponseSchema,
  serializeError,
  SqliteError,
  VoidSchema,
} from "../src/core/protocol.js";

function roundTrip(error: unknown): Error {
  return deserializeError(serializeError(error));
}

describe("failure codec", () => {
  test("SqliteError keeps class, message and code", () => {
    const restored = roundTrip(new SqliteError("no such table: t", "SQLITE_ERROR"));
    expect(restored).toBeInstanceOf(SqliteError);
    expect(restored.message).toBe("no such table: t");
    expect(restored).toMatchObject({ code: "SQLITE_ERROR" });
  });

  test("built-in errors keep their class", () => {
    expect(roundTrip(new TypeError("bad bind"))).toBeInstanceOf(TypeError);
    expect(roundTrip(new RangeError("too big"))).toBeInstanceOf(RangeError);
  });

  test("package errors keep their class and hierarchy", () => {
    const closed = roundTrip(new ConnectionClosedError());
    expect(closed).toBeInstanceOf(ConnectionClosedError);
    expect(closed).toBeInstanceOf(ProgrammingError);
    expect(closed.message).toBe("Connection closed");

    expect(roundTrip(new CursorClosedError())).toBeInstanceOf(CursorClosedError);
  });

  test("the remote stack is kept", () => {
    const original = new ProgrammingError("misuse");
    expect(roundTrip(original).stack).toBe(original.stack);
  });

  test("unknown classes come back as Error with the same name and code", () => {
    const custom = new Error("disk on fire");
    custom.name = "DiskError";
    Object.assign(custom, { code: "EFIRE" });

    const restored = roundTrip(custom);
    expect(restored.constructor).toBe(Error);
    expect(restored.name).toBe("DiskError");
    expect(restored.message).toBe("disk on fire");
    expect(restored).toMatchObject({ code: "EFIRE" });
  });

  test("non-Error values are stringified", () => {
    expect(serializeError("plain")).toEqual({ name: "Error", message: "plain" });
  });
});

describe("schemas", () => {
  test("requests accept known operations", () => {
    const parsed = RequestSchema.safeParse({
      id: 1,
      operation: { kind: "execute", sql: "SELECT ?", params: [1] },
    });
    expect(parsed.success).toBe(true);
  });

  test("requests reject unknown kinds and bad cursor ids", () => {
    expect(
      RequestSchema.safeParse({ id: 1, operation: { kind: "vacuum" } }).success,
    ).toBe(false);
    expect(
      RequestSchema.safeParse({
        id: 2,
        operation: { kind: "cursor.fetchone", cursorId: 0 },
      }).success,
    ).toBe(false);
  });

  test("responses carry either a value or an error", () => {
    expect(ResponseSchema.safeParse({ id: 3, ok: true, value: [1] }).success).toBe(true);
    expect(
      ResponseSchema.safeParse({
        id: 3,
        ok: false,
        error: { name: "Error", message: "x" },
      }).success,
    ).toBe(true);
    expect(ResponseSchema.safeParse({ id: 3, ok: false }).success).toBe(false);
  });

  test("VoidSchema maps null to undefined", () => {
    expect(VoidSchema.parse(null)).toBeUndefined();
    expect(() => VoidSchema.parse(1)).toThrow();
  });
});
