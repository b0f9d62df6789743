/**
 * Unit tests for the event-loop side of the request queue.
 */
import { describe, test, expect } from "vitest";
import { z } from "zod";

import { Dispatcher } from "../src/core/dispatcher.js";
import {
  ConnectionClosedError,
  ProtocolError,
  WorkerExitedError,
} from "../src/core/exceptions.js";
import { Logger } from "../src/core/logger.js";
import {
  serializeError,
  SqliteError,
  VoidSchema,
  type Request,
} from "../src/core/protocol.js";
import { RowsSchema } from "../src/core/types.js";

function makeDispatcher() {
  const posted: Request[] = [];
  const lines: string[] = [];
  const logger = new Logger({
    level: "debug",
    stdout: (line) => lines.push(line),
    stderr: (line) => lines.push(line),
  });
  const dispatcher = new Dispatcher((request) => posted.push(request), logger);
  return { dispatcher, posted, lines };
}

describe("Dispatcher", () => {
  test("posts requests with increasing ids", () => {
    const { dispatcher, posted } = makeDispatcher();
    void dispatcher.enqueue({ kind: "commit" }, VoidSchema);
    void dispatcher.enqueue({ kind: "rollback" }, VoidSchema);
    expect(posted).toEqual([
      { id: 1, operation: { kind: "commit" } },
      { id: 2, operation: { kind: "rollback" } },
    ]);
    expect(dispatcher.pending).toBe(2);
  });

  test("resolves with the validated value", async () => {
    const { dispatcher } = makeDispatcher();
    const rows = dispatcher.enqueue(
      { kind: "cursor.fetchall", cursorId: 1 },
      RowsSchema,
    );
    dispatcher.receive({ id: 1, ok: true, value: [[1], [2]] });
    await expect(rows).resolves.toEqual([[1], [2]]);
    expect(dispatcher.pending).toBe(0);
  });

  test("responses settle their own request regardless of order", async () => {
    const { dispatcher } = makeDispatcher();
    const first = dispatcher.enqueue({ kind: "inTransaction" }, z.boolean());
    const second = dispatcher.enqueue({ kind: "inTransaction" }, z.boolean());
    dispatcher.receive({ id: 2, ok: true, value: false });
    dispatcher.receive({ id: 1, ok: true, value: true });
    await expect(first).resolves.toBe(true);
    await expect(second).resolves.toBe(false);
  });

  test("rejects with the rebuilt failure", async () => {
    const { dispatcher } = makeDispatcher();
    const result = dispatcher.enqueue({ kind: "commit" }, VoidSchema);
    dispatcher.receive({
      id: 1,
      ok: false,
      error: serializeError(new SqliteError("database is locked", "SQLITE_BUSY")),
    });
    await expect(result).rejects.toBeInstanceOf(SqliteError);
    await expect(result).rejects.toMatchObject({ code: "SQLITE_BUSY" });
  });

  test("rejects a value that does not match the schema", async () => {
    const { dispatcher } = makeDispatcher();
    const result = dispatcher.enqueue({ kind: "inTransaction" }, z.boolean());
    dispatcher.receive({ id: 1, ok: true, value: "yes" });
    await expect(result).rejects.toBeInstanceOf(ProtocolError);
  });

  test("drops responses nobody awaits", () => {
    const { dispatcher, lines } = makeDispatcher();
    dispatcher.receive({ id: 99, ok: true, value: null });
    expect(lines).toEqual(["[sqlbridge] DEBUG no listener for response 99"]);
  });

  test("drops malformed responses", () => {
    const { dispatcher, lines } = makeDispatcher();
    dispatcher.receive("garbage");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[sqlbridge\] ERROR discarding malformed response: /);
  });

  test("shutdown rejects outstanding and later requests", async () => {
    const { dispatcher, posted } = makeDispatcher();
    const outstanding = dispatcher.enqueue({ kind: "commit" }, VoidSchema);
    dispatcher.shutdown(new WorkerExitedError(1));
    dispatcher.shutdown(new ConnectionClosedError());

    await expect(outstanding).rejects.toBeInstanceOf(WorkerExitedError);
    await expect(
      dispatcher.enqueue({ kind: "rollback" }, VoidSchema),
    ).rejects.toBeInstanceOf(WorkerExitedError);
    expect(posted).toHaveLength(1);
    expect(dispatcher.closed).toBe(true);
  });

  test("a failed post rejects and is not left pending", async () => {
    const logger = new Logger({ level: "silent" });
    const dispatcher = new Dispatcher(() => {
      throw new Error("port closed");
    }, logger);
    await expect(
      dispatcher.enqueue({ kind: "commit" }, VoidSchema),
    ).rejects.toThrow("port closed");
    expect(dispatcher.pending).toBe(0);
  });
});
