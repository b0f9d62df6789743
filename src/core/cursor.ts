/**
 * Cursor: handle of one client cursor living on the connection's worker.
 *
 * A cursor shares its connection's dispatcher, so its requests queue behind
 * every request the connection or its other cursors made before.
 */
import { z } from "zod";

import type { Connection } from "./connection.js";
import type { CursorRelease } from "./cursor-release.js";
import type { Dispatcher, ResultSchema } from "./dispatcher.js";
import { CursorClosedError } from "./exceptions.js";
import { VoidSchema, type Operation } from "./protocol.js";
import {
  ColumnDescriptionSchema,
  RowIdSchema,
  RowSchema,
  RowsSchema,
  type BindParameters,
  type ColumnDescription,
  type Row,
  type RowId,
} from "./types.js";

const RowOrNullSchema = RowSchema.nullable();
const DescriptionSchema = z.array(ColumnDescriptionSchema).nullable();

export class Cursor implements AsyncDisposable, AsyncIterable<Row> {
  /** Default size for {@link Cursor.fetchmany}. */
  arraysize = 1;

  private readonly _connection: Connection;
  private readonly dispatcher: Dispatcher;
  private readonly cursorId: number;
  private readonly cursorRelease: CursorRelease;
  private _closed = false;

  /**
   * @internal Created by {@link Connection}. A handle dropped without
   * `close()` has its worker cursor closed after it is garbage collected.
   */
  constructor(
    connection: Connection,
    dispatcher: Dispatcher,
    cursorId: number,
    cursorRelease: CursorRelease,
  ) {
    this._connection = connection;
    this.dispatcher = dispatcher;
    this.cursorId = cursorId;
    this.cursorRelease = cursorRelease;
    cursorRelease.track(this, cursorId);
  }

  get connection(): Connection {
    return this._connection;
  }

  get closed(): boolean {
    return this._closed;
  }

  async execute(sql: string, params: BindParameters = []): Promise<this> {
    await this.enqueue(
      { kind: "cursor.execute", cursorId: this.cursorId, sql, params },
      VoidSchema,
    );
    return this;
  }

  async executemany(sql: string, seq: BindParameters[]): Promise<this> {
    await this.enqueue(
      { kind: "cursor.executemany", cursorId: this.cursorId, sql, params: seq },
      VoidSchema,
    );
    return this;
  }

  /** The next row, or null when the result is exhausted. */
  async fetchone(): Promise<Row | null> {
    return this.enqueue(
      { kind: "cursor.fetchone", cursorId: this.cursorId },
      RowOrNullSchema,
    );
  }

  async fetchmany(size: number = this.arraysize): Promise<Row[]> {
    return this.enqueue(
      { kind: "cursor.fetchmany", cursorId: this.cursorId, size },
      RowsSchema,
    );
  }

  async fetchall(): Promise<Row[]> {
    return this.enqueue(
      { kind: "cursor.fetchall", cursorId: this.cursorId },
      RowsSchema,
    );
  }

  /** Rows changed by the last write statement; -1 after a query. */
  async rowcount(): Promise<number> {
    return this.enqueue(
      { kind: "cursor.attribute", cursorId: this.cursorId, name: "rowcount" },
      z.number().int(),
    );
  }

  async description(): Promise<ColumnDescription[] | null> {
    return this.enqueue(
      { kind: "cursor.attribute", cursorId: this.cursorId, name: "description" },
      DescriptionSchema,
    );
  }

  async lastrowid(): Promise<RowId> {
    return this.enqueue(
      { kind: "cursor.attribute", cursorId: this.cursorId, name: "lastrowid" },
      RowIdSchema,
    );
  }

  /**
   * Close the client cursor. A cursor whose connection is already closed
   * went away with it, so there is nothing left to send.
   */
  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    this.cursorRelease.untrack(this);
    if (this.dispatcher.closed) return;
    await this.dispatcher.enqueue(
      { kind: "cursor.close", cursorId: this.cursorId },
      VoidSchema,
    );
  }

  async [Symbol.asyncDispose](): Promise<void> {
    await this.close();
  }

  /**
   * Rows of the current result, fetched lazily. Each step is one request
   * (`fetchone`, or `fetchmany` when the connection's `iterChunkSize` is
   * above 1). Stops when the result is exhausted.
   */
  async *[Symbol.asyncIterator](): AsyncIterator<Row> {
    const chunkSize = this._connection.iterChunkSize;
    if (chunkSize === 1) {
      for (let row = await this.fetchone(); row !== null; row = await this.fetchone()) {
        yield row;
      }
      return;
    }
    for (;;) {
      const rows = await this.fetchmany(chunkSize);
      if (rows.length === 0) return;
      yield* rows;
    }
  }

  private enqueue<T>(operation: Operation, schema: ResultSchema<T>): Promise<T> {
    if (this._closed) return Promise.reject(new CursorClosedError());
    return this.dispatcher.enqueue(operation, schema);
  }
}
