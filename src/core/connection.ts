/**
 * Connection: the event-loop handle of one SQLite connection.
 *
 * ```ts
 * const db = await connect(":memory:");
 * const cursor = await db.execute("SELECT 1, 2");
 * console.log(await cursor.fetchall()); // [[1, 2]]
 * await db.close();
 * ```
 */
import type { Worker } from "node:worker_threads";
import { z } from "zod";

import {
  clientOptions,
  parseConnectOptions,
  resolveDatabase,
  type ConnectOptions,
  type ConnectOptionsInput,
  type DatabaseTarget,
} from "../config.js";
import { Cursor } from "./cursor.js";
import { CursorRelease } from "./cursor-release.js";
import { Dispatcher, type ResultSchema } from "./dispatcher.js";
import { ConnectionClosedError, WorkerExitedError } from "./exceptions.js";
import { Logger } from "./logger.js";
import { CursorIdSchema, VoidSchema, type Operation } from "./protocol.js";
import { spawnWorker } from "./spawn.js";
import {
  RowIdSchema,
  RowsSchema,
  type BindParameters,
  type Row,
  type RowId,
} from "./types.js";

type ConnectionState = "opening" | "open" | "closing" | "closed" | "failed";

export class Connection implements AsyncDisposable {
  readonly database: string;
  readonly options: ConnectOptions;

  private readonly worker: Worker;
  private readonly dispatcher: Dispatcher;
  private readonly cursorRelease: CursorRelease;
  private readonly logger: Logger;
  private state: ConnectionState = "opening";
  private openFailure: unknown = null;
  private readonly opened: Promise<void>;
  private closing: Promise<void> | null = null;

  /**
   * Starts the worker and queues the open request; the handle is usable at
   * once, with every call queued behind the open.
   */
  private constructor(database: string, options: ConnectOptions) {
    this.database = database;
    this.options = options;
    this.logger = new Logger({ level: options.logLevel, scope: "connection" });
    this.worker = spawnWorker(options.logLevel);
    this.dispatcher = new Dispatcher(
      (request) => this.worker.postMessage(request),
      this.logger,
    );
    this.cursorRelease = new CursorRelease(this.dispatcher, this.logger);

    this.worker.on("message", (message: unknown) =>
      this.dispatcher.receive(message),
    );
    this.worker.on("error", (err: Error) => this.abort(null, err));
    this.worker.on("exit", (code: number) => this.abort(code));

    this.opened = this.openOnWorker();
  }

  /**
   * Return a handle right away; the database opens on the worker as the
   * first queued request. Await {@link Connection.ready} to observe the
   * outcome of the open.
   */
  static start(database: string, options: ConnectOptions): Connection {
    return new Connection(database, options);
  }

  /** Resolves once the database is open; rejects with the open failure. */
  async ready(): Promise<this> {
    await this.opened;
    if (this.state === "failed") throw this.openFailure;
    return this;
  }

  get closed(): boolean {
    return this.state === "closed" || this.state === "failed";
  }

  /** Rows per step when iterating a cursor with `for await`. */
  get iterChunkSize(): number {
    return this.options.iterChunkSize;
  }

  /**
   * Run one statement on a new cursor. Close the cursor when done with it;
   * one that is only dropped is closed on the worker after it is collected.
   */
  async execute(sql: string, params: BindParameters = []): Promise<Cursor> {
    const cursorId = await this.enqueue({ kind: "execute", sql, params }, CursorIdSchema);
    return this.adopt(cursorId);
  }

  async executemany(sql: string, seq: BindParameters[]): Promise<Cursor> {
    const cursorId = await this.enqueue(
      { kind: "executemany", sql, params: seq },
      CursorIdSchema,
    );
    return this.adopt(cursorId);
  }

  /** Run a script of `;`-separated statements. */
  async executescript(script: string): Promise<void> {
    await this.enqueue({ kind: "executescript", script }, VoidSchema);
  }

  /** Run a query and return all of its rows in one request. */
  async executeFetchall(sql: string, params: BindParameters = []): Promise<Row[]> {
    return this.enqueue({ kind: "executeFetchall", sql, params }, RowsSchema);
  }

  /** Run an INSERT and return the rowid of the inserted row. */
  async executeInsert(sql: string, params: BindParameters = []): Promise<RowId> {
    return this.enqueue({ kind: "executeInsert", sql, params }, RowIdSchema);
  }

  async cursor(): Promise<Cursor> {
    const cursorId = await this.enqueue({ kind: "cursor" }, CursorIdSchema);
    return this.adopt(cursorId);
  }

  async commit(): Promise<void> {
    await this.enqueue({ kind: "commit" }, VoidSchema);
  }

  async rollback(): Promise<void> {
    await this.enqueue({ kind: "rollback" }, VoidSchema);
  }

  async inTransaction(): Promise<boolean> {
    return this.enqueue({ kind: "inTransaction" }, z.boolean());
  }

  async loadExtension(path: string): Promise<void> {
    await this.enqueue({ kind: "loadExtension", path }, VoidSchema);
  }

  /**
   * Close the database once every request queued before this call has run,
   * then stop the worker. Calling it again is a no-op.
   */
  close(): Promise<void> {
    if (this.closing === null) this.closing = this.shutdown();
    return this.closing;
  }

  async [Symbol.asyncDispose](): Promise<void> {
    await this.close();
  }

  private adopt(cursorId: number): Cursor {
    return new Cursor(this, this.dispatcher, cursorId, this.cursorRelease);
  }

  private enqueue<T>(operation: Operation, schema: ResultSchema<T>): Promise<T> {
    return this.dispatcher.enqueue(operation, schema);
  }

  /** Never rejects: a failure is kept for `ready()` and `close()`. */
  private async openOnWorker(): Promise<void> {
    try {
      await this.enqueue(
        {
          kind: "open",
          database: this.database,
          options: clientOptions(this.options),
        },
        VoidSchema,
      );
      if (this.state === "opening") this.state = "open";
    } catch (err) {
      this.state = "failed";
      this.openFailure = err;
      this.dispatcher.shutdown(new ConnectionClosedError());
      await this.worker.terminate();
    }
  }

  private async shutdown(): Promise<void> {
    if (this.state === "failed") throw this.openFailure;
    // The worker died on its own; there is nothing left to close.
    if (this.state === "closed") return;

    // Queued like any other request, so it runs after everything already
    // submitted, including a pending open.
    this.state = "closing";
    try {
      await this.enqueue({ kind: "close" }, VoidSchema);
    } catch (err) {
      await this.opened;
      if (this.state === "failed") throw this.openFailure;
      this.logger.info("exception occurred while closing connection: %s", err);
      throw err;
    } finally {
      if (this.state !== "failed") this.state = "closed";
      this.dispatcher.shutdown(new ConnectionClosedError());
      await this.worker.terminate();
    }
  }

  /** The worker died on its own: fail everything still waiting on it. */
  private abort(exitCode: number | null, cause?: Error): void {
    if (this.closed) return;
    this.logger.error(
      "connection worker stopped unexpectedly (exit code %s)",
      exitCode,
      cause ?? "",
    );
    this.state = "closed";
    this.dispatcher.shutdown(new WorkerExitedError(exitCode, cause));
  }
}

/**
 * Open a connection to `database` (a path, `":memory:"`, a Buffer or a
 * `file:` URL). All work for the connection runs on its own worker thread.
 */
export async function connect(
  database: DatabaseTarget,
  options: ConnectOptionsInput = {},
): Promise<Connection> {
  return Connection.start(
    resolveDatabase(database),
    parseConnectOptions(options),
  ).ready();
}
