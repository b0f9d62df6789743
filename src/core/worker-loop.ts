/**
 * The worker side of a connection.
 *
 * Requests arrive on a MessagePort and are handled one at a time, in
 * arrival order. Each handler runs synchronously against the client, so no
 * two requests ever overlap and nothing but this thread touches the client.
 */
import type { MessagePort } from "node:worker_threads";

import type { Connector, SyncConnection, SyncCursor } from "../db/backend.js";
import {
  ConnectionClosedError,
  CursorClosedError,
  ProgrammingError,
  ProtocolError,
} from "./exceptions.js";
import type { Logger } from "./logger.js";
import {
  RequestSchema,
  serializeError,
  type Operation,
  type Response,
} from "./protocol.js";

export class WorkerLoop {
  private readonly port: MessagePort;
  private readonly connect: Connector;
  private readonly logger: Logger;
  private connection: SyncConnection | null = null;
  private readonly cursors = new Map<number, SyncCursor>();
  private nextCursorId = 1;
  private running = true;

  constructor(port: MessagePort, connect: Connector, logger: Logger) {
    this.port = port;
    this.connect = connect;
    this.logger = logger;
  }

  get stopped(): boolean {
    return !this.running;
  }

  /** Client cursors currently registered. */
  get openCursors(): number {
    return this.cursors.size;
  }

  start(): void {
    this.port.on("message", (message: unknown) => this.receive(message));
  }

  private receive(message: unknown): void {
    const parsed = RequestSchema.safeParse(message);
    if (!parsed.success) {
      this.logger.error("discarding malformed request: %s", parsed.error.message);
      const id = requestId(message);
      if (id !== null) {
        this.reply({
          id,
          ok: false,
          error: serializeError(new ProtocolError("Malformed request")),
        });
      }
      return;
    }
    this.reply(this.process(parsed.data.id, parsed.data.operation));
  }

  private process(id: number, operation: Operation): Response {
    if (!this.running) {
      return { id, ok: false, error: serializeError(new ConnectionClosedError()) };
    }
    try {
      this.logger.debug("executing %s (request %d)", operation.kind, id);
      const value = this.run(operation);
      this.logger.debug("operation %s completed", operation.kind);
      return { id, ok: true, value };
    } catch (err) {
      this.logger.debug("returning exception %s", err);
      return { id, ok: false, error: serializeError(err) };
    } finally {
      // The loop stops after a close whether or not the close succeeded.
      if (operation.kind === "close") this.running = false;
    }
  }

  private reply(response: Response): void {
    this.port.postMessage(response);
  }

  private run(operation: Operation): unknown {
    switch (operation.kind) {
      case "open":
        if (this.connection !== null) {
          throw new ProgrammingError("Connection already open");
        }
        this.connection = this.connect(operation.database, operation.options);
        return null;
      case "close":
        this.cursors.clear();
        this.conn.close();
        this.connection = null;
        return null;
      case "commit":
        this.conn.commit();
        return null;
      case "rollback":
        this.conn.rollback();
        return null;
      case "cursor":
        return this.register(this.conn.cursor());
      case "execute":
        return this.register(this.conn.execute(operation.sql, operation.params));
      case "executemany":
        return this.register(
          this.conn.executemany(operation.sql, operation.params),
        );
      case "executescript":
        this.conn.executescript(operation.script);
        return null;
      case "executeFetchall": {
        const cursor = this.conn.execute(operation.sql, operation.params);
        try {
          return cursor.fetchall();
        } finally {
          cursor.close();
        }
      }
      case "executeInsert": {
        const cursor = this.conn.execute(operation.sql, operation.params);
        cursor.close();
        return cursor.lastrowid;
      }
      case "inTransaction":
        return this.conn.inTransaction;
      case "loadExtension":
        this.conn.loadExtension(operation.path);
        return null;
      case "cursor.execute":
        this.cursor(operation.cursorId).execute(operation.sql, operation.params);
        return null;
      case "cursor.executemany":
        this.cursor(operation.cursorId).executemany(
          operation.sql,
          operation.params,
        );
        return null;
      case "cursor.fetchone":
        return this.cursor(operation.cursorId).fetchone();
      case "cursor.fetchmany":
        return this.cursor(operation.cursorId).fetchmany(operation.size);
      case "cursor.fetchall":
        return this.cursor(operation.cursorId).fetchall();
      case "cursor.attribute":
        return this.cursor(operation.cursorId)[operation.name];
      case "cursor.close": {
        const cursor = this.cursors.get(operation.cursorId);
        this.cursors.delete(operation.cursorId);
        cursor?.close();
        return null;
      }
    }
  }

  private get conn(): SyncConnection {
    if (this.connection === null) {
      throw new ConnectionClosedError("No active connection");
    }
    return this.connection;
  }

  private cursor(cursorId: number): SyncCursor {
    const cursor = this.cursors.get(cursorId);
    if (cursor === undefined || cursor.closed) {
      this.cursors.delete(cursorId);
      throw new CursorClosedError();
    }
    return cursor;
  }

  private register(cursor: SyncCursor): number {
    const cursorId = this.nextCursorId++;
    this.cursors.set(cursorId, cursor);
    return cursorId;
  }
}

function requestId(message: unknown): number | null {
  if (typeof message !== "object" || message === null || !("id" in message)) {
    return null;
  }
  return typeof message.id === "number" && Number.isInteger(message.id)
    ? message.id
    : null;
}
