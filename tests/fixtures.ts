/**
 * Shared test fixtures: temp dirs, an in-process worker loop, a recording client.
 */
import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MessageChannel } from "node:worker_threads";

import { Dispatcher } from "../src/core/dispatcher.js";
import { Logger } from "../src/core/logger.js";
import type { ClientOptions, Row } from "../src/core/types.js";
import { WorkerLoop } from "../src/core/worker-loop.js";
import type {
  Connector,
  SyncConnection,
  SyncCursor,
} from "../src/db/backend.js";

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "sqlbridge-test-"));
}

export const CLIENT_OPTIONS: ClientOptions = {
  readonly: false,
  fileMustExist: false,
  timeout: 5000,
  safeIntegers: false,
  rowMode: "array",
  isolationLevel: null,
  pragmas: {},
};

export const quietLogger = new Logger({ level: "silent" });

// ---------------------------------------------------------------------------
// In-process loop: a Dispatcher and a WorkerLoop joined by a MessageChannel
// ---------------------------------------------------------------------------

export interface LoopHarness {
  dispatcher: Dispatcher;
  loop: WorkerLoop;
  /** Close both ports. */
  dispose(): void;
}

export function startLoop(connector: Connector): LoopHarness {
  const { port1, port2 } = new MessageChannel();
  const dispatcher = new Dispatcher(
    (request) => port1.postMessage(request),
    quietLogger,
  );
  port1.on("message", (message: unknown) => dispatcher.receive(message));
  const loop = new WorkerLoop(port2, connector, quietLogger);
  loop.start();
  return {
    dispatcher,
    loop,
    dispose: () => {
      port1.close();
      port2.close();
    },
  };
}

// ---------------------------------------------------------------------------
// Recording client: logs every call and whether any two ever overlapped
// ---------------------------------------------------------------------------

export class CallLog {
  readonly calls: string[] = [];
  active = 0;
  overlapped = false;

  record<T>(name: string, fn: () => T): T {
    this.active++;
    if (this.active > 1) this.overlapped = true;
    this.calls.push(name);
    try {
      return fn();
    } finally {
      this.active--;
    }
  }
}

class RecordingCursor implements SyncCursor {
  arraysize = 1;
  rowcount = -1;
  description = null;
  lastrowid = null;
  closed = false;
  private rows: Row[] = [];

  constructor(private readonly log: CallLog) {}

  execute(sql: string): void {
    this.log.record(`cursor.execute ${sql}`, () => {
      if (sql.startsWith("FAIL")) throw new RangeError(`refused: ${sql}`);
      // "ROWS n" yields n single-column rows: [1], [2], ... [n]
      const match = /^ROWS (\d+)$/.exec(sql);
      const count = match ? Number(match[1]) : 0;
      this.rows = Array.from({ length: count }, (_, i) => [i + 1]);
    });
  }

  executemany(sql: string): void {
    this.log.record(`cursor.executemany ${sql}`, () => undefined);
  }

  fetchone(): Row | null {
    return this.log.record("cursor.fetchone", () => this.rows.shift() ?? null);
  }

  fetchmany(size = this.arraysize): Row[] {
    return this.log.record("cursor.fetchmany", () => this.rows.splice(0, size));
  }

  fetchall(): Row[] {
    return this.log.record("cursor.fetchall", () => this.rows.splice(0));
  }

  close(): void {
    this.log.record("cursor.close", () => {
      this.closed = true;
    });
  }
}

export class RecordingConnection implements SyncConnection {
  inTransaction = false;
  failClose = false;

  constructor(readonly log: CallLog) {}

  cursor(): SyncCursor {
    return this.log.record("cursor", () => new RecordingCursor(this.log));
  }

  execute(sql: string): SyncCursor {
    const cursor = new RecordingCursor(this.log);
    cursor.execute(sql);
    return cursor;
  }

  executemany(sql: string): SyncCursor {
    const cursor = new RecordingCursor(this.log);
    cursor.executemany(sql);
    return cursor;
  }

  executescript(script: string): void {
    this.log.record(`executescript ${script}`, () => undefined);
  }

  commit(): void {
    this.log.record("commit", () => undefined);
  }

  rollback(): void {
    this.log.record("rollback", () => undefined);
  }

  loadExtension(path: string): void {
    this.log.record(`loadExtension ${path}`, () => undefined);
  }

  close(): void {
    this.log.record("close", () => {
      if (this.failClose) throw new Error("close failed");
    });
  }
}

/** A connector that hands out one RecordingConnection and logs the open. */
export function recordingConnector(log: CallLog): {
  connector: Connector;
  connection: RecordingConnection;
} {
  const connection = new RecordingConnection(log);
  const connector: Connector = (database) =>
    log.record(`open ${database}`, () => connection);
  return { connector, connection };
}
