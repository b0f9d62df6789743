/**
 * SQLite client using better-sqlite3, shaped as a cursor-based connection.
 */
import Database from "better-sqlite3";

import { CursorClosedError, ProgrammingError } from "../core/exceptions.js";
import type {
  ClientBindParameters,
  ClientOptions,
  ColumnDescription,
  Row,
  RowId,
} from "../core/types.js";
import type { SyncConnection, SyncCursor } from "./backend.js";

type Statement = Database.Statement<unknown[], Row>;

const IMPLICIT_BEGIN = /^\s*(INSERT|UPDATE|DELETE|REPLACE)\b/i;
const PRAGMA_NAME = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

function bindArgs(params: ClientBindParameters | undefined): unknown[] {
  if (params === undefined) return [];
  return Array.isArray(params) ? params : [params];
}

export class SqliteCursor implements SyncCursor {
  arraysize = 1;

  private readonly connection: SqliteConnection;
  private iterator: Iterator<Row> | null = null;
  // Rows drained from `iterator` while another statement needed the database.
  private buffer: Row[] = [];
  private bufferIndex = 0;
  private _rowcount = -1;
  private _description: ColumnDescription[] | null = null;
  private _lastrowid: RowId = null;
  private _closed = false;

  constructor(connection: SqliteConnection) {
    this.connection = connection;
  }

  get rowcount(): number {
    return this._rowcount;
  }

  get description(): ColumnDescription[] | null {
    return this._description;
  }

  get lastrowid(): RowId {
    return this._lastrowid;
  }

  get closed(): boolean {
    return this._closed;
  }

  execute(sql: string, params?: ClientBindParameters): void {
    this.ensureOpen();
    this.reset();
    const stmt = this.connection.prepare(sql, this);
    this.connection.beginImplicit(sql);

    if (stmt.reader) {
      if (this.connection.rowMode === "array") stmt.raw(true);
      this._description = stmt.columns().map((column) => ({
        name: column.name,
        column: column.column,
        table: column.table,
        database: column.database,
        type: column.type,
      }));
      this.iterator = stmt.iterate(...bindArgs(params));
      return;
    }

    const info = stmt.run(...bindArgs(params));
    this._rowcount = info.changes;
    this._lastrowid = info.lastInsertRowid;
  }

  executemany(sql: string, seq: ClientBindParameters[]): void {
    this.ensureOpen();
    this.reset();
    const stmt = this.connection.prepare(sql, this);
    if (stmt.reader) {
      throw new ProgrammingError("executemany() can only execute DML statements");
    }
    this.connection.beginImplicit(sql);

    let changes = 0;
    for (const params of seq) {
      const info = stmt.run(...bindArgs(params));
      changes += info.changes;
      this._lastrowid = info.lastInsertRowid;
    }
    this._rowcount = changes;
  }

  fetchone(): Row | null {
    this.ensureOpen();
    return this.next();
  }

  fetchmany(size: number = this.arraysize): Row[] {
    this.ensureOpen();
    const rows: Row[] = [];
    while (rows.length < size) {
      const row = this.next();
      if (row === null) break;
      rows.push(row);
    }
    return rows;
  }

  fetchall(): Row[] {
    this.ensureOpen();
    const rows: Row[] = [];
    for (let row = this.next(); row !== null; row = this.next()) {
      rows.push(row);
    }
    return rows;
  }

  close(): void {
    if (this._closed) return;
    this.reset();
    this._closed = true;
    this.connection.forget(this);
  }

  /**
   * Move the remaining rows of an open iterator into the buffer so the
   * database is free for another statement.
   */
  detach(): void {
    if (this.iterator === null) return;
    const rest = this.buffer.slice(this.bufferIndex);
    for (let step = this.iterator.next(); !step.done; step = this.iterator.next()) {
      rest.push(step.value);
    }
    this.iterator = null;
    this.buffer = rest;
    this.bufferIndex = 0;
  }

  private next(): Row | null {
    if (this.bufferIndex < this.buffer.length) {
      return this.buffer[this.bufferIndex++];
    }
    if (this.buffer.length > 0) {
      this.buffer = [];
      this.bufferIndex = 0;
    }
    if (this.iterator !== null) {
      const step = this.iterator.next();
      if (!step.done) return step.value;
      this.iterator = null;
    }
    return null;
  }

  private reset(): void {
    this.iterator?.return?.();
    this.iterator = null;
    this.buffer = [];
    this.bufferIndex = 0;
    this._rowcount = -1;
    this._description = null;
  }

  private ensureOpen(): void {
    if (this._closed) throw new CursorClosedError();
  }
}

export class SqliteConnection implements SyncConnection {
  private readonly db: Database.Database;
  private readonly options: ClientOptions;
  private readonly cursors = new Set<SqliteCursor>();

  constructor(db: Database.Database, options: ClientOptions) {
    this.db = db;
    this.options = options;
  }

  get rowMode(): ClientOptions["rowMode"] {
    return this.options.rowMode;
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  cursor(): SqliteCursor {
    const cursor = new SqliteCursor(this);
    this.cursors.add(cursor);
    return cursor;
  }

  execute(sql: string, params?: ClientBindParameters): SqliteCursor {
    const cursor = this.cursor();
    try {
      cursor.execute(sql, params);
    } catch (err) {
      cursor.close();
      throw err;
    }
    return cursor;
  }

  executemany(sql: string, seq: ClientBindParameters[]): SqliteCursor {
    const cursor = this.cursor();
    try {
      cursor.executemany(sql, seq);
    } catch (err) {
      cursor.close();
      throw err;
    }
    return cursor;
  }

  executescript(script: string): void {
    this.quiesce();
    this.db.exec(script);
  }

  commit(): void {
    this.quiesce();
    if (this.db.inTransaction) this.db.exec("COMMIT");
  }

  rollback(): void {
    this.quiesce();
    if (this.db.inTransaction) this.db.exec("ROLLBACK");
  }

  loadExtension(path: string): void {
    this.quiesce();
    this.db.loadExtension(path);
  }

  close(): void {
    for (const cursor of [...this.cursors]) cursor.close();
    this.db.close();
  }

  /** Prepare `sql` for `requester` once no other cursor holds the database busy. */
  prepare(sql: string, requester: SqliteCursor): Statement {
    this.quiesce(requester);
    return this.db.prepare<unknown[], Row>(sql);
  }

  /** Open a transaction before a write statement when an isolation level is set. */
  beginImplicit(sql: string): void {
    const level = this.options.isolationLevel;
    if (level === null || this.db.inTransaction) return;
    if (IMPLICIT_BEGIN.test(sql)) this.db.exec(`BEGIN ${level}`);
  }

  forget(cursor: SqliteCursor): void {
    this.cursors.delete(cursor);
  }

  private quiesce(except?: SqliteCursor): void {
    for (const cursor of this.cursors) {
      if (cursor !== except) cursor.detach();
    }
  }
}

export function openSqlite(
  database: string,
  options: ClientOptions,
): SqliteConnection {
  const db = new Database(database, {
    readonly: options.readonly,
    fileMustExist: options.fileMustExist,
    timeout: options.timeout,
  });

  try {
    if (options.safeIntegers) db.defaultSafeIntegers(true);
    for (const [name, value] of Object.entries(options.pragmas)) {
      if (!PRAGMA_NAME.test(name)) {
        throw new ProgrammingError(`Invalid pragma name: ${name}`);
      }
      db.pragma(`${name} = ${value}`);
    }
  } catch (err) {
    db.close();
    throw err;
  }

  return new SqliteConnection(db, options);
}
