/**
 * Synchronous database client boundary.
 *
 * Implementations are not thread-safe and are only ever called from the
 * worker thread that opened them.
 */
import type {
  ClientBindParameters,
  ClientOptions,
  ColumnDescription,
  Row,
  RowId,
} from "../core/types.js";

export interface SyncCursor {
  /** Default row count for `fetchmany()`. */
  arraysize: number;

  /** Rows changed by the last write statement; -1 after a query. */
  readonly rowcount: number;

  /** Result columns of the last query, or null. */
  readonly description: ColumnDescription[] | null;

  /** Rowid reported by the last write statement, or null. */
  readonly lastrowid: RowId;

  readonly closed: boolean;

  execute(sql: string, params?: ClientBindParameters): void;

  executemany(sql: string, seq: ClientBindParameters[]): void;

  /** Next row, or null once the result is exhausted. */
  fetchone(): Row | null;

  fetchmany(size?: number): Row[];

  fetchall(): Row[];

  close(): void;
}

export interface SyncConnection {
  readonly inTransaction: boolean;

  cursor(): SyncCursor;

  /** Run one statement on a new cursor and return it. */
  execute(sql: string, params?: ClientBindParameters): SyncCursor;

  executemany(sql: string, seq: ClientBindParameters[]): SyncCursor;

  /** Run several `;`-separated statements. */
  executescript(script: string): void;

  commit(): void;

  rollback(): void;

  loadExtension(path: string): void;

  /** Close every cursor, then the connection. */
  close(): void;
}

/** Opens a client connection; called on the worker thread. */
export type Connector = (
  database: string,
  options: ClientOptions,
) => SyncConnection;
