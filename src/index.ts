/**
 * sqlbridge – non-blocking SQLite for Node.js.
 *
 * Every connection owns one worker thread that runs all of its statements,
 * in order, on a synchronous better-sqlite3 connection.
 */
export { connect, Connection } from "./core/connection.js";
export { Cursor } from "./core/cursor.js";
export { withResource } from "./core/scope.js";
export type { Closeable } from "./core/scope.js";
export {
  ConnectionClosedError,
  CursorClosedError,
  ProgrammingError,
  ProtocolError,
  WorkerExitedError,
} from "./core/exceptions.js";
export { SqliteError } from "./core/protocol.js";
export { Logger, resolveLogLevel } from "./core/logger.js";
export type { LogLevel, LoggerOptions } from "./core/logger.js";
export {
  ConnectOptionsSchema,
  parseConnectOptions,
  resolveDatabase,
} from "./config.js";
export type {
  ConnectOptions,
  ConnectOptionsInput,
  DatabaseTarget,
} from "./config.js";
export type {
  BindParameters,
  ColumnDescription,
  IsolationLevel,
  Row,
  RowId,
  RowMode,
  SqlValue,
} from "./core/types.js";
