/**
 * Error classes raised by sqlbridge itself.
 *
 * Failures from the SQLite client (SqliteError, TypeError, RangeError) are
 * not wrapped: they reach the caller as instances of their own class.
 */

/** Base class for misuse of a connection or cursor handle. */
export class ProgrammingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProgrammingError";
  }
}

export class ConnectionClosedError extends ProgrammingError {
  constructor(message?: string) {
    super(message ?? "Connection closed");
    this.name = "ConnectionClosedError";
  }
}

export class CursorClosedError extends ProgrammingError {
  constructor(message?: string) {
    super(message ?? "Cannot operate on a closed cursor");
    this.name = "CursorClosedError";
  }
}

/** The worker thread owning a connection died before the connection was closed. */
export class WorkerExitedError extends Error {
  exitCode: number | null;

  constructor(exitCode: number | null, cause?: unknown) {
    super(
      exitCode === null
        ? "Connection worker crashed"
        : `Connection worker exited with code ${exitCode}`,
      { cause },
    );
    this.name = "WorkerExitedError";
    this.exitCode = exitCode;
  }
}

/** A message between the event loop and a worker failed validation. */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}
