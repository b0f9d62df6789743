/**
 * Event-loop side of the request queue.
 *
 * `enqueue` posts a request and returns a promise; `receive` is wired to the
 * worker's message event, so every promise settles on the event loop that
 * created it and never from the worker thread.
 */
import { ConnectionClosedError, ProtocolError } from "./exceptions.js";
import type { Logger } from "./logger.js";
import {
  deserializeError,
  ResponseSchema,
  type Operation,
  type Request,
} from "./protocol.js";

/** Validates a response value into the operation's result type. */
export interface ResultSchema<T> {
  parse(value: unknown): T;
}

interface Pending {
  kind: Operation["kind"];
  resolve(value: unknown): void;
  reject(reason: Error): void;
}

export class Dispatcher {
  private readonly post: (request: Request) => void;
  private readonly logger: Logger;
  private readonly inflight = new Map<number, Pending>();
  private nextId = 1;
  private shutdownReason: Error | null = null;

  constructor(post: (request: Request) => void, logger: Logger) {
    this.post = post;
    this.logger = logger;
  }

  get closed(): boolean {
    return this.shutdownReason !== null;
  }

  /** Requests posted and not yet answered. */
  get pending(): number {
    return this.inflight.size;
  }

  enqueue<T>(operation: Operation, schema: ResultSchema<T>): Promise<T> {
    if (this.shutdownReason !== null) {
      return Promise.reject(this.shutdownReason);
    }

    const id = this.nextId++;
    return new Promise<T>((resolve, reject) => {
      this.inflight.set(id, {
        kind: operation.kind,
        resolve: (value) => {
          const parsed = safeParse(schema, value);
          if (parsed.ok) {
            resolve(parsed.value);
          } else {
            reject(
              new ProtocolError(
                `Unexpected result for ${operation.kind}: ${parsed.message}`,
              ),
            );
          }
        },
        reject,
      });
      try {
        this.post({ id, operation });
      } catch (err) {
        this.inflight.delete(id);
        reject(err);
      }
    });
  }

  receive(message: unknown): void {
    const parsed = ResponseSchema.safeParse(message);
    if (!parsed.success) {
      this.logger.error("discarding malformed response: %s", parsed.error.message);
      return;
    }

    const response = parsed.data;
    const entry = this.inflight.get(response.id);
    if (entry === undefined) {
      // The awaiting side is gone (shut down, or never existed).
      this.logger.debug("no listener for response %d", response.id);
      return;
    }
    this.inflight.delete(response.id);

    if (response.ok) {
      entry.resolve(response.value);
    } else {
      this.logger.debug("%s failed: %s", entry.kind, response.error.message);
      entry.reject(deserializeError(response.error));
    }
  }

  /**
   * Reject every outstanding request and refuse new ones. Only the first
   * reason is kept.
   */
  shutdown(reason: Error = new ConnectionClosedError()): void {
    if (this.shutdownReason === null) this.shutdownReason = reason;
    const outstanding = [...this.inflight.values()];
    this.inflight.clear();
    for (const entry of outstanding) entry.reject(this.shutdownReason);
  }
}

type ParseOutcome<T> = { ok: true; value: T } | { ok: false; message: string };

function safeParse<T>(schema: ResultSchema<T>, value: unknown): ParseOutcome<T> {
  try {
    return { ok: true, value: schema.parse(value) };
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
}
