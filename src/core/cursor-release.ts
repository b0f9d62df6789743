/**
 * Frees the worker-side cursor of a Cursor handle the caller dropped
 * without closing it.
 */
import type { Dispatcher } from "./dispatcher.js";
import type { Logger } from "./logger.js";
import { VoidSchema } from "./protocol.js";

export class CursorRelease {
  private readonly dispatcher: Dispatcher;
  private readonly logger: Logger;
  private readonly registry: FinalizationRegistry<number>;

  constructor(dispatcher: Dispatcher, logger: Logger) {
    this.dispatcher = dispatcher;
    this.logger = logger;
    this.registry = new FinalizationRegistry((cursorId) => this.release(cursorId));
  }

  /** Close `cursorId` on the worker once `handle` is garbage collected. */
  track(handle: object, cursorId: number): void {
    this.registry.register(handle, cursorId, handle);
  }

  /** The handle closed itself; nothing left to release. */
  untrack(handle: object): void {
    this.registry.unregister(handle);
  }

  /** Queue a close for a worker cursor no handle refers to any more. */
  release(cursorId: number): void {
    // The worker dropped every cursor when the connection closed.
    if (this.dispatcher.closed) return;
    this.logger.debug("releasing unreferenced cursor %d", cursorId);
    void this.dispatcher
      .enqueue({ kind: "cursor.close", cursorId }, VoidSchema)
      .catch((err: unknown) => {
        this.logger.debug("releasing cursor %d failed: %s", cursorId, err);
      });
  }
}
