/**
 * Scoped acquisition: run a block with a resource and always close it.
 */

export interface Closeable {
  close(): Promise<void>;
}

/**
 * Await `resource`, pass it to `fn`, and close it however `fn` ends.
 *
 * ```ts
 * const rows = await withResource(connect("app.db"), async (db) =>
 *   withResource(db.execute("SELECT * FROM users"), (cursor) => cursor.fetchall()),
 * );
 * ```
 *
 * If acquiring fails there is nothing to close. If `fn` throws, that
 * failure is the one rethrown, even when closing fails too.
 */
export async function withResource<T extends Closeable, R>(
  resource: T | Promise<T>,
  fn: (resource: T) => R | Promise<R>,
): Promise<R> {
  const acquired = await resource;
  let result: R;
  try {
    result = await fn(acquired);
  } catch (err) {
    try {
      await acquired.close();
    } catch (closeErr) {
      // `err` takes precedence; attach the close failure for debugging.
      if (err instanceof Error && err.cause === undefined) {
        err.cause = closeErr;
      }
    }
    throw err;
  }
  await acquired.close();
  return result;
}
