/**
 * Starts the worker thread that owns one connection.
 */
import { createRequire } from "node:module";
import { extname, join } from "node:path";
import { Worker } from "node:worker_threads";

import type { LogLevel } from "./logger.js";
import type { WorkerData } from "./protocol.js";

export function spawnWorker(logLevel: LogLevel): Worker {
  const extension = extname(__filename);
  const entry = join(__dirname, `worker-entry${extension}`);
  const workerData: WorkerData = { logLevel };

  // Running from TypeScript sources (tests, development): the worker
  // compiles its modules through tsx's CommonJS hook.
  if (extension === ".ts") {
    const tsx = createRequire(__filename).resolve("tsx/cjs");
    return new Worker(entry, { workerData, execArgv: ["--require", tsx] });
  }
  return new Worker(entry, { workerData });
}
