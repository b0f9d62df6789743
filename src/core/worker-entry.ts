/**
 * Entry point of a connection's worker thread.
 */
import { parentPort, threadId, workerData } from "node:worker_threads";

import { openSqlite } from "../db/sqlite.js";
import { Logger } from "./logger.js";
import { WorkerDataSchema } from "./protocol.js";
import { WorkerLoop } from "./worker-loop.js";

if (parentPort === null) {
  throw new Error("worker-entry must be started as a worker thread");
}

const { logLevel } = WorkerDataSchema.parse(workerData);
const logger = new Logger({ level: logLevel, scope: `worker-${threadId}` });

new WorkerLoop(parentPort, openSqlite, logger).start();
