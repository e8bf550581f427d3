/**
 * Thread isolation: one worker thread per worker slot
 */

import { Worker } from "worker_threads";
import { WORKER_BOOTSTRAP } from "./loader";
import { RemoteWorker } from "./remote-worker";
import type { WorkerInit } from "./protocol";
import type { Logger } from "../utils/logger";
import type { ConversionSettings } from "../types";

export function createThreadWorker(
  slot: number,
  settings: ConversionSettings,
  logger: Logger,
): RemoteWorker {
  const init: WorkerInit = { slot, settings };
  const worker = new Worker(WORKER_BOOTSTRAP, { workerData: init });

  return new RemoteWorker(
    {
      send: (message) => {
        worker.postMessage(message);
      },
      onMessage: (listener) => {
        worker.on("message", listener);
      },
      onExit: (listener) => {
        worker.on("error", (error) => listener(`thread error: ${error.message}`));
        worker.on("exit", (code) => listener(`exit code ${code}`));
      },
      terminate: () => {
        worker.terminate().catch((error: unknown) => {
          logger.debug(`Thread terminate failed: ${String(error)}`);
        });
      },
    },
    logger,
  );
}
