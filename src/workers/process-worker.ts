/**
 * Process isolation: one forked Node.js process per worker slot
 */

import { fork } from "child_process";
import { WORKER_BOOTSTRAP } from "./loader";
import { WORKER_INIT_ENV, type WorkerInit } from "./protocol";
import { RemoteWorker } from "./remote-worker";
import type { Logger } from "../utils/logger";
import type { ConversionSettings } from "../types";

export function createProcessWorker(
  slot: number,
  settings: ConversionSettings,
  logger: Logger,
): RemoteWorker {
  const init: WorkerInit = { slot, settings };
  const child = fork(WORKER_BOOTSTRAP, [], {
    env: { ...process.env, [WORKER_INIT_ENV]: JSON.stringify(init) },
    stdio: ["ignore", "inherit", "inherit", "ipc"],
  });

  return new RemoteWorker(
    {
      send: (message) => {
        child.send(message);
      },
      onMessage: (listener) => {
        child.on("message", listener);
      },
      onExit: (listener) => {
        child.on("error", (error) => listener(`process error: ${error.message}`));
        child.on("exit", (code, signal) =>
          listener(signal ? `signal ${signal}` : `exit code ${code ?? "unknown"}`),
        );
      },
      terminate: () => {
        child.kill("SIGKILL");
      },
    },
    logger,
  );
}
