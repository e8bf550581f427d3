/**
 * Remote worker entry point
 * Loaded by worker-bootstrap.mjs in a forked process or a worker thread
 */

import { parentPort, workerData } from "worker_threads";
import { convertDocument } from "../pipeline";
import { describeError } from "../render/classify";
import { StateStore } from "../state/state-store";
import { Logger } from "../utils/logger";
import { createDefaultDependencies, createWorkerContext } from "./worker-context";
import {
  ParentMessageSchema,
  WORKER_INIT_ENV,
  WorkerInitSchema,
  type WorkerMessage,
} from "./protocol";

interface Channel {
  send(message: WorkerMessage): void;
  onMessage(listener: (message: unknown) => void): void;
  exit(code: number): void;
}

function openChannel(): Channel {
  const port = parentPort;
  if (port) {
    return {
      send: (message) => port.postMessage(message),
      onMessage: (listener) => {
        port.on("message", listener);
      },
      // Ends this thread only
      exit: (code) => {
        port.close();
        process.exit(code);
      },
    };
  }

  return {
    send: (message) => {
      process.send?.(message);
    },
    onMessage: (listener) => {
      process.on("message", listener);
    },
    exit: (code) => {
      process.exit(code);
    },
  };
}

function readInit(): unknown {
  if (parentPort) return workerData;
  const raw = process.env[WORKER_INIT_ENV];
  if (!raw) throw new Error(`${WORKER_INIT_ENV} is not set`);
  return JSON.parse(raw);
}

async function main(): Promise<void> {
  const init = WorkerInitSchema.parse(readInit());
  const { slot, settings } = init;
  const logger = new Logger(settings.logLevel, `worker ${slot}`);

  const ctx = createWorkerContext(slot, settings, createDefaultDependencies(settings, logger));
  const store = new StateStore(settings.databasePath);
  const channel = openChannel();

  // Conversions arrive one at a time; the queue keeps them ordered anyway
  let queue: Promise<void> = Promise.resolve();

  channel.onMessage((raw) => {
    const parsed = ParentMessageSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(`Ignoring malformed message: ${parsed.error.message}`);
      return;
    }
    const message = parsed.data;

    queue = queue.then(async () => {
      if (message.type === "convert") {
        const outcome = await convertDocument(message.document, ctx, store);
        channel.send({ type: "outcome", id: message.id, outcome });
        return;
      }

      await ctx.close();
      store.close();
      channel.exit(0);
    }).catch((error: unknown) => {
      logger.error(`Worker message handling failed: ${describeError(error)}`);
    });
  });
}

main().catch((error: unknown) => {
  console.error(`Worker failed to start: ${describeError(error)}`);
  process.exit(1);
});
