/**
 * Worker Orchestrator
 * Distributes documents over a fixed number of worker slots
 */

import { describeError } from "../render/classify";
import type { Logger } from "../utils/logger";
import type { WorkerFactory, WorkerHandle } from "../workers/worker-handle";
import type { BatchResult, DocumentOutcome, SourceDocument } from "../types";

export interface BatchOptions {
  workers: number;
  createWorker: WorkerFactory;
  logger: Logger;
  onOutcome?: (outcome: DocumentOutcome, done: number, total: number) => void;
}

async function closeWorker(handle: WorkerHandle, slot: number, logger: Logger): Promise<void> {
  try {
    await handle.close();
  } catch (error) {
    logger.debug(`Worker ${slot} close failed: ${describeError(error)}`);
  }
}

/**
 * Each slot pulls the next document from a shared cursor, so every document
 * is converted by exactly one worker and yields exactly one outcome.
 * A lost worker fails its current document and is recreated on demand.
 */
export async function runBatch(
  documents: SourceDocument[],
  options: BatchOptions,
): Promise<BatchResult> {
  const { logger } = options;
  const started = Date.now();
  const results: Array<DocumentOutcome | undefined> = new Array(documents.length);
  let cursor = 0;
  let done = 0;

  const slots = Math.min(Math.max(options.workers, 1), documents.length);

  const runSlot = async (slot: number): Promise<void> => {
    let handle: WorkerHandle | null = null;

    try {
      while (cursor < documents.length) {
        const index = cursor++;
        const document = documents[index];
        const documentStarted = Date.now();
        let outcome: DocumentOutcome;

        try {
          handle ??= await options.createWorker(slot);
          outcome = await handle.convert(document);
        } catch (error) {
          const message = describeError(error);
          logger.error(`Worker ${slot} failed while converting ${document.key}: ${message}`);
          outcome = {
            key: document.key,
            status: "failed",
            error: message,
            durationMs: Date.now() - documentStarted,
          };
          if (handle) {
            await closeWorker(handle, slot, logger);
            handle = null;
          }
        }

        results[index] = outcome;
        done++;
        options.onOutcome?.(outcome, done, documents.length);
      }
    } finally {
      if (handle) {
        await closeWorker(handle, slot, logger);
      }
    }
  };

  await Promise.all(Array.from({ length: slots }, (_, i) => runSlot(i + 1)));

  const outcomes = results.filter(
    (outcome): outcome is DocumentOutcome => outcome !== undefined,
  );

  return {
    outcomes,
    total: documents.length,
    converted: outcomes.filter((o) => o.status === "converted").length,
    skipped: outcomes.filter((o) => o.status === "skipped").length,
    failed: outcomes.filter((o) => o.status === "failed").length,
    durationMs: Date.now() - started,
  };
}
