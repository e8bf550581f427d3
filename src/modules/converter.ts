/**
 * Converter Module
 * Runs the batch through the worker orchestrator and records the outcomes
 */

import { runBatch } from "./orchestrator";
import { createInlineWorker } from "../workers/inline-worker";
import { createProcessWorker } from "../workers/process-worker";
import { createThreadWorker } from "../workers/thread-worker";
import {
  createDefaultDependencies,
  type WorkerDependencies,
} from "../workers/worker-context";
import type { Logger } from "../utils/logger";
import type { WorkerFactory } from "../workers/worker-handle";
import type { ConversionContext, ConversionSettings, IsolationMode } from "../types";

/** Builds inline worker collaborators; swapped for fakes in tests */
export type DependencyFactory = (
  settings: ConversionSettings,
  logger: Logger,
) => WorkerDependencies;

export function createWorkerFactory(
  settings: ConversionSettings,
  isolation: IsolationMode,
  logger: Logger,
  createDependencies: DependencyFactory = createDefaultDependencies,
): WorkerFactory {
  return (slot) => {
    const workerLogger = logger.child(`worker ${slot}`);
    switch (isolation) {
      case "process":
        return createProcessWorker(slot, settings, workerLogger);
      case "thread":
        return createThreadWorker(slot, settings, workerLogger);
      case "inline":
        return createInlineWorker(slot, settings, createDependencies(settings, workerLogger));
    }
  };
}

export interface ConvertOptions {
  createDependencies?: DependencyFactory;
}

/**
 * Reads from context: documents (from scan)
 * Writes to context: result
 */
export async function convert(
  ctx: ConversionContext,
  options: ConvertOptions = {},
): Promise<void> {
  const { config, settings, logger, tracker } = ctx;
  const documents = ctx.documents ?? [];

  // A single slot needs no isolation
  const isolation: IsolationMode =
    config.workers.count === 1 ? "inline" : config.workers.isolation;

  const result = await runBatch(documents, {
    workers: config.workers.count,
    createWorker: createWorkerFactory(
      settings,
      isolation,
      logger,
      options.createDependencies,
    ),
    logger,
    onOutcome: (outcome, done, total) => ctx.onProgress?.(done, total, outcome.key),
  });

  tracker.trackBatch(result);
  ctx.result = result;
}
