/**
 * Inline worker
 * Runs the pipeline in the orchestrator's own process
 */

import { convertDocument } from "../pipeline";
import { StateStore } from "../state/state-store";
import { createWorkerContext, type WorkerDependencies } from "./worker-context";
import type { WorkerHandle } from "./worker-handle";
import type {
  ConversionSettings,
  DocumentOutcome,
  SourceDocument,
  WorkerContext,
} from "../types";

export class InlineWorker implements WorkerHandle {
  constructor(
    private readonly ctx: WorkerContext,
    private readonly store: StateStore,
  ) {}

  convert(document: SourceDocument): Promise<DocumentOutcome> {
    return convertDocument(document, this.ctx, this.store);
  }

  async close(): Promise<void> {
    await this.ctx.close();
    this.store.close();
  }
}

export function createInlineWorker(
  slot: number,
  settings: ConversionSettings,
  deps: WorkerDependencies,
): InlineWorker {
  const ctx = createWorkerContext(slot, settings, deps);
  return new InlineWorker(ctx, new StateStore(settings.databasePath));
}
