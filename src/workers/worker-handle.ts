/**
 * Worker handle contract shared by the isolation modes
 */

import type { DocumentOutcome, SourceDocument } from "../types";

export interface WorkerHandle {
  /** Rejects only when the worker itself is lost */
  convert(document: SourceDocument): Promise<DocumentOutcome>;
  close(): Promise<void>;
}

export type WorkerFactory = (slot: number) => WorkerHandle | Promise<WorkerHandle>;
