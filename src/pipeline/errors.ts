/**
 * Pipeline errors
 */

import type { PipelineStage } from "../types";

/**
 * Aborts the current document; the stage ends up in its outcome
 */
export class PipelineError extends Error {
  constructor(
    readonly stage: PipelineStage,
    message: string,
  ) {
    super(message);
    this.name = "PipelineError";
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
