/**
 * Conversion contexts
 *
 * ConversionContext flows through the batch-level modules (scan, convert, stats).
 * WorkerContext is owned by exactly one worker and passed down through the
 * document pipeline; it is never shared between workers.
 */

import type { ConversionConfig } from "./config";
import type {
  BatchResult,
  ConversionSettings,
  PipelineStage,
  SourceDocument,
} from "./pipeline";
import type { DiagramDialect, RenderAdapter, ImageFitter, Sleep } from "./render";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { BrowserSession } from "../render/browser-session";
import type { Toolchain } from "../pipeline/toolchain";

// ============================================================================
// Issues
// ============================================================================

export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

export interface DocumentIssue {
  type: "document";
  path: string;
  stage: PipelineStage | "worker";
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = DocumentIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  totalDocuments: number;
  convertedDocuments: number;
  skippedDocuments: number;
  failedDocuments: number;
  renderedDiagrams: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Batch context
// ============================================================================

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;
  settings: ConversionSettings;

  tracker: Tracker;
  logger: Logger;
  verbose?: boolean;

  // Progress callback for the CLI spinner
  onProgress?: (done: number, total: number, key: string) => void;

  documents?: SourceDocument[]; // Written by scan
  result?: BatchResult; // Written by convert
}

// ============================================================================
// Worker context
// ============================================================================

export interface WorkerContext {
  slot: number;
  settings: ConversionSettings;
  session: BrowserSession;
  adapters: Record<DiagramDialect, RenderAdapter>;
  toolchain: Toolchain;
  fitImage: ImageFitter;
  sleep: Sleep;
  logger: Logger;
  close(): Promise<void>;
}
