/**
 * Pipeline module data types
 */

import type {
  LogLevel,
  MermaidConfig,
  OutputFormat,
  PlantUmlConfig,
  StyleProfileName,
  EbookConfig,
  InputConfig,
  ToolsConfig,
  TemplatesConfig,
} from "./config";
import type { DimensionLimit } from "./render";

// ============================================================================
// Documents
// ============================================================================

export interface SourceDocument {
  key: string; // Identity in the state store: the source filename
  path: string; // Absolute path to the Markdown file
  stem: string; // Filename without extension
}

export interface DocumentRecord {
  key: string;
  sourceDigest: string;
  artifactDigest: string;
  fingerprint: string;
  convertedAt: Date;
}

// ============================================================================
// Settings
// ============================================================================

/**
 * Fully resolved settings for one batch.
 * Plain data only: this object is sent to process and thread workers.
 */
export interface ConversionSettings {
  inputDirectory: string;
  outputDirectory: string;
  artifactDirectory: string; // <output>/<format>
  tempDirectory: string;
  databasePath: string;
  encoding: InputConfig["encoding"];
  format: OutputFormat;
  profile: StyleProfileName;
  margins: string;
  maxWidth: DimensionLimit;
  maxHeight: DimensionLimit;
  force: boolean;
  saveHtml: boolean;
  saveHtmlBundle: boolean;
  ebook: EbookConfig;
  mermaid: MermaidConfig;
  plantuml: PlantUmlConfig;
  templates: TemplatesConfig;
  tools: ToolsConfig;
  logLevel: LogLevel;
}

// ============================================================================
// Outcomes
// ============================================================================

export type PipelineStage =
  | "load"
  | "filter"
  | "diagrams"
  | "images"
  | "externalize"
  | "template"
  | "produce"
  | "save-state";

export type DocumentStatus = "converted" | "skipped" | "failed";

export type StalenessReason =
  | "forced"
  | "untracked"
  | "artifact-missing"
  | "source-changed"
  | "config-changed"
  | "up-to-date";

export interface DocumentOutcome {
  key: string;
  status: DocumentStatus;
  reason?: StalenessReason;
  stage?: PipelineStage;
  error?: string;
  artifactPath?: string;
  diagrams?: number;
  durationMs: number;
}

export interface BatchResult {
  outcomes: DocumentOutcome[];
  total: number;
  converted: number;
  skipped: number;
  failed: number;
  durationMs: number;
}
