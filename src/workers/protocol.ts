/**
 * Messages between the orchestrator and remote (process/thread) workers
 */

import { z } from "zod";
import {
  EbookConfigSchema,
  InputConfigSchema,
  LOG_LEVELS,
  MermaidConfigSchema,
  OUTPUT_FORMATS,
  PlantUmlConfigSchema,
  STYLE_PROFILES,
  TemplatesConfigSchema,
  ToolsConfigSchema,
} from "../types/config";
import type { ConversionSettings, DocumentOutcome } from "../types";

const DimensionLimitSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("pixels"), value: z.number().positive() }),
  z.object({ kind: z.literal("percent"), value: z.number().positive() }),
]);

export const ConversionSettingsSchema = z.object({
  inputDirectory: z.string(),
  outputDirectory: z.string(),
  artifactDirectory: z.string(),
  tempDirectory: z.string(),
  databasePath: z.string(),
  encoding: InputConfigSchema.shape.encoding,
  format: z.enum(OUTPUT_FORMATS),
  profile: z.enum(STYLE_PROFILES),
  margins: z.string(),
  maxWidth: DimensionLimitSchema,
  maxHeight: DimensionLimitSchema,
  force: z.boolean(),
  saveHtml: z.boolean(),
  saveHtmlBundle: z.boolean(),
  ebook: EbookConfigSchema,
  mermaid: MermaidConfigSchema,
  plantuml: PlantUmlConfigSchema,
  templates: TemplatesConfigSchema,
  tools: ToolsConfigSchema,
  logLevel: z.enum(LOG_LEVELS),
}) satisfies z.ZodType<ConversionSettings>;

export const WorkerInitSchema = z.object({
  slot: z.number().int().nonnegative(),
  settings: ConversionSettingsSchema,
});

const SourceDocumentSchema = z.object({
  key: z.string(),
  path: z.string(),
  stem: z.string(),
});

const PIPELINE_STAGES = [
  "load",
  "filter",
  "diagrams",
  "images",
  "externalize",
  "template",
  "produce",
  "save-state",
] as const;

const STALENESS_REASONS = [
  "forced",
  "untracked",
  "artifact-missing",
  "source-changed",
  "config-changed",
  "up-to-date",
] as const;

const DocumentOutcomeSchema = z.object({
  key: z.string(),
  status: z.enum(["converted", "skipped", "failed"]),
  reason: z.enum(STALENESS_REASONS).optional(),
  stage: z.enum(PIPELINE_STAGES).optional(),
  error: z.string().optional(),
  artifactPath: z.string().optional(),
  diagrams: z.number().int().nonnegative().optional(),
  durationMs: z.number().nonnegative(),
}) satisfies z.ZodType<DocumentOutcome>;

// Orchestrator -> worker
export const ParentMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("convert"), id: z.number().int(), document: SourceDocumentSchema }),
  z.object({ type: z.literal("shutdown") }),
]);

// Worker -> orchestrator
export const WorkerMessageSchema = z.object({
  type: z.literal("outcome"),
  id: z.number().int(),
  outcome: DocumentOutcomeSchema,
});

export type WorkerInit = z.infer<typeof WorkerInitSchema>;
export type ParentMessage = z.infer<typeof ParentMessageSchema>;
export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;

/** Environment variable carrying the init payload to forked processes */
export const WORKER_INIT_ENV = "MDPRESS_WORKER_INIT";
