/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

export const OUTPUT_FORMATS = ["pdf", "epub", "mobi"] as const;
export const STYLE_PROFILES = [
  "a4-print",
  "a4-screen",
  "kindle-basic",
  "kindle-large",
  "kindle-paperwhite-11",
] as const;
export const ISOLATION_MODES = ["process", "thread", "inline"] as const;
export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

// Pixel limit (number) or percentage of the rendered size ("80%")
export const DimensionSchema = z.union([
  z.number().int().positive(),
  z.string().regex(/^\s*\d+(\.\d+)?%\s*$/, "Expected a percentage like \"80%\""),
]);

// Zod schemas
export const InputConfigSchema = z.object({
  directory: z.string(),
  pattern: z.string(),
  exclude: z.array(z.string()),
  encoding: z.enum(["utf-8", "utf8", "latin1", "ascii"]),
});

export const OutputConfigSchema = z.object({
  directory: z.string(),
  format: z.enum(OUTPUT_FORMATS),
  tempDirectory: z.string(),
  cleanup: z.boolean(),
  saveHtml: z.boolean(),
  saveHtmlBundle: z.boolean(),
});

export const StateConfigSchema = z.object({
  // null = <user data dir>/state.db
  database: z.string().nullable(),
});

export const PageConfigSchema = z.object({
  // null = default profile for the output format
  profile: z.enum(STYLE_PROFILES).nullable(),
  margins: z.string(),
});

export const MermaidConfigSchema = z.object({
  scriptUrl: z.string().url(),
  timeout: z.number().int().positive(), // In milliseconds
  pollInterval: z.number().int().positive(),
  stabilityInterval: z.number().int().positive(),
  stabilityChecks: z.number().int().positive(),
  tolerance: z.number().positive(), // In CSS pixels
  relayoutDelay: z.number().int().nonnegative(),
});

export const PlantUmlConfigSchema = z.object({
  server: z.string().url(),
  retries: z.number().int().positive(),
  backoff: z.number().int().nonnegative(), // Base delay in milliseconds
  timeout: z.number().int().positive(),
});

export const DiagramsConfigSchema = z.object({
  maxWidth: DimensionSchema,
  maxHeight: DimensionSchema,
  mermaid: MermaidConfigSchema,
  plantuml: PlantUmlConfigSchema,
});

export const EbookConfigSchema = z.object({
  author: z.string(),
  language: z.string(),
  tocDepth: z.number().int().min(1).max(6),
});

export const WorkersConfigSchema = z.object({
  count: z.number().int().positive(),
  isolation: z.enum(ISOLATION_MODES),
});

export const TemplatesConfigSchema = z.object({
  document: z.string().nullable(),
  stylesheet: z.string().nullable(),
});

export const ToolsConfigSchema = z.object({
  pandoc: z.string(),
  ebookConvert: z.string(),
  // null = CHROME_PATH or the installed stable Chrome channel
  chrome: z.string().nullable(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS),
  showProgress: z.boolean(),
});

export const ConversionConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  state: StateConfigSchema,
  page: PageConfigSchema,
  diagrams: DiagramsConfigSchema,
  ebook: EbookConfigSchema,
  workers: WorkersConfigSchema,
  templates: TemplatesConfigSchema,
  tools: ToolsConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = z.object({
  input: InputConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  state: StateConfigSchema.partial().optional(),
  page: PageConfigSchema.partial().optional(),
  diagrams: DiagramsConfigSchema.partial()
    .extend({
      mermaid: MermaidConfigSchema.partial().optional(),
      plantuml: PlantUmlConfigSchema.partial().optional(),
    })
    .optional(),
  ebook: EbookConfigSchema.partial().optional(),
  workers: WorkersConfigSchema.partial().optional(),
  templates: TemplatesConfigSchema.partial().optional(),
  tools: ToolsConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
export type StyleProfileName = (typeof STYLE_PROFILES)[number];
export type IsolationMode = (typeof ISOLATION_MODES)[number];
export type LogLevel = (typeof LOG_LEVELS)[number];
export type DimensionValue = z.infer<typeof DimensionSchema>;
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type PageConfig = z.infer<typeof PageConfigSchema>;
export type MermaidConfig = z.infer<typeof MermaidConfigSchema>;
export type PlantUmlConfig = z.infer<typeof PlantUmlConfigSchema>;
export type DiagramsConfig = z.infer<typeof DiagramsConfigSchema>;
export type EbookConfig = z.infer<typeof EbookConfigSchema>;
export type WorkersConfig = z.infer<typeof WorkersConfigSchema>;
export type TemplatesConfig = z.infer<typeof TemplatesConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}
