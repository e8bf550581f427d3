/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  InputConfig,
  OutputConfig,
  PageConfig,
  DiagramsConfig,
  MermaidConfig,
  PlantUmlConfig,
  EbookConfig,
  WorkersConfig,
  TemplatesConfig,
  ToolsConfig,
  LoggingConfig,
  OutputFormat,
  StyleProfileName,
  IsolationMode,
  LogLevel,
  DimensionValue,
  ConfigError,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
  OUTPUT_FORMATS,
  STYLE_PROFILES,
  ISOLATION_MODES,
  LOG_LEVELS,
} from "./config";

// Pipeline
export type {
  SourceDocument,
  DocumentRecord,
  ConversionSettings,
  PipelineStage,
  DocumentStatus,
  StalenessReason,
  DocumentOutcome,
  BatchResult,
} from "./pipeline";

// Rendering
export type {
  DiagramDialect,
  DimensionLimit,
  SizingDirective,
  ResizePlan,
  RenderJob,
  RenderResult,
  RenderAdapter,
  ImageFitter,
  Sleep,
} from "./render";

// Context
export type {
  ConversionContext,
  WorkerContext,
  Issue,
  IssueType,
  DocumentIssue,
  ResourceIssue,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";
