/**
 * Command-line options shared by the conversion commands
 */

import { z } from "zod";
import { ISOLATION_MODES, OUTPUT_FORMATS, STYLE_PROFILES } from "../types";
import type { ConversionConfig, DimensionValue } from "../types";

export const ConvertOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  config: z.string().optional(),
  format: z.enum(OUTPUT_FORMATS).optional(),
  profile: z.enum(STYLE_PROFILES).optional(),
  margins: z.string().optional(),
  maxDiagramWidth: z.string().optional(),
  maxDiagramHeight: z.string().optional(),
  tempDir: z.string().optional(),
  dbPath: z.string().optional(),
  workers: z.coerce.number().int().positive().optional(),
  isolation: z.enum(ISOLATION_MODES).optional(),
  parallel: z.boolean().optional(),
  force: z.boolean().optional(),
  saveHtml: z.boolean().optional(),
  saveHtmlBundle: z.boolean().optional(),
  author: z.string().optional(),
  language: z.string().optional(),
  cleanup: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export type ConvertOptions = z.infer<typeof ConvertOptionsSchema>;

function toDimension(raw: string): DimensionValue {
  const trimmed = raw.trim();
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : trimmed;
}

/**
 * Command-line flags win over every configuration layer
 */
export function applyCliOverrides(
  config: ConversionConfig,
  options: ConvertOptions,
): ConversionConfig {
  const workers =
    options.parallel === false ? 1 : (options.workers ?? config.workers.count);

  return {
    ...config,
    input: {
      ...config.input,
      directory: options.input ?? config.input.directory,
    },
    output: {
      ...config.output,
      directory: options.output ?? config.output.directory,
      format: options.format ?? config.output.format,
      tempDirectory: options.tempDir ?? config.output.tempDirectory,
      // commander defaults negatable flags to true, so only --no-cleanup counts
      cleanup: options.cleanup === false ? false : config.output.cleanup,
      saveHtml: options.saveHtml ?? config.output.saveHtml,
      saveHtmlBundle: options.saveHtmlBundle ?? config.output.saveHtmlBundle,
    },
    state: {
      database: options.dbPath ?? config.state.database,
    },
    page: {
      profile: options.profile ?? config.page.profile,
      margins: options.margins ?? config.page.margins,
    },
    diagrams: {
      ...config.diagrams,
      maxWidth: options.maxDiagramWidth
        ? toDimension(options.maxDiagramWidth)
        : config.diagrams.maxWidth,
      maxHeight: options.maxDiagramHeight
        ? toDimension(options.maxDiagramHeight)
        : config.diagrams.maxHeight,
    },
    ebook: {
      ...config.ebook,
      author: options.author ?? config.ebook.author,
      language: options.language ?? config.ebook.language,
    },
    workers: {
      count: workers,
      isolation: options.isolation ?? config.workers.isolation,
    },
    logging: {
      ...config.logging,
      level: options.verbose ? "debug" : config.logging.level,
    },
  };
}
