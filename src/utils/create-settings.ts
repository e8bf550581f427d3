/**
 * Resolve merged configuration into the plain settings handed to workers
 */

import path from "node:path";
import { DEFAULT_PROFILE, getProfile } from "../templates/profiles";
import { parseDimension } from "./dimension";
import { parseMargins } from "./margins";
import { getDefaultDatabasePath } from "./load-config";
import type { ConversionConfig, ConversionSettings } from "../types";

export interface SettingsOverrides {
  force?: boolean;
  cwd?: string;
}

/**
 * Throws when the profile does not support the output format or a
 * margin/dimension value is invalid.
 */
export function createSettings(
  config: ConversionConfig,
  overrides: SettingsOverrides = {},
): ConversionSettings {
  const cwd = overrides.cwd ?? process.cwd();
  const format = config.output.format;
  const profile = config.page.profile ?? DEFAULT_PROFILE[format];

  const definition = getProfile(profile);
  if (!definition.formats.includes(format)) {
    throw new Error(
      `Style profile '${profile}' does not support format '${format}'. ` +
        `Supported formats: ${definition.formats.join(", ")}`,
    );
  }

  // Validate early; workers parse again from the string
  parseMargins(config.page.margins);

  const outputDirectory = path.resolve(cwd, config.output.directory);

  return {
    inputDirectory: path.resolve(cwd, config.input.directory),
    outputDirectory,
    artifactDirectory: path.join(outputDirectory, format),
    tempDirectory: path.resolve(cwd, config.output.tempDirectory),
    databasePath: config.state.database
      ? path.resolve(cwd, config.state.database)
      : getDefaultDatabasePath(),
    encoding: config.input.encoding,
    format,
    profile,
    margins: config.page.margins,
    maxWidth: parseDimension(config.diagrams.maxWidth),
    maxHeight: parseDimension(config.diagrams.maxHeight),
    force: overrides.force ?? false,
    saveHtml: config.output.saveHtml,
    saveHtmlBundle: config.output.saveHtmlBundle,
    ebook: config.ebook,
    mermaid: config.diagrams.mermaid,
    plantuml: config.diagrams.plantuml,
    templates: {
      document: config.templates.document
        ? path.resolve(cwd, config.templates.document)
        : null,
      stylesheet: config.templates.stylesheet
        ? path.resolve(cwd, config.templates.stylesheet)
        : null,
    },
    tools: config.tools,
    logLevel: config.logging.level,
  };
}
