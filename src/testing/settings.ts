/**
 * Settings and workspace helpers for tests
 */

import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { ConversionSettings } from "../types";

export async function createWorkspace(): Promise<string> {
  return mkdtemp(join(tmpdir(), "mdpress-test-"));
}

export async function removeWorkspace(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

/**
 * PDF settings rooted in a scratch directory; fast polling values
 */
export function testSettings(
  root: string,
  overrides: Partial<ConversionSettings> = {},
): ConversionSettings {
  const format = overrides.format ?? "pdf";
  const outputDirectory = join(root, "output");

  return {
    inputDirectory: join(root, "docs"),
    outputDirectory,
    artifactDirectory: join(outputDirectory, format),
    tempDirectory: join(root, "temp"),
    databasePath: join(root, "state.db"),
    encoding: "utf-8",
    format,
    profile: "a4-print",
    margins: "1in 0.75in",
    maxWidth: { kind: "pixels", value: 1680 },
    maxHeight: { kind: "pixels", value: 2240 },
    force: false,
    saveHtml: false,
    saveHtmlBundle: false,
    ebook: { author: "Test Author", language: "en", tocDepth: 3 },
    mermaid: {
      scriptUrl: "https://example.test/mermaid.min.js",
      timeout: 5000,
      pollInterval: 100,
      stabilityInterval: 50,
      stabilityChecks: 3,
      tolerance: 1,
      relayoutDelay: 100,
    },
    plantuml: {
      server: "https://plantuml.example.test",
      retries: 3,
      backoff: 1000,
      timeout: 30000,
    },
    templates: { document: null, stylesheet: null },
    tools: { pandoc: "pandoc", ebookConvert: "ebook-convert", chrome: null },
    logLevel: "silent",
    ...overrides,
  };
}
