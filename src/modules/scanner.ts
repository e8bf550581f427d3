/**
 * Scanner Module
 * Discovers Markdown documents in the input directory
 */

import glob from "fast-glob";
import path from "node:path";
import type { ConversionContext, SourceDocument } from "../types";

/**
 * Numeric prefixes (01-, 02-, ...) sort numerically, everything else by name
 */
export function compareDocumentNames(a: string, b: string): number {
  const matchA = a.match(/^(\d+)-/);
  const matchB = b.match(/^(\d+)-/);

  if (matchA && matchB) {
    const byPrefix = parseInt(matchA[1], 10) - parseInt(matchB[1], 10);
    if (byPrefix !== 0) return byPrefix;
  }

  return a.localeCompare(b);
}

/**
 * Scans the input directory and writes the document list to context.
 * A document's key is its filename; a second file with the same name is skipped.
 */
export async function scan(ctx: ConversionContext): Promise<void> {
  const { config, settings, logger } = ctx;

  const files = await glob(config.input.pattern, {
    cwd: settings.inputDirectory,
    absolute: true,
    onlyFiles: true,
    ignore: config.input.exclude,
  });

  const sorted = files.sort((a, b) =>
    compareDocumentNames(path.basename(a), path.basename(b)),
  );

  const documents: SourceDocument[] = [];
  const seen = new Set<string>();

  for (const filePath of sorted) {
    const key = path.basename(filePath);
    if (seen.has(key)) {
      logger.warn(`Skipping ${filePath}: another document is already named ${key}`);
      continue;
    }
    seen.add(key);
    documents.push({
      key,
      path: filePath,
      stem: path.basename(key, path.extname(key)),
    });
  }

  if (documents.length === 0) {
    logger.warn("No markdown files found in source directory.");
  }

  ctx.tracker.setTotalDocuments(documents.length);
  ctx.documents = documents;
}
