/**
 * Image stage
 * Copies local images into the temp directory and points references at the copies
 */

import { copyFile } from "fs/promises";
import { basename, dirname, isAbsolute, join, resolve } from "path";
import { describeError } from "../../render/classify";
import { digest } from "../../utils/fingerprint";
import { fileExists } from "../../utils/fs";
import type { Logger } from "../../utils/logger";
import type { ConversionSettings, SourceDocument } from "../../types";

const MARKDOWN_IMAGE = /!\[([^\]]*)\]\(([^)]+)\)/g;
const HTML_IMAGE = /<img[^>]+src=["']([^"']+)["'][^>]*>/g;

function isExternal(reference: string): boolean {
  return reference.startsWith("http") || reference.startsWith("data:");
}

/**
 * Temp name for a copied image; the path digest keeps same-named files from
 * different folders apart
 */
export function embeddedImageName(stem: string, source: string): string {
  const tag = digest(resolve(source)).slice(0, 8);
  return `embedded_${stem}_${tag}_${basename(source)}`;
}

/**
 * Copy every referenced image once; returns reference -> copied path
 */
async function embedReferences(
  references: Set<string>,
  document: SourceDocument,
  settings: ConversionSettings,
  logger: Logger,
): Promise<Map<string, string>> {
  const embedded = new Map<string, string>();
  const documentDir = dirname(document.path);
  const tempDir = resolve(settings.tempDirectory);

  for (const reference of references) {
    if (isExternal(reference)) continue;

    const source = isAbsolute(reference) ? reference : join(documentDir, reference);
    if (resolve(source).startsWith(tempDir)) continue; // Rendered diagram

    if (!(await fileExists(source))) {
      logger.warn(`Image not found: ${source}`);
      continue;
    }

    const target = join(settings.tempDirectory, embeddedImageName(document.stem, source));
    try {
      await copyFile(source, target);
      embedded.set(reference, target);
      logger.debug(`Embedded image: ${reference} -> ${basename(target)}`);
    } catch (error) {
      logger.warn(`Failed to embed image ${reference}: ${describeError(error)}`);
    }
  }

  return embedded;
}

/**
 * Rewrite Markdown `![alt](path)` and HTML `<img src>` references.
 * Remote, data: and already-temp references are left alone.
 */
export async function embedImages(
  content: string,
  document: SourceDocument,
  settings: ConversionSettings,
  logger: Logger,
): Promise<string> {
  const references = new Set<string>();
  for (const match of content.matchAll(MARKDOWN_IMAGE)) references.add(match[2]);
  for (const match of content.matchAll(HTML_IMAGE)) references.add(match[1]);

  if (references.size === 0) return content;

  const embedded = await embedReferences(references, document, settings, logger);
  if (embedded.size === 0) return content;

  return content
    .replace(MARKDOWN_IMAGE, (full: string, alt: string, reference: string) => {
      const target = embedded.get(reference);
      return target ? `![${alt}](${target})` : full;
    })
    .replace(HTML_IMAGE, (full: string, reference: string) => {
      const target = embedded.get(reference);
      return target ? full.replace(reference, target) : full;
    });
}
