/**
 * Optional HTML side outputs
 *   --save-html         html/<stem>.html with images inlined as data URIs
 *   --save-html-bundle  html/<stem>/<stem>.html with images under assets/
 */

import { load } from "cheerio";
import { copyFile, readFile, writeFile } from "fs/promises";
import { basename, extname, join } from "path";
import { ensureDirectory, fileExists } from "../../utils/fs";
import type { Logger } from "../../utils/logger";
import type { ConversionSettings, SourceDocument } from "../../types";

const IMAGE_MIME_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".svg": "image/svg+xml",
  ".webp": "image/webp",
};

function mimeType(path: string): string {
  return IMAGE_MIME_TYPES[extname(path).toLowerCase()] ?? "application/octet-stream";
}

/** Local file references only */
function isLocalFile(src: string): boolean {
  return src.length > 0 && !src.startsWith("data:") && !/^[a-z]+:\/\//i.test(src);
}

/**
 * Replace local <img src> paths; `rewrite` returns the new src or null to keep it
 */
async function rewriteImages(
  html: string,
  rewrite: (src: string) => Promise<string | null>,
): Promise<{ html: string; rewritten: number }> {
  const $ = load(html);
  let rewritten = 0;

  for (const element of $("img").toArray()) {
    const src = $(element).attr("src");
    if (!src || !isLocalFile(src) || !(await fileExists(src))) continue;

    const replacement = await rewrite(src);
    if (replacement !== null) {
      $(element).attr("src", replacement);
      rewritten++;
    }
  }

  return { html: $.html(), rewritten };
}

export async function saveStandaloneHtml(
  html: string,
  document: SourceDocument,
  settings: ConversionSettings,
  logger: Logger,
): Promise<string> {
  const htmlDir = join(settings.outputDirectory, "html");
  await ensureDirectory(htmlDir);

  const result = await rewriteImages(html, async (src) => {
    const bytes = await readFile(src);
    return `data:${mimeType(src)};base64,${bytes.toString("base64")}`;
  });

  const outputPath = join(htmlDir, `${document.stem}.html`);
  await writeFile(outputPath, result.html, "utf-8");
  logger.debug(`Saved HTML to ${outputPath}`);
  return outputPath;
}

export async function saveHtmlBundle(
  html: string,
  document: SourceDocument,
  settings: ConversionSettings,
  logger: Logger,
): Promise<string> {
  const bundleDir = join(settings.outputDirectory, "html", document.stem);
  const assetsDir = join(bundleDir, "assets");
  await ensureDirectory(assetsDir);

  // Copy each file once, reuse its relative path for duplicates
  const copied = new Map<string, string>();
  const result = await rewriteImages(html, async (src) => {
    const known = copied.get(src);
    if (known) return known;

    const name = basename(src);
    await copyFile(src, join(assetsDir, name));
    const relative = `assets/${name}`;
    copied.set(src, relative);
    return relative;
  });

  const outputPath = join(bundleDir, `${document.stem}.html`);
  await writeFile(outputPath, result.html, "utf-8");
  logger.info(`Saved HTML bundle to ${bundleDir} (${copied.size} assets)`);
  return outputPath;
}
