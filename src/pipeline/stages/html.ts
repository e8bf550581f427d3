/**
 * Externalize and template stages
 */

import { writeFile } from "fs/promises";
import { basename, join } from "path";
import { loadDocumentTemplates, renderDocument, renderStylesheet } from "../../templates";
import { extractTitle } from "../../utils/extract-title";
import type { SourceDocument, WorkerContext } from "../../types";

/**
 * Write the processed Markdown to the temp directory and convert it to an
 * HTML body fragment
 */
export async function externalize(
  content: string,
  document: SourceDocument,
  ctx: WorkerContext,
): Promise<string> {
  const markdownPath = join(ctx.settings.tempDirectory, `temp_${basename(document.path)}`);
  await writeFile(markdownPath, content, ctx.settings.encoding);
  return ctx.toolchain.markdownToHtml(markdownPath);
}

export interface TemplatedDocument {
  title: string;
  html: string;
  htmlPath: string;
  stylesheetPath: string;
}

/**
 * Wrap the fragment in the full document template.
 * The stylesheet is also written on its own for the e-book packager.
 */
export async function applyTemplate(
  fragment: string,
  originalContent: string,
  document: SourceDocument,
  ctx: WorkerContext,
): Promise<TemplatedDocument> {
  const { settings } = ctx;
  const templates = await loadDocumentTemplates(settings);

  const title = extractTitle(originalContent, document.stem);
  const stylesheet = renderStylesheet(templates.stylesheet, settings);
  const html = renderDocument(templates.document, {
    title,
    language: settings.ebook.language,
    stylesheet,
    content: fragment,
  });

  const htmlPath = join(settings.tempDirectory, `enhanced_${document.stem}.html`);
  const stylesheetPath = join(settings.tempDirectory, `${document.stem}.css`);
  await Promise.all([
    writeFile(htmlPath, html, "utf-8"),
    writeFile(stylesheetPath, stylesheet, "utf-8"),
  ]);

  return { title, html, htmlPath, stylesheetPath };
}
