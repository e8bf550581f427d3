/**
 * Produce stage
 * Writes the final artifact: PDF through the browser, EPUB/MOBI through the toolchain
 */

import { join } from "path";
import { pathToFileURL } from "url";
import { PipelineError } from "../errors";
import { describeError, isBrowserCrash } from "../../render/classify";
import { withRetry, type AttemptOutcome } from "../../render/retry";
import { PDF_FOOTER_TEMPLATE, PDF_HEADER_TEMPLATE } from "../../templates";
import { formatCm, parseMargins } from "../../utils/margins";
import { isNonEmptyFile } from "../../utils/fs";
import type { PdfPageOptions } from "../../render/engine";
import type { TemplatedDocument } from "./html";
import type { ConversionSettings, SourceDocument, WorkerContext } from "../../types";

const PDF_ATTEMPTS = 2;

export function artifactPath(
  settings: ConversionSettings,
  document: SourceDocument,
): string {
  return join(settings.artifactDirectory, `${document.stem}.${settings.format}`);
}

export function pdfOptions(settings: ConversionSettings): PdfPageOptions {
  const margins = parseMargins(settings.margins);
  return {
    margin: {
      top: formatCm(margins.top),
      right: formatCm(margins.right),
      bottom: formatCm(margins.bottom),
      left: formatCm(margins.left),
    },
    headerTemplate: PDF_HEADER_TEMPLATE,
    footerTemplate: PDF_FOOTER_TEMPLATE,
  };
}

/**
 * A browser crash mid-print gets one retry on a fresh browser
 */
async function producePdf(
  templated: TemplatedDocument,
  outputPath: string,
  ctx: WorkerContext,
): Promise<void> {
  const { session, logger, settings } = ctx;
  const options = pdfOptions(settings);
  const url = pathToFileURL(templated.htmlPath).href;

  const attempt = async (): Promise<AttemptOutcome<void>> => {
    try {
      const page = await session.ensureReady();
      await page.goto(url);
      await page.pdf(outputPath, options);
      return { kind: "success", value: undefined };
    } catch (error) {
      const message = describeError(error);
      return isBrowserCrash(message)
        ? { kind: "retryable", error: message }
        : { kind: "fatal", error: message };
    }
  };

  const result = await withRetry(attempt, {
    maxAttempts: PDF_ATTEMPTS,
    baseDelayMs: 0,
    sleep: ctx.sleep,
    onRetry: async () => {
      logger.warn("Browser crashed during PDF generation, restarting and retrying...");
      await session.release();
    },
  });

  if (!result.ok) {
    throw new PipelineError("produce", `Failed to convert HTML to PDF: ${result.error}`);
  }
}

async function produceEbook(
  templated: TemplatedDocument,
  document: SourceDocument,
  outputPath: string,
  ctx: WorkerContext,
): Promise<void> {
  const { settings, toolchain } = ctx;
  const epubPath =
    settings.format === "mobi"
      ? join(settings.tempDirectory, `${document.stem}.epub`)
      : outputPath;

  try {
    await toolchain.htmlToEpub(templated.htmlPath, epubPath, {
      title: templated.title,
      author: settings.ebook.author,
      language: settings.ebook.language,
      tocDepth: settings.ebook.tocDepth,
      stylesheetPath: templated.stylesheetPath,
    });

    if (settings.format === "mobi") {
      await toolchain.epubToMobi(epubPath, outputPath);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PipelineError("produce", message);
  }
}

/**
 * Produce the artifact and check it landed on disk; returns its path
 */
export async function produceArtifact(
  templated: TemplatedDocument,
  document: SourceDocument,
  ctx: WorkerContext,
): Promise<string> {
  const outputPath = artifactPath(ctx.settings, document);

  if (ctx.settings.format === "pdf") {
    await producePdf(templated, outputPath, ctx);
  } else {
    await produceEbook(templated, document, outputPath, ctx);
  }

  if (!(await isNonEmptyFile(outputPath))) {
    throw new PipelineError(
      "produce",
      `Output file was not created or is empty: ${outputPath}`,
    );
  }

  return outputPath;
}
