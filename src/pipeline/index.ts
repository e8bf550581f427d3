/**
 * Conversion Pipeline
 * Converts one document: load → filter → diagrams → images → externalize →
 * template → produce → save-state
 */

import { readFile } from "fs/promises";
import { basename } from "path";
import { isPipelineError } from "./errors";
import { applyPageBreaks, stripTableOfContents } from "./stages/filter";
import { renderDiagrams } from "./stages/diagrams";
import { embedImages } from "./stages/images";
import { applyTemplate, externalize } from "./stages/html";
import { saveHtmlBundle, saveStandaloneHtml } from "./stages/html-export";
import { artifactPath, produceArtifact } from "./stages/produce";
import { describeError } from "../render/classify";
import { getProfile } from "../templates/profiles";
import { digest, hashFile, settingsFingerprint } from "../utils/fingerprint";
import { ensureDirectory, fileExists } from "../utils/fs";
import { checkStaleness } from "../utils/staleness";
import type { StateStore } from "../state/state-store";
import type {
  DocumentOutcome,
  PipelineStage,
  SourceDocument,
  WorkerContext,
} from "../types";

export { PipelineError, isPipelineError } from "./errors";
export type { Toolchain, EpubOptions } from "./toolchain";

/**
 * Never rejects: every failure becomes a `failed` outcome and leaves the
 * stored record untouched
 */
export async function convertDocument(
  document: SourceDocument,
  ctx: WorkerContext,
  store: StateStore,
): Promise<DocumentOutcome> {
  const { settings, logger } = ctx;
  const started = Date.now();
  const elapsed = () => Date.now() - started;
  let stage: PipelineStage = "load";

  try {
    // Load
    const bytes = await readFile(document.path);
    const sourceDigest = digest(bytes);
    const outputPath = artifactPath(settings, document);

    const verdict = checkStaleness({
      record: store.get(document.key),
      sourceDigest,
      artifactExists: await fileExists(outputPath),
      fingerprint: settingsFingerprint(settings),
      force: settings.force,
    });

    if (!verdict.regenerate) {
      logger.info(`Skipping ${document.key} - ${settings.format.toUpperCase()} is up to date`);
      return {
        key: document.key,
        status: "skipped",
        reason: verdict.reason,
        durationMs: elapsed(),
      };
    }

    logger.info(`Converting ${document.key} (${verdict.reason})`);
    await ensureDirectory(settings.tempDirectory);
    await ensureDirectory(settings.artifactDirectory);
    const original = bytes.toString(settings.encoding);

    // Filter
    stage = "filter";
    let content = original;
    if (getProfile(settings.profile).stripTableOfContents) {
      content = stripTableOfContents(content);
    }
    content = applyPageBreaks(content, settings.format === "pdf");

    // Diagrams
    stage = "diagrams";
    const diagrams = await renderDiagrams(content, document, ctx);
    content = diagrams.content;

    // Images
    stage = "images";
    content = await embedImages(content, document, settings, logger);

    // Externalize
    stage = "externalize";
    const fragment = await externalize(content, document, ctx);

    // Template
    stage = "template";
    const templated = await applyTemplate(fragment, original, document, ctx);
    if (settings.saveHtml) {
      await saveStandaloneHtml(templated.html, document, settings, logger);
    }
    if (settings.saveHtmlBundle) {
      await saveHtmlBundle(templated.html, document, settings, logger);
    }

    // Produce
    stage = "produce";
    const producedPath = await produceArtifact(templated, document, ctx);

    // Save state: only after the artifact is on disk
    stage = "save-state";
    store.upsert({
      key: document.key,
      sourceDigest,
      artifactDigest: await hashFile(producedPath),
      fingerprint: settingsFingerprint(settings),
      convertedAt: new Date(),
    });

    logger.success(`Converted ${document.key} to ${basename(producedPath)}`);
    return {
      key: document.key,
      status: "converted",
      reason: verdict.reason,
      artifactPath: producedPath,
      diagrams: diagrams.rendered,
      durationMs: elapsed(),
    };
  } catch (error) {
    const failedStage = isPipelineError(error) ? error.stage : stage;
    const message = isPipelineError(error) ? error.message : describeError(error);
    logger.error(`Failed to convert ${document.key} (${failedStage}): ${message}`);
    return {
      key: document.key,
      status: "failed",
      stage: failedStage,
      error: message,
      durationMs: elapsed(),
    };
  } finally {
    await ctx.session.release();
  }
}
