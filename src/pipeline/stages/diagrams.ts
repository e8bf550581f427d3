/**
 * Diagram stage
 * Replaces fenced Mermaid and PlantUML blocks with rendered PNG references
 */

import { join } from "path";
import { PipelineError } from "../errors";
import { pageWidthPx } from "../../utils/dimension";
import type {
  ConversionSettings,
  DiagramDialect,
  RenderJob,
  ResizePlan,
  SizingDirective,
  SourceDocument,
  WorkerContext,
} from "../../types";

export const DIALECT_LABELS: Record<DiagramDialect, string> = {
  mermaid: "Mermaid",
  plantuml: "PlantUML",
};

// Mermaid first: the browser session is released before PlantUML runs
const DIALECT_ORDER: DiagramDialect[] = ["mermaid", "plantuml"];

export interface DiagramBlock {
  index: number;
  source: string;
  sizing: SizingDirective;
  start: number;
  end: number;
}

function blockPattern(dialect: DiagramDialect): RegExp {
  return new RegExp(
    `(?:<!--\\s*(?:(no-resize)|scale:(\\d+)%)\\s*-->\\s*\\r?\\n)?\`\`\`${dialect}\\r?\\n([\\s\\S]*?)\\r?\\n\`\`\``,
    "gi",
  );
}

/**
 * Find fenced blocks of one dialect, with the optional sizing comment on
 * the line above. `onWarning` receives directives that were ignored.
 */
export function findDiagramBlocks(
  content: string,
  dialect: DiagramDialect,
  onWarning?: (message: string) => void,
): DiagramBlock[] {
  const blocks: DiagramBlock[] = [];
  let index = 0;

  for (const match of content.matchAll(blockPattern(dialect))) {
    const [full, noResize, scale, source] = match;
    const start = match.index ?? 0;

    let sizing: SizingDirective = { kind: "default" };
    if (noResize !== undefined) {
      sizing = { kind: "no-resize" };
    } else if (scale !== undefined) {
      const percent = parseInt(scale, 10);
      if (percent > 0) {
        sizing = { kind: "scale", percent };
      } else {
        onWarning?.(
          `Scale percentage must be greater than 0%, got ${scale}%. Using default (100%).`,
        );
      }
    }

    blocks.push({ index, source, sizing, start, end: start + full.length });
    index++;
  }

  return blocks;
}

/**
 * PDF diagrams are fitted to the page width; e-book diagrams are bounded
 * by the configured limits
 */
export function planResize(
  sizing: SizingDirective,
  settings: ConversionSettings,
): ResizePlan {
  if (sizing.kind === "no-resize") {
    return { kind: "none" };
  }

  const percent = sizing.kind === "scale" ? sizing.percent : 100;

  if (settings.format === "pdf") {
    return {
      kind: "fit-width",
      width: Math.floor((pageWidthPx(settings.maxWidth) * percent) / 100),
    };
  }

  if (sizing.kind === "scale") {
    return {
      kind: "bounds",
      maxWidth: { kind: "percent", value: percent },
      maxHeight: { kind: "percent", value: percent },
    };
  }

  return {
    kind: "bounds",
    maxWidth: settings.maxWidth,
    maxHeight: settings.maxHeight,
  };
}

export function diagramImagePath(
  tempDirectory: string,
  dialect: DiagramDialect,
  stem: string,
  index: number,
): string {
  return join(tempDirectory, `${dialect}_diagram_${stem}_${index}.png`);
}

async function renderDialect(
  content: string,
  dialect: DiagramDialect,
  document: SourceDocument,
  ctx: WorkerContext,
): Promise<{ content: string; rendered: number }> {
  const { settings, logger } = ctx;
  const label = DIALECT_LABELS[dialect];
  const blocks = findDiagramBlocks(content, dialect, (message) => logger.warn(message));

  if (blocks.length === 0) {
    return { content, rendered: 0 };
  }

  let result = "";
  let cursor = 0;

  for (const block of blocks) {
    const job: RenderJob = {
      dialect,
      index: block.index,
      source: block.source,
      outputPath: diagramImagePath(settings.tempDirectory, dialect, document.stem, block.index),
      sizing: block.sizing,
    };

    const modifier =
      job.sizing.kind === "no-resize"
        ? " (no-resize)"
        : job.sizing.kind === "scale"
          ? ` (scale:${job.sizing.percent}%)`
          : "";
    logger.debug(`Rendering ${label} diagram ${job.index} to: ${job.outputPath}${modifier}`);

    const outcome = await ctx.adapters[dialect].render(
      job.source,
      job.outputPath,
      planResize(job.sizing, settings),
    );
    if (!outcome.ok) {
      throw new PipelineError(
        "diagrams",
        `${label} diagram ${job.index} failed to render: ${outcome.error}`,
      );
    }

    result += content.slice(cursor, block.start) + `![](${job.outputPath})`;
    cursor = block.end;
  }

  result += content.slice(cursor);
  return { content: result, rendered: blocks.length };
}

/**
 * Render every diagram of the document, Mermaid then PlantUML.
 * Any failed diagram aborts the document.
 */
export async function renderDiagrams(
  content: string,
  document: SourceDocument,
  ctx: WorkerContext,
): Promise<{ content: string; rendered: number }> {
  let current = content;
  let rendered = 0;

  for (const dialect of DIALECT_ORDER) {
    const pass = await renderDialect(current, dialect, document, ctx);
    current = pass.content;
    rendered += pass.rendered;

    if (dialect === "mermaid") {
      // Free the browser before the rest of the pipeline
      await ctx.session.release();
    }
  }

  return { content: current, rendered };
}
