/**
 * Diagram rendering types
 */

export type DiagramDialect = "mermaid" | "plantuml";

/**
 * Size limit for rendered diagrams.
 * - pixels: shrink only when the rendered size exceeds the value
 * - percent: always scale to this share of the rendered size
 */
export type DimensionLimit =
  | { kind: "pixels"; value: number }
  | { kind: "percent"; value: number };

/** Sizing modifier written as an HTML comment above a diagram fence */
export type SizingDirective =
  | { kind: "default" }
  | { kind: "scale"; percent: number }
  | { kind: "no-resize" };

/**
 * Concrete resize instruction handed to a render adapter.
 * PDF output fits diagrams to the page width, e-books bound them.
 */
export type ResizePlan =
  | { kind: "fit-width"; width: number }
  | { kind: "bounds"; maxWidth: DimensionLimit; maxHeight: DimensionLimit }
  | { kind: "none" };

export interface RenderJob {
  dialect: DiagramDialect;
  index: number;
  source: string;
  outputPath: string;
  sizing: SizingDirective;
}

export type RenderResult =
  | { ok: true; attempts: number }
  | { ok: false; error: string; attempts: number };

export interface RenderAdapter {
  readonly dialect: DiagramDialect;
  render(
    source: string,
    outputPath: string,
    plan: ResizePlan,
  ): Promise<RenderResult>;
}

/** Resizes a raster file in place; resolves false when nothing could be done */
export type ImageFitter = (path: string, plan: ResizePlan) => Promise<boolean>;

export type Sleep = (ms: number) => Promise<void>;
