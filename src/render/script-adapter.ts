/**
 * Script-driven render adapter
 * Renders Mermaid diagrams in the worker's headless browser
 */

import { z } from "zod";
import { renderMermaidPage } from "../templates";
import { viewportSize } from "../utils/dimension";
import { describeError } from "./classify";
import {
  waitForContent,
  waitForStableBox,
  type ContentProbe,
  type PollClock,
} from "./stabilization";
import type { BrowserSession } from "./browser-session";
import type { RenderPage } from "./engine";
import type { Logger } from "../utils/logger";
import type {
  DimensionLimit,
  ImageFitter,
  MermaidConfig,
  RenderAdapter,
  RenderResult,
  ResizePlan,
  Sleep,
} from "../types";

const CONTAINER_SELECTOR = ".mermaid";

export const PROBE_SCRIPT = `(() => {
  if (window.__diagramError) {
    return { kind: "error", message: String(window.__diagramError) };
  }
  const svg = document.querySelector(".mermaid svg");
  if (svg && svg.innerHTML.trim().length > 0) {
    return { kind: "ready" };
  }
  return { kind: "pending" };
})()`;

/**
 * Rescale the SVG from its viewBox (or rendered size) to the target width
 * before rasterizing, so the screenshot stays sharp.
 */
export function scaleSvgScript(targetWidth: number): string {
  return `((target) => {
  const svg = document.querySelector(".mermaid svg");
  if (!svg) return false;
  const apply = (width, height) => {
    const scale = target / width;
    svg.setAttribute("width", String(target));
    svg.setAttribute("height", String(Math.ceil(height * scale)));
    svg.style.maxWidth = "none";
    return true;
  };
  const viewBox = svg.getAttribute("viewBox");
  if (viewBox) {
    const parts = viewBox.split(/[\\s,]+/);
    const width = parseFloat(parts[2]);
    const height = parseFloat(parts[3]);
    if (width > 0 && height > 0) return apply(width, height);
  }
  const rect = svg.getBoundingClientRect();
  if (rect.width > 0) return apply(rect.width, rect.height);
  return false;
})(${targetWidth})`;
}

const ProbeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("pending") }),
  z.object({ kind: z.literal("ready") }),
  z.object({ kind: z.literal("error"), message: z.string() }),
]);

function parseProbe(value: unknown): ContentProbe {
  const parsed = ProbeSchema.safeParse(value);
  return parsed.success ? parsed.data : { kind: "pending" };
}

export interface ScriptAdapterOptions {
  session: BrowserSession;
  mermaid: MermaidConfig;
  maxWidth: DimensionLimit;
  maxHeight: DimensionLimit;
  fitImage: ImageFitter;
  sleep: Sleep;
  logger: Logger;
}

export class ScriptRenderAdapter implements RenderAdapter {
  readonly dialect = "mermaid" as const;

  constructor(private readonly options: ScriptAdapterOptions) {}

  async render(
    source: string,
    outputPath: string,
    plan: ResizePlan,
  ): Promise<RenderResult> {
    try {
      return await this.renderOnce(source, outputPath, plan);
    } catch (error) {
      return {
        ok: false,
        error: `Failed to render Mermaid diagram: ${describeError(error)}`,
        attempts: 1,
      };
    }
  }

  private async renderOnce(
    source: string,
    outputPath: string,
    plan: ResizePlan,
  ): Promise<RenderResult> {
    const { session, mermaid, logger, sleep } = this.options;

    const page = await session.ensureReady();
    await page.setViewport(viewportSize(this.options.maxWidth, this.options.maxHeight));
    await page.setContent(renderMermaidPage(source, mermaid.scriptUrl));

    const clock: PollClock = { elapsedMs: 0 };
    const appearance = await waitForContent(
      async () => parseProbe(await page.evaluate(PROBE_SCRIPT)),
      { timeoutMs: mermaid.timeout, intervalMs: mermaid.pollInterval, sleep },
      clock,
    );

    if (appearance.kind === "error") {
      return {
        ok: false,
        error: `Mermaid syntax error: ${appearance.message}`,
        attempts: 1,
      };
    }

    if (appearance.kind === "timeout") {
      logger.warn(`Mermaid SVG not found after ${mermaid.timeout}ms`);
    } else {
      logger.debug(`Mermaid SVG detected in ${clock.elapsedMs}ms`);
      await this.awaitStableLayout(page, clock);
    }

    if (plan.kind === "fit-width") {
      const scaled = await page.evaluate(scaleSvgScript(plan.width));
      if (scaled === true) {
        logger.debug(`Scaled SVG to ${plan.width}px wide before rasterization`);
      }
      await sleep(mermaid.relayoutDelay);
    }

    const container = await page.query(CONTAINER_SELECTOR);
    const box = container ? await container.boundingBox() : null;
    if (container && box) {
      await container.screenshot(outputPath);
    } else {
      await page.screenshot(outputPath, { fullPage: true });
    }

    if (plan.kind === "bounds") {
      await this.options.fitImage(outputPath, plan);
    }

    return { ok: true, attempts: 1 };
  }

  private async awaitStableLayout(page: RenderPage, clock: PollClock): Promise<void> {
    const { mermaid, logger, sleep } = this.options;

    const container = await page.query(CONTAINER_SELECTOR);
    if (!container) return;

    const start = clock.elapsedMs;
    const stable = await waitForStableBox(
      () => container.boundingBox(),
      {
        timeoutMs: mermaid.timeout,
        intervalMs: mermaid.stabilityInterval,
        checks: mermaid.stabilityChecks,
        tolerancePx: mermaid.tolerance,
        sleep,
      },
      clock,
    );

    if (stable) {
      logger.debug(
        `Mermaid layout stabilized in ${clock.elapsedMs - start}ms (total: ${clock.elapsedMs}ms)`,
      );
    } else {
      logger.warn(`Mermaid diagram dimensions did not stabilize after ${mermaid.timeout}ms`);
    }
  }
}
