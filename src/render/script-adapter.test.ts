import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile } from "fs/promises";
import { join } from "path";
import { BrowserSession } from "./browser-session";
import { ScriptRenderAdapter, scaleSvgScript } from "./script-adapter";
import { createWorkspace, removeWorkspace, testSettings } from "../testing/settings";
import {
  FAKE_PNG,
  FakeEngine,
  recordingSleep,
  silentLogger,
  type FakePageOptions,
} from "../testing/fakes";
import type { MermaidConfig, ResizePlan } from "../types";

const SOURCE = "graph TD\n  A --- B";

describe("ScriptRenderAdapter", () => {
  let root: string;
  let outputPath: string;

  beforeEach(async () => {
    root = await createWorkspace();
    outputPath = join(root, "mermaid_diagram_guide_0.png");
  });

  afterEach(async () => {
    await removeWorkspace(root);
  });

  function createAdapter(pageOptions: FakePageOptions = {}, mermaid: Partial<MermaidConfig> = {}) {
    const settings = testSettings(root);
    const engine = new FakeEngine(pageOptions);
    const session = new BrowserSession(engine, silentLogger());
    const { sleep, delays } = recordingSleep();
    const fitted: Array<{ path: string; plan: ResizePlan }> = [];
    const adapter = new ScriptRenderAdapter({
      session,
      mermaid: { ...settings.mermaid, ...mermaid },
      maxWidth: settings.maxWidth,
      maxHeight: settings.maxHeight,
      fitImage: async (path, plan) => {
        fitted.push({ path, plan });
        return true;
      },
      sleep,
      logger: silentLogger(),
    });
    return { adapter, engine, session, delays, fitted };
  }

  it("screenshots the diagram container once the layout settles", async () => {
    const { adapter, engine, delays } = createAdapter();

    const result = await adapter.render(SOURCE, outputPath, { kind: "none" });

    expect(result).toEqual({ ok: true, attempts: 1 });
    const [page] = engine.pages;
    expect(page.viewports).toEqual([{ width: 3360, height: 4480 }]);
    expect(page.contents[0]).toContain('<script src="https://example.test/mermaid.min.js"></script>');
    expect(page.contents[0]).toContain(`<pre class="mermaid">${SOURCE}</pre>`);
    expect(page.screenshots).toEqual([{ path: outputPath, fullPage: false }]);
    expect(delays).toEqual([50, 50, 50, 50]);
    expect(await readFile(outputPath, "utf-8")).toBe(FAKE_PNG);
  });

  it("reports diagram errors raised by the page", async () => {
    const { adapter, engine } = createAdapter({
      probes: [{ kind: "pending" }, { kind: "error", message: "Parse error on line 2" }],
    });

    const result = await adapter.render(SOURCE, outputPath, { kind: "none" });

    expect(result).toEqual({
      ok: false,
      error: "Mermaid syntax error: Parse error on line 2",
      attempts: 1,
    });
    expect(engine.pages[0].screenshots).toEqual([]);
  });

  it("captures the diagram even when it never appears", async () => {
    const { adapter, engine, delays } = createAdapter(
      { probes: [{ kind: "pending" }] },
      { timeout: 300 },
    );

    const result = await adapter.render(SOURCE, outputPath, { kind: "none" });

    expect(result).toEqual({ ok: true, attempts: 1 });
    expect(delays).toEqual([100, 100, 100]);
    expect(engine.pages[0].screenshots).toHaveLength(1);
  });

  it("captures the diagram even when the layout keeps moving", async () => {
    const widths = [100, 110, 120, 130, 140, 150, 160];
    const { adapter, engine, delays } = createAdapter(
      { boxes: widths.map((width) => ({ x: 0, y: 0, width, height: 80 })) },
      { timeout: 300 },
    );

    const result = await adapter.render(SOURCE, outputPath, { kind: "none" });

    expect(result).toEqual({ ok: true, attempts: 1 });
    expect(delays).toEqual([50, 50, 50, 50, 50, 50]);
    expect(engine.pages[0].screenshots).toEqual([{ path: outputPath, fullPage: false }]);
  });

  it("falls back to a full-page screenshot without a container", async () => {
    const { adapter, engine } = createAdapter({ hasContainer: false });

    await adapter.render(SOURCE, outputPath, { kind: "none" });

    expect(engine.pages[0].screenshots).toEqual([{ path: outputPath, fullPage: true }]);
  });

  it("scales the vector diagram to the target width before capture", async () => {
    const { adapter, engine, delays, fitted } = createAdapter();

    await adapter.render(SOURCE, outputPath, { kind: "fit-width", width: 840 });

    expect(engine.pages[0].scripts).toContain(scaleSvgScript(840));
    expect(delays[delays.length - 1]).toBe(100);
    expect(fitted).toEqual([]);
  });

  it("fits the captured image to bounds", async () => {
    const { adapter, fitted } = createAdapter();
    const plan: ResizePlan = {
      kind: "bounds",
      maxWidth: { kind: "pixels", value: 600 },
      maxHeight: { kind: "percent", value: 80 },
    };

    await adapter.render(SOURCE, outputPath, plan);

    expect(fitted).toEqual([{ path: outputPath, plan }]);
  });

  it("reports a session that cannot provide a page", async () => {
    const { adapter, session } = createAdapter();
    await session.close();

    const result = await adapter.render(SOURCE, outputPath, { kind: "none" });

    expect(result).toEqual({
      ok: false,
      error: "Failed to render Mermaid diagram: Error: Browser session is closed",
      attempts: 1,
    });
  });
});
