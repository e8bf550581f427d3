/**
 * In-process stand-ins for the browser, the diagram service and the
 * document toolchain
 */

import { readFile, writeFile } from "fs/promises";
import { Logger } from "../utils/logger";
import type {
  BoundingBox,
  BrowserEngine,
  PdfPageOptions,
  RenderBrowser,
  RenderElement,
  RenderPage,
  ViewportSize,
} from "../render/engine";
import type { DiagramServiceClient } from "../render/service-client";
import type { EpubOptions, Toolchain } from "../pipeline/toolchain";
import type { ContentProbe } from "../render/stabilization";
import type { Sleep } from "../types";

export const FAKE_PNG = "fake-png-bytes";
export const FAKE_PDF = "%PDF-fake";

export function silentLogger(): Logger {
  return new Logger("silent");
}

/** Records requested delays and resolves at once */
export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

// ============================================================================
// Browser
// ============================================================================

export interface FakePageOptions {
  /** Results of the appearance probe, in order; the last one repeats */
  probes?: ContentProbe[];
  /** Container bounding boxes, in order; the last one repeats */
  boxes?: Array<BoundingBox | null>;
  /** Whether the diagram container exists */
  hasContainer?: boolean;
  /** Errors thrown by successive pdf() calls across all pages; undefined entries succeed */
  pdfErrors?: Array<Error | undefined>;
}

class FakeElement implements RenderElement {
  constructor(private readonly page: FakePage) {}

  async boundingBox(): Promise<BoundingBox | null> {
    return this.page.nextBox();
  }

  async screenshot(path: string): Promise<void> {
    this.page.screenshots.push({ path, fullPage: false });
    await writeFile(path, FAKE_PNG);
  }
}

export class FakePage implements RenderPage {
  readonly viewports: ViewportSize[] = [];
  readonly contents: string[] = [];
  readonly urls: string[] = [];
  readonly scripts: string[] = [];
  readonly screenshots: Array<{ path: string; fullPage: boolean }> = [];
  readonly pdfs: Array<{ path: string; options: PdfPageOptions }> = [];
  private closed = false;
  private probeIndex = 0;
  private boxIndex = 0;

  constructor(
    private readonly options: FakePageOptions = {},
    private readonly nextPdfError: () => Error | undefined = () => undefined,
  ) {}

  async setViewport(size: ViewportSize): Promise<void> {
    this.viewports.push(size);
  }

  async setContent(html: string): Promise<void> {
    this.contents.push(html);
  }

  async goto(url: string): Promise<void> {
    this.urls.push(url);
  }

  async query(): Promise<RenderElement | null> {
    return this.options.hasContainer === false ? null : new FakeElement(this);
  }

  async evaluate(script: string): Promise<unknown> {
    this.scripts.push(script);
    if (script.includes("__diagramError")) {
      const probes = this.options.probes ?? [{ kind: "ready" }];
      const probe = probes[Math.min(this.probeIndex, probes.length - 1)];
      this.probeIndex++;
      return probe;
    }
    return true;
  }

  async screenshot(path: string, options: { fullPage: boolean }): Promise<void> {
    this.screenshots.push({ path, fullPage: options.fullPage });
    await writeFile(path, FAKE_PNG);
  }

  async pdf(path: string, options: PdfPageOptions): Promise<void> {
    const error = this.nextPdfError();
    if (error) throw error;
    this.pdfs.push({ path, options });
    await writeFile(path, FAKE_PDF);
  }

  isClosed(): boolean {
    return this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  nextBox(): BoundingBox | null {
    const boxes = this.options.boxes ?? [{ x: 0, y: 0, width: 400, height: 300 }];
    const box = boxes[Math.min(this.boxIndex, boxes.length - 1)];
    this.boxIndex++;
    return box;
  }
}

export class FakeBrowser implements RenderBrowser {
  connected = true;
  closeCount = 0;
  killCount = 0;
  readonly pages: FakePage[] = [];
  /** Number of upcoming newPage() calls that fail */
  failNewPage = 0;

  constructor(private readonly createPage: () => FakePage) {}

  async newPage(): Promise<RenderPage> {
    if (this.failNewPage > 0) {
      this.failNewPage--;
      throw new Error("Target closed");
    }
    const page = this.createPage();
    this.pages.push(page);
    return page;
  }

  async close(): Promise<void> {
    this.closeCount++;
    this.connected = false;
  }

  kill(): void {
    this.killCount++;
  }
}

export class FakeEngine implements BrowserEngine {
  readonly browsers: FakeBrowser[] = [];
  private pdfCalls = 0;

  constructor(private readonly pageOptions: FakePageOptions = {}) {}

  async launch(): Promise<RenderBrowser> {
    const browser = new FakeBrowser(
      () => new FakePage(this.pageOptions, () => this.pageOptions.pdfErrors?.[this.pdfCalls++]),
    );
    this.browsers.push(browser);
    return browser;
  }

  get pages(): FakePage[] {
    return this.browsers.flatMap((browser) => browser.pages);
  }
}

// ============================================================================
// Diagram service
// ============================================================================

/**
 * Each render() consumes the next scripted response; the last one repeats
 */
export class FakeServiceClient implements DiagramServiceClient {
  readonly sources: string[] = [];

  constructor(private readonly responses: Array<Uint8Array | Error>) {}

  async render(source: string): Promise<Uint8Array> {
    this.sources.push(source);
    const next = this.responses.length > 1 ? this.responses.shift() : this.responses[0];
    if (next instanceof Error) throw next;
    return next ?? new Uint8Array();
  }
}

/**
 * Factory sharing one response script between every client it builds
 */
export function scriptedClientFactory(responses: Array<Uint8Array | Error>): {
  create: () => DiagramServiceClient;
  clients: FakeServiceClient[];
} {
  const clients: FakeServiceClient[] = [];
  return {
    clients,
    create: () => {
      const client = new FakeServiceClient(responses);
      clients.push(client);
      return client;
    },
  };
}

export function pngBytes(): Uint8Array {
  return new TextEncoder().encode(FAKE_PNG);
}

// ============================================================================
// Toolchain
// ============================================================================

export class FakeToolchain implements Toolchain {
  readonly markdownInputs: string[] = [];
  readonly epubCalls: Array<{ htmlPath: string; outputPath: string; options: EpubOptions }> = [];
  readonly mobiCalls: Array<{ epubPath: string; outputPath: string }> = [];
  /** Keys (filenames without extension) whose externalization fails */
  readonly failFor = new Set<string>();

  async markdownToHtml(markdownPath: string): Promise<string> {
    const markdown = await readFile(markdownPath, "utf-8");
    this.markdownInputs.push(markdown);
    for (const key of this.failFor) {
      if (markdownPath.endsWith(`temp_${key}.md`)) {
        throw new Error(`Pandoc failed: cannot parse ${key}`);
      }
    }
    return `<main>\n${markdown}\n</main>`;
  }

  async htmlToEpub(htmlPath: string, outputPath: string, options: EpubOptions): Promise<void> {
    this.epubCalls.push({ htmlPath, outputPath, options });
    await writeFile(outputPath, "fake-epub");
  }

  async epubToMobi(epubPath: string, outputPath: string): Promise<void> {
    this.mobiCalls.push({ epubPath, outputPath });
    await writeFile(outputPath, "fake-mobi");
  }
}
