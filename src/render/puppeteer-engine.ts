/**
 * Puppeteer-backed browser engine
 */

import puppeteer from "puppeteer-core";
import type { Browser, ElementHandle, Page } from "puppeteer-core";
import { writeFile } from "fs/promises";
import type {
  BoundingBox,
  BrowserEngine,
  PdfPageOptions,
  RenderBrowser,
  RenderElement,
  RenderPage,
  ViewportSize,
} from "./engine";

const LAUNCH_ARGS = [
  "--disable-dev-shm-usage", // /dev/shm is tiny in containers
  "--disable-gpu",
  "--no-sandbox",
];

class PuppeteerElement implements RenderElement {
  constructor(private readonly handle: ElementHandle<Element>) {}

  boundingBox(): Promise<BoundingBox | null> {
    return this.handle.boundingBox();
  }

  async screenshot(path: string): Promise<void> {
    const data = await this.handle.screenshot({ type: "png" });
    await writeFile(path, data);
  }
}

class PuppeteerPage implements RenderPage {
  constructor(private readonly page: Page) {}

  async setViewport(size: ViewportSize): Promise<void> {
    await this.page.setViewport(size);
    await this.page.emulateMediaType("screen");
  }

  async setContent(html: string): Promise<void> {
    await this.page.setContent(html, { waitUntil: "load" });
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "networkidle0" });
  }

  async query(selector: string): Promise<RenderElement | null> {
    const handle = await this.page.$(selector);
    return handle ? new PuppeteerElement(handle) : null;
  }

  evaluate(script: string): Promise<unknown> {
    return this.page.evaluate(script);
  }

  async screenshot(path: string, options: { fullPage: boolean }): Promise<void> {
    const data = await this.page.screenshot({
      type: "png",
      fullPage: options.fullPage,
    });
    await writeFile(path, data);
  }

  async pdf(path: string, options: PdfPageOptions): Promise<void> {
    const data = await this.page.pdf({
      format: "A4",
      margin: options.margin,
      printBackground: true,
      preferCSSPageSize: true,
      displayHeaderFooter: true,
      headerTemplate: options.headerTemplate,
      footerTemplate: options.footerTemplate,
      scale: 1,
    });
    await writeFile(path, data);
  }

  isClosed(): boolean {
    return this.page.isClosed();
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}

class PuppeteerBrowser implements RenderBrowser {
  constructor(private readonly browser: Browser) {}

  get connected(): boolean {
    return this.browser.connected;
  }

  async newPage(): Promise<RenderPage> {
    return new PuppeteerPage(await this.browser.newPage());
  }

  async close(): Promise<void> {
    await this.browser.close();
  }

  kill(): void {
    this.browser.process()?.kill("SIGKILL");
  }
}

export interface PuppeteerEngineOptions {
  /** Chrome executable; null uses the installed stable channel */
  executablePath: string | null;
}

export class PuppeteerEngine implements BrowserEngine {
  constructor(private readonly options: PuppeteerEngineOptions) {}

  async launch(): Promise<RenderBrowser> {
    const browser = await puppeteer.launch({
      headless: true,
      args: LAUNCH_ARGS,
      ...(this.options.executablePath
        ? { executablePath: this.options.executablePath }
        : { channel: "chrome" as const }),
    });
    return new PuppeteerBrowser(browser);
  }
}
