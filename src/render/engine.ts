/**
 * Browser automation port
 * The session and adapters only see these interfaces; puppeteer-engine.ts
 * implements them and tests use in-process fakes.
 */

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ViewportSize {
  width: number;
  height: number;
}

export interface PdfPageOptions {
  margin: { top: string; right: string; bottom: string; left: string };
  headerTemplate: string;
  footerTemplate: string;
}

export interface RenderElement {
  boundingBox(): Promise<BoundingBox | null>;
  screenshot(path: string): Promise<void>;
}

export interface RenderPage {
  setViewport(size: ViewportSize): Promise<void>;
  setContent(html: string): Promise<void>;
  goto(url: string): Promise<void>;
  query(selector: string): Promise<RenderElement | null>;
  evaluate(script: string): Promise<unknown>;
  screenshot(path: string, options: { fullPage: boolean }): Promise<void>;
  pdf(path: string, options: PdfPageOptions): Promise<void>;
  isClosed(): boolean;
  close(): Promise<void>;
}

export interface RenderBrowser {
  readonly connected: boolean;
  newPage(): Promise<RenderPage>;
  close(): Promise<void>;
  /** Force-terminate the host process */
  kill(): void;
}

export interface BrowserEngine {
  launch(): Promise<RenderBrowser>;
}
