/**
 * Browser Session Manager
 * Owns one headless browser and one page for a single worker
 */

import { describeError } from "./classify";
import type { Logger } from "../utils/logger";
import type { BrowserEngine, RenderBrowser, RenderPage } from "./engine";

export type SessionState = "unstarted" | "ready" | "stale" | "closed";

export class BrowserSession {
  private browser: RenderBrowser | null = null;
  private page: RenderPage | null = null;
  private closed = false;
  private launches = 0;

  constructor(
    private readonly engine: BrowserEngine,
    private readonly logger: Logger,
  ) {}

  get state(): SessionState {
    if (this.closed) return "closed";
    if (!this.browser) return "unstarted";
    if (!this.browser.connected || !this.page || this.page.isClosed()) {
      return "stale";
    }
    return "ready";
  }

  /** Number of browser launches so far */
  get launchCount(): number {
    return this.launches;
  }

  /**
   * Return a usable page, launching or relaunching the browser as needed.
   * A failed page open on a browser that claims to be connected gets one
   * full restart; a second failure propagates.
   */
  async ensureReady(): Promise<RenderPage> {
    if (this.closed) {
      throw new Error("Browser session is closed");
    }

    if (this.state === "ready" && this.page) {
      return this.page;
    }

    const browser =
      this.browser && this.browser.connected
        ? this.browser
        : await this.relaunch();

    try {
      this.page = await browser.newPage();
    } catch (error) {
      this.logger.warn(
        `Browser connection stale, restarting: ${describeError(error)}`,
      );
      const fresh = await this.relaunch();
      this.page = await fresh.newPage();
    }

    return this.page;
  }

  /**
   * Tear everything down; the next ensureReady() starts from scratch
   */
  async release(): Promise<void> {
    await this.teardown();
  }

  /**
   * Idempotent and terminal
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.teardown();
  }

  private async relaunch(): Promise<RenderBrowser> {
    await this.teardown();
    this.logger.debug("Launching browser");
    const browser = await this.engine.launch();
    this.launches++;
    this.browser = browser;
    return browser;
  }

  private async teardown(): Promise<void> {
    // Null the handles first so a crash mid-teardown cannot double-close
    const page = this.page;
    const browser = this.browser;
    this.page = null;
    this.browser = null;

    if (page) {
      try {
        if (!page.isClosed()) await page.close();
      } catch (error) {
        this.logger.debug(`Page close failed: ${describeError(error)}`);
      }
    }

    if (browser) {
      try {
        if (browser.connected) await browser.close();
      } catch (error) {
        this.logger.debug(`Browser close failed: ${describeError(error)}`);
      }
      try {
        browser.kill();
      } catch (error) {
        this.logger.debug(`Browser kill failed: ${describeError(error)}`);
      }
    }

    if (page || browser) {
      this.logger.debug("Browser instance closed and cleaned up");
    }
  }
}
