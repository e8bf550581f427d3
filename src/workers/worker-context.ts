/**
 * Worker context construction
 * Each worker owns its browser session, render adapters and toolchain handle
 */

import { setTimeout as delay } from "timers/promises";
import { BrowserSession } from "../render/browser-session";
import { createImageFitter } from "../render/fit-image";
import { PuppeteerEngine } from "../render/puppeteer-engine";
import { ScriptRenderAdapter } from "../render/script-adapter";
import { ServiceRenderAdapter } from "../render/service-adapter";
import {
  PlantUmlHttpClient,
  type DiagramServiceClientFactory,
} from "../render/service-client";
import { CommandToolchain, type Toolchain } from "../pipeline/toolchain";
import type { BrowserEngine } from "../render/engine";
import type { Logger } from "../utils/logger";
import type {
  ConversionSettings,
  ImageFitter,
  Sleep,
  WorkerContext,
} from "../types";

export interface WorkerDependencies {
  engine: BrowserEngine;
  createServiceClient: DiagramServiceClientFactory;
  toolchain: Toolchain;
  logger: Logger;
  fitImage?: ImageFitter;
  sleep?: Sleep;
}

const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Production collaborators: puppeteer, the PlantUML server, pandoc
 */
export function createDefaultDependencies(
  settings: ConversionSettings,
  logger: Logger,
): WorkerDependencies {
  return {
    engine: new PuppeteerEngine({ executablePath: settings.tools.chrome }),
    createServiceClient: () =>
      new PlantUmlHttpClient(settings.plantuml.server, settings.plantuml.timeout),
    toolchain: new CommandToolchain(settings.tools),
    logger,
  };
}

export function createWorkerContext(
  slot: number,
  settings: ConversionSettings,
  deps: WorkerDependencies,
): WorkerContext {
  const { logger, toolchain } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const fitImage = deps.fitImage ?? createImageFitter(logger);
  const session = new BrowserSession(deps.engine, logger);

  const adapters = {
    mermaid: new ScriptRenderAdapter({
      session,
      mermaid: settings.mermaid,
      maxWidth: settings.maxWidth,
      maxHeight: settings.maxHeight,
      fitImage,
      sleep,
      logger,
    }),
    plantuml: new ServiceRenderAdapter({
      dialect: "plantuml",
      label: "PlantUML",
      createClient: deps.createServiceClient,
      maxAttempts: settings.plantuml.retries,
      baseDelayMs: settings.plantuml.backoff,
      sleep,
      fitImage,
      logger,
    }),
  };

  return {
    slot,
    settings,
    session,
    adapters,
    toolchain,
    fitImage,
    sleep,
    logger,
    close: () => session.close(),
  };
}
