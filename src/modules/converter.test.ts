import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, rm, writeFile } from "fs/promises";
import { join } from "path";
import { convert, type DependencyFactory } from "./converter";
import { scan } from "./scanner";
import { StateStore } from "../state/state-store";
import { loadDefaultConfig } from "../utils/load-config";
import { Tracker } from "../utils/tracker";
import { createWorkspace, removeWorkspace, testSettings } from "../testing/settings";
import {
  FakeEngine,
  FakeToolchain,
  pngBytes,
  recordingSleep,
  scriptedClientFactory,
  silentLogger,
} from "../testing/fakes";
import type { ConversionContext, IsolationMode } from "../types";

const DOCUMENTS: Record<string, string> = {
  "01-intro.md": "# Intro\n",
  "02-setup.md": "# Setup\n\n```mermaid\ngraph TD\n  A --- B\n```\n",
  "03-broken.md": "# Broken\n",
  "04-usage.md": "# Usage\n\n```plantuml\n@startuml\nA -> B\n@enduml\n```\n",
  "05-faq.md": "# FAQ\n",
};

const createDependencies: DependencyFactory = (_settings, logger) => {
  const toolchain = new FakeToolchain();
  toolchain.failFor.add("03-broken");
  return {
    engine: new FakeEngine(),
    createServiceClient: scriptedClientFactory([pngBytes()]).create,
    toolchain,
    logger,
    fitImage: async () => true,
    sleep: recordingSleep().sleep,
  };
};

describe("convert", () => {
  let root: string;

  beforeEach(async () => {
    root = await createWorkspace();
    await mkdir(join(root, "docs"), { recursive: true });
    for (const [name, content] of Object.entries(DOCUMENTS)) {
      await writeFile(join(root, "docs", name), content);
    }
  });

  afterEach(async () => {
    await removeWorkspace(root);
  });

  async function run(
    workers: number,
    isolation: IsolationMode = "inline",
  ): Promise<ConversionContext> {
    const defaults = await loadDefaultConfig();
    const ctx: ConversionContext = {
      config: { ...defaults, workers: { count: workers, isolation } },
      settings: testSettings(root),
      tracker: new Tracker(),
      logger: silentLogger(),
    };
    await scan(ctx);
    await convert(ctx, { createDependencies });
    return ctx;
  }

  function storedKeys(ctx: ConversionContext): string[] {
    const store = new StateStore(ctx.settings.databasePath);
    try {
      return Object.keys(DOCUMENTS).filter((key) => store.get(key) !== undefined);
    } finally {
      store.close();
    }
  }

  it.each([1, 4])("converts the batch with %i worker(s)", async (workers) => {
    const ctx = await run(workers);

    expect(ctx.result?.outcomes.map((o) => [o.key, o.status])).toEqual([
      ["01-intro.md", "converted"],
      ["02-setup.md", "converted"],
      ["03-broken.md", "failed"],
      ["04-usage.md", "converted"],
      ["05-faq.md", "converted"],
    ]);
    expect(storedKeys(ctx)).toEqual(["01-intro.md", "02-setup.md", "04-usage.md", "05-faq.md"]);

    const stats = ctx.tracker.getStats();
    expect(stats).toMatchObject({
      totalDocuments: 5,
      convertedDocuments: 4,
      skippedDocuments: 0,
      failedDocuments: 1,
      renderedDiagrams: 2,
    });
  });

  it("only retries failed documents on the next run", async () => {
    await run(4);

    const ctx = await run(4);

    expect(ctx.result?.outcomes.map((o) => o.status)).toEqual([
      "skipped",
      "skipped",
      "failed",
      "skipped",
      "skipped",
    ]);
    expect(ctx.result?.outcomes[2]).toMatchObject({ key: "03-broken.md", stage: "externalize" });
  });

  it("reports the same outcomes from forked workers as from inline ones", async () => {
    await rm(join(root, "docs", "03-broken.md"));
    await run(2);

    const inline = await run(2);
    const forked = await run(2, "process");

    const summary = (ctx: ConversionContext) =>
      ctx.result?.outcomes.map((o) => [o.key, o.status, o.reason]);
    expect(summary(forked)).toEqual(summary(inline));
    expect(summary(forked)).toEqual([
      ["01-intro.md", "skipped", "up-to-date"],
      ["02-setup.md", "skipped", "up-to-date"],
      ["04-usage.md", "skipped", "up-to-date"],
      ["05-faq.md", "skipped", "up-to-date"],
    ]);
  });
});
