import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { compareDocumentNames, scan } from "./scanner";
import { loadDefaultConfig, mergeConfig } from "../utils/load-config";
import { Tracker } from "../utils/tracker";
import { createWorkspace, removeWorkspace, testSettings } from "../testing/settings";
import { silentLogger } from "../testing/fakes";
import type { ConversionContext, PartialConversionConfig } from "../types";

describe("compareDocumentNames", () => {
  it("orders numeric prefixes numerically", () => {
    const names = ["10-advanced.md", "appendix.md", "2-basics.md", "1-intro.md"];

    expect(names.sort(compareDocumentNames)).toEqual([
      "1-intro.md",
      "2-basics.md",
      "10-advanced.md",
      "appendix.md",
    ]);
  });
});

describe("scan", () => {
  let root: string;

  beforeEach(async () => {
    root = await createWorkspace();
    await mkdir(join(root, "docs", "extra"), { recursive: true });
  });

  afterEach(async () => {
    await removeWorkspace(root);
  });

  async function createContext(override: PartialConversionConfig = {}): Promise<ConversionContext> {
    const config = mergeConfig(await loadDefaultConfig(), override);
    return {
      config,
      settings: testSettings(root),
      tracker: new Tracker(),
      logger: silentLogger(),
    };
  }

  it("finds Markdown documents in reading order", async () => {
    for (const name of ["10-advanced.md", "2-basics.md", "appendix.md", "README.md", "notes.txt"]) {
      await writeFile(join(root, "docs", name), "# Doc\n");
    }
    const ctx = await createContext();

    await scan(ctx);

    expect(ctx.documents).toEqual([
      { key: "2-basics.md", path: join(root, "docs", "2-basics.md"), stem: "2-basics" },
      { key: "10-advanced.md", path: join(root, "docs", "10-advanced.md"), stem: "10-advanced" },
      { key: "appendix.md", path: join(root, "docs", "appendix.md"), stem: "appendix" },
    ]);
    expect(ctx.tracker.getStats().totalDocuments).toBe(3);
  });

  it("keeps the first of two documents with the same name", async () => {
    await writeFile(join(root, "docs", "guide.md"), "# One\n");
    await writeFile(join(root, "docs", "extra", "guide.md"), "# Two\n");
    const ctx = await createContext({ input: { pattern: "**/*.md" } });
    const warn = vi.spyOn(ctx.logger, "warn");

    await scan(ctx);

    expect(ctx.documents?.map((document) => document.key)).toEqual(["guide.md"]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("warns when nothing is found", async () => {
    const ctx = await createContext();
    const warn = vi.spyOn(ctx.logger, "warn");

    await scan(ctx);

    expect(ctx.documents).toEqual([]);
    expect(warn).toHaveBeenCalledWith("No markdown files found in source directory.");
  });
});
