import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFile } from "fs/promises";
import { join } from "path";
import { applyEnvironment, loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";
import { createWorkspace, removeWorkspace } from "../testing/settings";

describe("loadDefaultConfig", () => {
  it("reads the bundled defaults", async () => {
    const config = await loadDefaultConfig();

    expect(config.output.format).toBe("pdf");
    expect(config.page.margins).toBe("1in 0.75in");
    expect(config.workers).toEqual({ count: 4, isolation: "process" });
    expect(config.diagrams.plantuml.retries).toBe(3);
  });
});

describe("mergeConfig", () => {
  it("merges nested sections field by field", async () => {
    const base = await loadDefaultConfig();

    const merged = mergeConfig(base, {
      output: { format: "epub" },
      diagrams: { maxWidth: "80%", mermaid: { timeout: 10000 } },
    });

    expect(merged.output).toEqual({ ...base.output, format: "epub" });
    expect(merged.diagrams.maxWidth).toBe("80%");
    expect(merged.diagrams.maxHeight).toBe(2240);
    expect(merged.diagrams.mermaid).toEqual({ ...base.diagrams.mermaid, timeout: 10000 });
    expect(merged.diagrams.plantuml).toEqual(base.diagrams.plantuml);
  });
});

describe("applyEnvironment", () => {
  it("overrides machine-specific settings", async () => {
    const base = await loadDefaultConfig();

    const config = applyEnvironment(base, {
      PLANTUML_SERVER: "http://localhost:8080/plantuml",
      CHROME_PATH: "/opt/chrome/chrome",
      MDPRESS_DB_PATH: "/var/lib/mdpress/state.db",
    });

    expect(config.diagrams.plantuml).toEqual({
      ...base.diagrams.plantuml,
      server: "http://localhost:8080/plantuml",
    });
    expect(config.tools.chrome).toBe("/opt/chrome/chrome");
    expect(config.state.database).toBe("/var/lib/mdpress/state.db");
  });

  it("leaves the config alone without variables", async () => {
    const base = await loadDefaultConfig();

    expect(applyEnvironment(base, {})).toEqual(base);
  });
});

describe("loadConfig", () => {
  let root: string;

  beforeEach(async () => {
    root = await createWorkspace();
  });

  afterEach(async () => {
    await removeWorkspace(root);
  });

  it("applies a custom config file last", async () => {
    const path = join(root, "mdpress.json");
    await writeFile(path, JSON.stringify({ output: { format: "mobi" }, ebook: { author: "Jo Doe" } }));

    const { config, errors } = await loadConfig(path);

    expect(config.output.format).toBe("mobi");
    expect(config.ebook.author).toBe("Jo Doe");
    expect(errors.map((error) => error.path)).not.toContain(path);
  });

  it("reports an unreadable custom config instead of throwing", async () => {
    const path = join(root, "broken.json");
    await writeFile(path, "{ not json");

    const { errors } = await loadConfig(path);

    const error = errors.find((entry) => entry.path === path);
    expect(error?.error).toBeInstanceOf(SyntaxError);
  });

  it("rejects values of the wrong type", async () => {
    const path = join(root, "invalid.json");
    await writeFile(path, JSON.stringify({ workers: { count: "many" } }));

    const { config, errors } = await loadConfig(path);

    expect(errors.some((entry) => entry.path === path)).toBe(true);
    expect(config.workers.count).toBe(4);
  });
});
