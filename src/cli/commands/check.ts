/**
 * Check command - Verify the external tools for the configured format
 */

import chalk from "chalk";
import { checkDependencies, createSettings, loadConfig } from "../../utils";
import { applyCliOverrides, ConvertOptionsSchema, type ConvertOptions } from "../options";

export async function checkCommand(opts: ConvertOptions): Promise<void> {
  try {
    const options = ConvertOptionsSchema.parse(opts);
    const { config } = await loadConfig(options.config);
    const settings = createSettings(applyCliOverrides(config, options));

    const results = await checkDependencies(settings);
    for (const result of results) {
      const icon = result.available ? chalk.green("✔") : chalk.red("✖");
      const detail = result.available
        ? chalk.dim(result.version ?? result.command)
        : chalk.red(result.error ?? "not available");
      console.log(`  ${icon} ${result.name.padEnd(14)} ${detail}`);
    }

    if (!settings.tools.chrome) {
      console.log(`  ${chalk.yellow("◆")} ${"chrome".padEnd(14)} ${chalk.dim("installed stable channel, resolved at launch")}`);
    }

    if (results.some((r) => !r.available)) {
      process.exit(1);
    }
  } catch (error) {
    console.error(chalk.red(`Check failed: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}
