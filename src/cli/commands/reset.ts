/**
 * Reset command - Forget every recorded conversion
 */

import chalk from "chalk";
import { createSettings, loadConfig } from "../../utils";
import { StateStore } from "../../state/state-store";
import { applyCliOverrides, ConvertOptionsSchema, type ConvertOptions } from "../options";

export async function resetCommand(opts: ConvertOptions): Promise<void> {
  try {
    const options = ConvertOptionsSchema.parse(opts);
    const { config } = await loadConfig(options.config);
    const settings = createSettings(applyCliOverrides(config, options));

    const store = new StateStore(settings.databasePath);
    try {
      const removed = store.deleteAll();
      console.log(
        `  ${chalk.green("✔")} Cleared ${removed} document record${removed === 1 ? "" : "s"} from ${chalk.dim(settings.databasePath)}`,
      );
    } finally {
      store.close();
    }
  } catch (error) {
    console.error(chalk.red(`Reset failed: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}
