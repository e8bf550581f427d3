/**
 * Convert command - Loads config and runs the conversion batch
 */

import ora from "ora";
import { checkDependencies, createSettings, loadConfig, Logger, Tracker } from "../../utils";
import * as modules from "../../modules";
import { applyCliOverrides, ConvertOptionsSchema, type ConvertOptions } from "../options";
import type { ConversionContext, LogLevel } from "../../types";

/**
 * While the spinner is shown, per-document info lines would fight with it
 */
function effectiveLogLevel(level: LogLevel, spinner: boolean): LogLevel {
  if (spinner && (level === "info" || level === "debug")) return "warn";
  return level;
}

export async function convertCommand(opts: ConvertOptions): Promise<void> {
  const options = ConvertOptionsSchema.parse(opts);
  const spinner = ora({ text: "Initializing...", indent: 2 });

  try {
    // Load configuration (default → user → environment → custom → CLI)
    const loaded = await loadConfig(options.config);
    const config = applyCliOverrides(loaded.config, options);

    const showSpinner = config.logging.showProgress && !options.verbose;
    if (showSpinner) spinner.start();

    const logger = new Logger(effectiveLogLevel(config.logging.level, showSpinner));
    const tracker = new Tracker();

    // Add any config loading errors to tracker
    for (const err of loaded.errors) {
      tracker.trackResourceError(err.path, err.error);
      logger.warn(`Ignoring configuration file ${err.path}`);
    }

    const settings = {
      ...createSettings(config, { force: options.force }),
      logLevel: logger.currentLevel,
    };

    // Required tools must be present before any document is touched
    spinner.text = "Checking dependencies...";
    const missing = (await checkDependencies(settings)).filter((d) => !d.available);
    if (missing.length > 0) {
      spinner.fail("Missing required tools");
      for (const dependency of missing) {
        console.error(`  ${dependency.name} (${dependency.command}): ${dependency.error ?? "not available"}`);
      }
      process.exit(1);
    }

    const ctx: ConversionContext = {
      config,
      settings,
      tracker,
      logger,
      verbose: options.verbose,
      onProgress: (done, total, key) => {
        spinner.text = `Converting documents... ${done}/${total} (${key})`;
      },
    };

    spinner.text = "Scanning documents...";
    await modules.scan(ctx);

    spinner.text = "Converting documents...";
    await modules.convert(ctx);

    spinner.text = "Cleaning up...";
    await modules.cleanup(ctx);

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    await modules.stats(ctx);

    if (ctx.result && ctx.result.failed > 0) {
      process.exit(1);
    }
  } catch (error) {
    spinner.fail("Conversion failed");
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
