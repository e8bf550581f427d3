/**
 * Cleanup Module
 * Removes the temp directory after the batch
 */

import { describeError } from "../render/classify";
import { removeDirectory } from "../utils/fs";
import type { ConversionContext } from "../types";

export async function cleanup(ctx: ConversionContext): Promise<void> {
  if (!ctx.config.output.cleanup) {
    ctx.logger.debug(`Keeping temp directory ${ctx.settings.tempDirectory}`);
    return;
  }

  try {
    await removeDirectory(ctx.settings.tempDirectory);
    ctx.logger.debug(`Cleaned up temp directory ${ctx.settings.tempDirectory}`);
  } catch (error) {
    ctx.logger.warn(`Failed to clean up temp directory: ${describeError(error)}`);
  }
}
