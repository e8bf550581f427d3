/**
 * Raster resizing for rendered diagrams
 */

import sharp from "sharp";
import { readFile, writeFile } from "fs/promises";
import { basename } from "path";
import { resolveDimension } from "../utils/dimension";
import { describeError } from "./classify";
import type { Logger } from "../utils/logger";
import type { ImageFitter, ResizePlan } from "../types";

export interface TargetSize {
  width: number;
  height: number;
  upscale: boolean;
}

/**
 * New size for an image of the given size, or null to keep it.
 * Aspect ratio is always preserved.
 */
export function targetSize(
  width: number,
  height: number,
  plan: ResizePlan,
): TargetSize | null {
  let scale: number;

  switch (plan.kind) {
    case "none":
      return null;
    case "fit-width":
      scale = plan.width / width;
      break;
    case "bounds": {
      const targetWidth = resolveDimension(plan.maxWidth, width);
      const targetHeight = resolveDimension(plan.maxHeight, height);
      if (targetWidth === null && targetHeight === null) return null;
      scale = Math.min(
        targetWidth === null ? Infinity : targetWidth / width,
        targetHeight === null ? Infinity : targetHeight / height,
      );
      break;
    }
  }

  if (scale === 1) return null;

  return {
    width: Math.max(1, Math.floor(width * scale)),
    height: Math.max(1, Math.floor(height * scale)),
    upscale: scale > 1,
  };
}

/**
 * Lanczos resize with a light sharpen (stronger when upscaling).
 * Failures are logged and reported as false; the original file stays in place.
 */
export function createImageFitter(logger: Logger): ImageFitter {
  return async (path, plan) => {
    if (plan.kind === "none") return true;

    try {
      const input = await readFile(path);
      const { width, height } = await sharp(input).metadata();
      if (!width || !height) {
        logger.warn(`Could not read image size of ${basename(path)}, skipping resize`);
        return false;
      }

      const target = targetSize(width, height, plan);
      if (!target) {
        logger.debug(`${basename(path)} (${width}x${height}) needs no resize`);
        return true;
      }

      const output = await sharp(input)
        .resize(target.width, target.height, { kernel: "lanczos3", fit: "fill" })
        .sharpen({ sigma: target.upscale ? 1 : 0.5 })
        .png()
        .toBuffer();
      await writeFile(path, output);

      logger.debug(
        `Resized ${basename(path)}: ${width}x${height} -> ${target.width}x${target.height}`,
      );
      return true;
    } catch (error) {
      logger.warn(`Failed to resize ${basename(path)}: ${describeError(error)}`);
      return false;
    }
  };
}
