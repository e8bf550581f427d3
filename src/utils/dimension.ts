/**
 * Diagram dimension limits
 */

import type { DimensionLimit, DimensionValue } from "../types";

const DEFAULT_PAGE_WIDTH = 1680;
const DEFAULT_VIEWPORT = { width: 3360, height: 4480 };

/**
 * Parse a configured or command-line limit.
 *
 * @example
 * parseDimension(1680)   // { kind: "pixels", value: 1680 }
 * parseDimension("800")  // { kind: "pixels", value: 800 }
 * parseDimension("80%")  // { kind: "percent", value: 80 }
 */
export function parseDimension(value: DimensionValue): DimensionLimit {
  if (typeof value === "number") {
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`Invalid dimension: ${value}. Use a positive pixel count.`);
    }
    return { kind: "pixels", value };
  }

  const trimmed = value.trim();
  const percent = trimmed.match(/^(\d+(?:\.\d+)?)%$/);
  if (percent) {
    const parsed = parseFloat(percent[1]);
    if (parsed <= 0) {
      throw new Error(`Invalid dimension: '${value}'. Percentage must be greater than 0.`);
    }
    return { kind: "percent", value: parsed };
  }

  if (/^\d+$/.test(trimmed)) {
    return parseDimension(parseInt(trimmed, 10));
  }

  throw new Error(
    `Invalid dimension: '${value}'. Use pixels (e.g. 1680) or a percentage (e.g. 80%).`,
  );
}

/**
 * Target size for one axis, or null when the image keeps its size.
 * Pixel limits only shrink, percentages always apply.
 */
export function resolveDimension(
  limit: DimensionLimit,
  natural: number,
): number | null {
  if (limit.kind === "percent") {
    return Math.floor((natural * limit.value) / 100);
  }
  return natural > limit.value ? limit.value : null;
}

/**
 * Page content width in pixels used to fit diagrams
 */
export function pageWidthPx(maxWidth: DimensionLimit): number {
  return maxWidth.kind === "pixels" ? maxWidth.value : DEFAULT_PAGE_WIDTH;
}

/**
 * Browser viewport for diagram layout: twice the pixel limits so diagrams
 * lay out at full size before they are fitted.
 */
export function viewportSize(
  maxWidth: DimensionLimit,
  maxHeight: DimensionLimit,
): { width: number; height: number } {
  return {
    width: maxWidth.kind === "pixels" ? maxWidth.value * 2 : DEFAULT_VIEWPORT.width,
    height: maxHeight.kind === "pixels" ? maxHeight.value * 2 : DEFAULT_VIEWPORT.height,
  };
}
