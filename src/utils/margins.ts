/**
 * Page margin parsing
 * Accepts CSS-style shorthand with 1, 2 or 4 values
 */

export type MarginUnit = "in" | "cm" | "mm" | "pt" | "px";

export interface MarginValue {
  value: number;
  unit: MarginUnit;
}

export interface Margins {
  top: MarginValue;
  right: MarginValue;
  bottom: MarginValue;
  left: MarginValue;
}

const MARGIN_PATTERN = /^(-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)\s*(cm|in|mm|pt|px)?$/;
const MAX_MARGIN_INCHES = 3;

const INCHES_PER_UNIT: Record<MarginUnit, number> = {
  in: 1,
  cm: 1 / 2.54,
  mm: 1 / 25.4,
  pt: 1 / 72,
  px: 1 / 96,
};

const CM_PER_UNIT: Record<MarginUnit, number> = {
  in: 2.54,
  cm: 1,
  mm: 0.1,
  pt: 0.0352778,
  px: 0.0264583,
};

function isMarginUnit(value: string): value is MarginUnit {
  return value in INCHES_PER_UNIT;
}

export function parseMarginValue(raw: string): MarginValue {
  const match = raw.trim().match(MARGIN_PATTERN);
  if (!match) {
    throw new Error(
      `Invalid margin format: '${raw}'. Use format like '1in', '2.5cm', '10mm', etc.`,
    );
  }

  const value = parseFloat(match[1]);
  const unit = match[2] && isMarginUnit(match[2]) ? match[2] : "in";
  const inches = value * INCHES_PER_UNIT[unit];

  if (inches < 0) {
    throw new Error(`Margin cannot be negative: '${raw}'. Minimum value is 0.`);
  }
  if (inches > MAX_MARGIN_INCHES) {
    throw new Error(
      `Margin too large: '${raw}'. Maximum value is 3 inches (7.62cm).`,
    );
  }

  return { value, unit };
}

/**
 * @example
 * parseMargins("1in 0.75in") // top/bottom 1in, left/right 0.75in
 */
export function parseMargins(value: string): Margins {
  const parts = value.trim().split(/\s+/).filter(Boolean);

  switch (parts.length) {
    case 1: {
      const all = parseMarginValue(parts[0]);
      return { top: all, right: all, bottom: all, left: all };
    }
    case 2: {
      const vertical = parseMarginValue(parts[0]);
      const horizontal = parseMarginValue(parts[1]);
      return {
        top: vertical,
        right: horizontal,
        bottom: vertical,
        left: horizontal,
      };
    }
    case 4:
      return {
        top: parseMarginValue(parts[0]),
        right: parseMarginValue(parts[1]),
        bottom: parseMarginValue(parts[2]),
        left: parseMarginValue(parts[3]),
      };
    default:
      throw new Error(
        `Invalid margin format: '${value}'. Use 1, 2, or 4 values.`,
      );
  }
}

export function marginToCm(margin: MarginValue): number {
  return margin.value * CM_PER_UNIT[margin.unit];
}

/**
 * Format as "<n>cm" with at most four decimals, for CSS and PDF options
 */
export function formatCm(margin: MarginValue): string {
  return `${Number(marginToCm(margin).toFixed(4))}cm`;
}
