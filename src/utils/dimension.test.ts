import { describe, it, expect } from "vitest";
import {
  formatDimension,
  pageWidthPx,
  parseDimension,
  resolveDimension,
  viewportSize,
} from "./dimension";

describe("parseDimension", () => {
  it("parses pixel counts", () => {
    expect(parseDimension(1680)).toEqual({ kind: "pixels", value: 1680 });
    expect(parseDimension(" 800 ")).toEqual({ kind: "pixels", value: 800 });
  });

  it("parses percentages", () => {
    expect(parseDimension("80%")).toEqual({ kind: "percent", value: 80 });
    expect(parseDimension("12.5%")).toEqual({ kind: "percent", value: 12.5 });
  });

  it("rejects zero and malformed values", () => {
    expect(() => parseDimension(0)).toThrow("Invalid dimension: 0. Use a positive pixel count.");
    expect(() => parseDimension("0%")).toThrow("Percentage must be greater than 0.");
    expect(() => parseDimension("wide")).toThrow(
      "Invalid dimension: 'wide'. Use pixels (e.g. 1680) or a percentage (e.g. 80%).",
    );
  });
});

describe("formatDimension", () => {
  it("formats both kinds", () => {
    expect(formatDimension({ kind: "pixels", value: 1680 })).toBe("1680");
    expect(formatDimension({ kind: "percent", value: 80 })).toBe("80%");
  });
});

describe("resolveDimension", () => {
  it("shrinks to a pixel limit only when exceeded", () => {
    expect(resolveDimension({ kind: "pixels", value: 800 }, 1000)).toBe(800);
    expect(resolveDimension({ kind: "pixels", value: 800 }, 600)).toBeNull();
    expect(resolveDimension({ kind: "pixels", value: 800 }, 800)).toBeNull();
  });

  it("always applies percentages, rounding down", () => {
    expect(resolveDimension({ kind: "percent", value: 50 }, 1001)).toBe(500);
    expect(resolveDimension({ kind: "percent", value: 150 }, 200)).toBe(300);
  });
});

describe("page geometry", () => {
  it("uses the pixel width as page width, else 1680", () => {
    expect(pageWidthPx({ kind: "pixels", value: 1200 })).toBe(1200);
    expect(pageWidthPx({ kind: "percent", value: 80 })).toBe(1680);
  });

  it("doubles pixel limits for the viewport", () => {
    expect(
      viewportSize({ kind: "pixels", value: 1000 }, { kind: "percent", value: 50 }),
    ).toEqual({ width: 2000, height: 4480 });
    expect(
      viewportSize({ kind: "percent", value: 50 }, { kind: "pixels", value: 900 }),
    ).toEqual({ width: 3360, height: 1800 });
  });
});
