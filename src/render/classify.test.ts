import { describe, it, expect } from "vitest";
import { describeError, isBrowserCrash, isTransientError } from "./classify";

describe("isTransientError", () => {
  it("matches network failures case-insensitively", () => {
    expect(isTransientError("Error: read ECONNRESET")).toBe(true);
    expect(isTransientError("TimeoutError: The operation was aborted due to timeout")).toBe(true);
    expect(isTransientError("ssl handshake failed")).toBe(true);
    expect(isTransientError("TypeError: fetch failed")).toBe(true);
  });

  it("does not match other failures", () => {
    expect(isTransientError("Error: HTTP 400: Bad Request")).toBe(false);
    expect(isTransientError("Syntax error in diagram")).toBe(false);
  });
});

describe("isBrowserCrash", () => {
  it("matches crash messages", () => {
    expect(isBrowserCrash("Protocol error (Page.printToPDF): Target closed")).toBe(true);
    expect(isBrowserCrash("Navigation failed because browser has crashed")).toBe(true);
  });

  it("is case-sensitive", () => {
    expect(isBrowserCrash("target closed")).toBe(false);
  });
});

describe("describeError", () => {
  it("includes the error name", () => {
    expect(describeError(new TypeError("bad value"))).toBe("TypeError: bad value");
  });

  it("appends the cause", () => {
    const error = new TypeError("fetch failed", { cause: new Error("read ECONNRESET") });
    expect(describeError(error)).toBe("TypeError: fetch failed (Error: read ECONNRESET)");
  });

  it("handles non-errors", () => {
    expect(describeError("boom")).toBe("Error: boom");
  });
});
