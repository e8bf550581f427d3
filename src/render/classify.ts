/**
 * Error classification for retry and crash recovery
 */

const TRANSIENT_KEYWORDS = [
  "SSL",
  "SSLError",
  "ConnectionError",
  "ConnectionReset",
  "TimeoutError",
  "Timeout",
  "BrokenPipe",
  "RemoteDisconnected",
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "socket hang up",
  "fetch failed",
];

const BROWSER_CRASH_KEYWORDS = [
  "Connection closed",
  "Browser has been closed",
  "Target closed",
  "Session closed",
  "crashed",
  "Protocol error",
];

/**
 * Network-level failures worth another attempt (case-insensitive)
 */
export function isTransientError(message: string): boolean {
  const lower = message.toLowerCase();
  return TRANSIENT_KEYWORDS.some((keyword) =>
    lower.includes(keyword.toLowerCase()),
  );
}

export function isBrowserCrash(message: string): boolean {
  return BROWSER_CRASH_KEYWORDS.some((keyword) => message.includes(keyword));
}

/**
 * "<Name>: <message>", followed by the cause when there is one
 *
 * @example
 * describeError(new TypeError("fetch failed", { cause: econnreset }))
 * // "TypeError: fetch failed (Error: read ECONNRESET)"
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return `Error: ${String(error)}`;
  }

  const base = `${error.name}: ${error.message || "Unknown error"}`;
  const cause = error.cause;
  if (cause instanceof Error) {
    return `${base} (${cause.name}: ${cause.message})`;
  }
  return base;
}
