/**
 * Fingerprint Hasher
 * Content digests for source files, artifacts and conversion settings
 */

import { createHash } from "node:crypto";
import { readFile } from "fs/promises";
import type { ConversionSettings, DimensionLimit } from "../types";

export interface FingerprintInput {
  profile: string;
  maxWidth: DimensionLimit;
  maxHeight: DimensionLimit;
  margins: string | null; // null for outputs without page margins
  pageBreaks: boolean;
}

/**
 * SHA-256 of the given bytes as lowercase hex
 */
export function digest(data: string | Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

export async function hashFile(path: string): Promise<string> {
  const bytes = await readFile(path);
  return digest(bytes);
}

function dimensionTag(limit: DimensionLimit): string {
  return limit.kind === "pixels" ? `px:${limit.value}` : `pct:${limit.value}`;
}

/**
 * Digest of the settings that affect the produced artifact.
 *
 * Fields are serialized as a fixed-order JSON array, so the encoding of one
 * field can never be confused with a neighbouring field.
 */
export function configFingerprint(input: FingerprintInput): string {
  const canonical = JSON.stringify([
    input.profile,
    dimensionTag(input.maxWidth),
    dimensionTag(input.maxHeight),
    input.margins ?? "",
    input.pageBreaks,
  ]);
  return digest(canonical);
}

/**
 * Margins and page breaks only apply to paged (PDF) output
 */
export function settingsFingerprint(settings: ConversionSettings): string {
  const paged = settings.format === "pdf";
  return configFingerprint({
    profile: settings.profile,
    maxWidth: settings.maxWidth,
    maxHeight: settings.maxHeight,
    margins: paged ? settings.margins : null,
    pageBreaks: paged,
  });
}
