/**
 * Staleness Oracle
 * Decides whether a document must be reconverted
 */

import type { DocumentRecord, StalenessReason } from "../types";

export interface StalenessInput {
  record: DocumentRecord | undefined;
  sourceDigest: string;
  artifactExists: boolean;
  fingerprint: string;
  force: boolean;
}

export interface StalenessVerdict {
  regenerate: boolean;
  reason: StalenessReason;
}

/**
 * Check order matters: a missing artifact invalidates the record before
 * the digests are compared. Artifact bytes are never re-hashed here.
 */
export function checkStaleness(input: StalenessInput): StalenessVerdict {
  const { record, sourceDigest, artifactExists, fingerprint, force } = input;

  if (force) return { regenerate: true, reason: "forced" };
  if (!record) return { regenerate: true, reason: "untracked" };
  if (!artifactExists) return { regenerate: true, reason: "artifact-missing" };
  if (record.sourceDigest !== sourceDigest) {
    return { regenerate: true, reason: "source-changed" };
  }
  if (record.fingerprint !== fingerprint) {
    return { regenerate: true, reason: "config-changed" };
  }
  return { regenerate: false, reason: "up-to-date" };
}

export function needsRegeneration(
  record: DocumentRecord | undefined,
  sourceDigest: string,
  artifactExists: boolean,
  fingerprint: string,
  force: boolean,
): boolean {
  return checkStaleness({
    record,
    sourceDigest,
    artifactExists,
    fingerprint,
    force,
  }).regenerate;
}
