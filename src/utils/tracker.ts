/**
 * Conversion Tracker
 * Unified tracking for batch stats and issues
 */

import { writeFile } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import type {
  BatchResult,
  DocumentIssue,
  DocumentOutcome,
  Issue,
  IssueType,
  ProcessingStats,
  ResourceIssue,
  ResourceIssueReason,
} from "../types";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => (e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message))
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: error instanceof Error ? error.message : String(error),
  };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalDocuments = 0;
  private convertedDocuments = 0;
  private skippedDocuments = 0;
  private failedDocuments = 0;
  private renderedDiagrams = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalDocuments(count: number): void {
    this.totalDocuments = count;
  }

  /**
   * Count one document outcome and record its failure, if any
   */
  trackOutcome(outcome: DocumentOutcome): void {
    switch (outcome.status) {
      case "converted":
        this.convertedDocuments++;
        this.renderedDiagrams += outcome.diagrams ?? 0;
        break;
      case "skipped":
        this.skippedDocuments++;
        break;
      case "failed":
        this.failedDocuments++;
        this.issues.push({
          type: "document",
          path: outcome.key,
          stage: outcome.stage ?? "worker",
          details: outcome.error,
        });
        break;
    }
  }

  trackBatch(result: BatchResult): void {
    this.setTotalDocuments(result.total);
    for (const outcome of result.outcomes) {
      this.trackOutcome(outcome);
    }
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  getDocumentIssues(): DocumentIssue[] {
    return this.issues.filter((i): i is DocumentIssue => i.type === "document");
  }

  getResourceIssues(): ResourceIssue[] {
    return this.issues.filter((i): i is ResourceIssue => i.type === "resource");
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      totalDocuments: this.totalDocuments,
      convertedDocuments: this.convertedDocuments,
      skippedDocuments: this.skippedDocuments,
      failedDocuments: this.failedDocuments,
      renderedDiagrams: this.renderedDiagrams,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputDir: string): Promise<void> {
    const stats = this.getStats();

    const exported = {
      summary: {
        totalDocuments: stats.totalDocuments,
        convertedDocuments: stats.convertedDocuments,
        skippedDocuments: stats.skippedDocuments,
        failedDocuments: stats.failedDocuments,
        renderedDiagrams: stats.renderedDiagrams,
        duration: stats.duration,
      },
      issues: {
        document: this.getDocumentIssues(),
        resource: this.groupResourceIssues(),
      },
    };

    const outputPath = join(outputDir, "stats.json");
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupResourceIssues(): Record<string, ResourceIssue[]> {
    const grouped: Record<string, ResourceIssue[]> = {};
    for (const issue of this.getResourceIssues()) {
      (grouped[issue.reason] ??= []).push(issue);
    }
    return grouped;
  }
}
