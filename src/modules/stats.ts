/**
 * Stats Module
 * Exports stats.json and prints the batch summary
 */

import chalk from "chalk";
import { ensureDirectory } from "../utils/fs";
import type { Tracker } from "../utils/tracker";
import type { ProcessingStats, ConversionContext } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a modern progress bar with percentage
 */
function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

/**
 * Section header with modern styling
 */
function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export stats to JSON and display processing statistics to console
 */
export async function stats(ctx: ConversionContext): Promise<void> {
  const { settings, tracker, verbose } = ctx;
  await ensureDirectory(settings.outputDirectory);
  await tracker.exportStats(settings.outputDirectory);

  const stats = tracker.getStats();
  const hasWarnings = tracker.getResourceIssues().length > 0;
  const hasErrors = stats.failedDocuments > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Conversion Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayDocumentsSection(stats);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayDocumentsSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Documents"));

  // Skipped documents are up to date, so they count as done
  const done = stats.convertedDocuments + stats.skippedDocuments;
  console.log(`   ${progressBar(done, stats.totalDocuments)}`);

  console.log(
    statRow(chalk.green("◉"), "Converted", stats.convertedDocuments, chalk.green),
  );

  if (stats.skippedDocuments > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Up to date", stats.skippedDocuments, chalk.cyan),
    );
  }

  if (stats.failedDocuments > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedDocuments, chalk.red),
    );
  }

  if (stats.renderedDiagrams > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Diagrams", stats.renderedDiagrams, chalk.cyan),
    );
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const documentIssues = tracker.getDocumentIssues();
  const resourceIssues = tracker.getResourceIssues();

  if (documentIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (documentIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Documents failed", documentIssues.length, chalk.red),
    );
    for (const issue of documentIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.stage})`)}`);
      if (verbose && issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Resources failed",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }
}
