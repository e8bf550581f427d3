/**
 * External tool availability check
 */

import { runProcess } from "./run-process";
import { fileExists } from "./fs";
import type { ConversionSettings } from "../types";

export interface DependencyStatus {
  name: string;
  command: string;
  available: boolean;
  version?: string;
  error?: string;
}

async function probeCommand(
  name: string,
  command: string,
  args: string[],
): Promise<DependencyStatus> {
  try {
    const result = await runProcess(command, args, { timeout: 15000 });
    if (result.code !== 0) {
      return {
        name,
        command,
        available: false,
        error: result.stderr.trim() || `exit code ${result.code}`,
      };
    }
    const firstLine = result.stdout.split(/\r?\n/)[0]?.trim();
    return { name, command, available: true, version: firstLine || undefined };
  } catch (error) {
    return {
      name,
      command,
      available: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Tools required for the configured output format.
 * Chrome is only verified when an explicit executable path is configured;
 * otherwise puppeteer resolves the installed stable channel at launch.
 */
export async function checkDependencies(
  settings: ConversionSettings,
): Promise<DependencyStatus[]> {
  const checks: Promise<DependencyStatus>[] = [
    probeCommand("pandoc", settings.tools.pandoc, ["--version"]),
  ];

  if (settings.format === "mobi") {
    checks.push(
      probeCommand("ebook-convert", settings.tools.ebookConvert, ["--version"]),
    );
  }

  const chrome = settings.tools.chrome;
  if (chrome) {
    checks.push(
      fileExists(chrome).then((available) => ({
        name: "chrome",
        command: chrome,
        available,
        error: available ? undefined : "Executable not found",
      })),
    );
  }

  return Promise.all(checks);
}
