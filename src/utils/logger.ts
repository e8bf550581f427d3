/**
 * Logger Utility
 * Handles console output with different log levels
 */

import chalk from "chalk";
import type { LogLevel } from "../types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger {
  constructor(
    private level: LogLevel = "info",
    private scope?: string,
  ) {}

  get currentLevel(): LogLevel {
    return this.level;
  }

  /**
   * Create a logger that prefixes every message with a scope (e.g. "worker 2")
   */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(this.level, nested);
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.log(`${chalk.dim("[DEBUG]")} ${this.format(message)}`);
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.log(`${chalk.blue("[INFO]")} ${this.format(message)}`);
    }
  }

  success(message: string): void {
    if (this.enabled("info")) {
      console.log(`${chalk.green("[OK]")} ${this.format(message)}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(`${chalk.yellow("[WARN]")} ${this.format(message)}`);
    }
  }

  error(message: string, error?: Error): void {
    if (!this.enabled("error")) return;
    console.error(`${chalk.red("[ERROR]")} ${this.format(message)}`);
    if (error && this.level === "debug") {
      console.error(error);
    }
  }

  private enabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(message: string): string {
    return this.scope ? `${chalk.dim(`[${this.scope}]`)} ${message}` : message;
  }
}
