#!/usr/bin/env node

/**
 * CLI entry point for mdpress
 * Converts a directory of Markdown documents to PDF, EPUB or MOBI
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";
import { resetCommand } from "./commands/reset";
import { checkCommand } from "./commands/check";

const program = new Command();

program
  .name("mdpress")
  .description("Convert Markdown documents with diagrams to PDF, EPUB and MOBI")
  .version("0.1.0")
  .enablePositionalOptions();

// Main conversion command (default action)
program
  .option("-i, --input <path>", "Input directory containing Markdown files")
  .option("-o, --output <path>", "Output directory")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-f, --format <format>", "Output format: pdf, epub or mobi")
  .option("-p, --profile <name>", "Style profile (a4-print, a4-screen, kindle-basic, kindle-large, kindle-paperwhite-11)")
  .option("--margins <margins>", "Page margins, CSS style (e.g. \"1in 0.75in\")")
  .option("--max-diagram-width <size>", "Max diagram width in pixels or percent (e.g. 1680 or 80%)")
  .option("--max-diagram-height <size>", "Max diagram height in pixels or percent")
  .option("--temp-dir <path>", "Directory for intermediate files")
  .option("--db-path <path>", "Conversion state database")
  .option("-w, --workers <count>", "Number of parallel workers")
  .option("--isolation <mode>", "Worker isolation: process, thread or inline")
  .option("--no-parallel", "Convert one document at a time")
  .option("--force", "Reconvert every document")
  .option("--save-html", "Also save a self-contained HTML file per document")
  .option("--save-html-bundle", "Also save HTML with images in an assets directory")
  .option("--author <name>", "E-book author metadata")
  .option("--language <code>", "Document language (e.g. en)")
  .option("--no-cleanup", "Keep the temp directory after the run")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program
  .command("reset")
  .description("Forget all recorded conversions so every document is rebuilt")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--db-path <path>", "Conversion state database")
  .action(resetCommand);

program
  .command("check")
  .description("Verify the external tools needed for the output format")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-f, --format <format>", "Output format: pdf, epub or mobi")
  .action(checkCommand);

program.parse();
