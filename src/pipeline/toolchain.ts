/**
 * External document toolchain
 * pandoc turns Markdown into HTML and HTML into EPUB, ebook-convert packs MOBI
 */

import { runProcess } from "../utils/run-process";
import type { ToolsConfig } from "../types";

export interface EpubOptions {
  title: string;
  author: string;
  language: string;
  tocDepth: number;
  stylesheetPath: string | null;
}

export interface Toolchain {
  /** Convert a Markdown file to an HTML5 body fragment */
  markdownToHtml(markdownPath: string): Promise<string>;
  htmlToEpub(htmlPath: string, outputPath: string, options: EpubOptions): Promise<void>;
  epubToMobi(epubPath: string, outputPath: string): Promise<void>;
}

export class CommandToolchain implements Toolchain {
  constructor(private readonly tools: ToolsConfig) {}

  async markdownToHtml(markdownPath: string): Promise<string> {
    const result = await runProcess(this.tools.pandoc, [
      markdownPath,
      "--from",
      "markdown",
      "--to",
      "html5",
    ]);

    if (result.code !== 0) {
      throw new Error(`Pandoc failed: ${result.stderr.trim()}`);
    }
    return result.stdout;
  }

  async htmlToEpub(
    htmlPath: string,
    outputPath: string,
    options: EpubOptions,
  ): Promise<void> {
    const args = [
      htmlPath,
      "--from",
      "html",
      "--to",
      "epub",
      "--output",
      outputPath,
      "--standalone",
      "--metadata",
      `title=${options.title}`,
      "--metadata",
      `author=${options.author}`,
      "--metadata",
      `lang=${options.language}`,
      "--toc",
      `--toc-depth=${options.tocDepth}`,
    ];
    if (options.stylesheetPath) {
      args.push("--css", options.stylesheetPath);
    }

    const result = await runProcess(this.tools.pandoc, args);
    if (result.code !== 0) {
      throw new Error(`Pandoc EPUB conversion failed: ${result.stderr.trim()}`);
    }
  }

  async epubToMobi(epubPath: string, outputPath: string): Promise<void> {
    const result = await runProcess(this.tools.ebookConvert, [
      epubPath,
      outputPath,
      "--mobi-file-type",
      "both",
      "--personal-doc",
      "--no-inline-toc",
    ]);

    if (result.code !== 0) {
      throw new Error(`ebook-convert failed: ${result.stderr.trim()}`);
    }
  }
}
