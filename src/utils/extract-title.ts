import { filenameToTitle } from "./filename-to-title";

/**
 * Document title from Markdown content
 * First ATX "# " heading, then a Setext "===" heading, then the filename stem
 *
 * @example
 * extractTitle("# Getting Started\n...", "guide") // "Getting Started"
 * extractTitle("no headings", "release_notes")    // "Release Notes"
 */
export function extractTitle(content: string, stem: string): string {
  const lines = content.split(/\r?\n/);

  for (const line of lines) {
    const stripped = line.trim();
    if (stripped.startsWith("# ")) {
      const heading = stripped.slice(2).trim();
      if (heading) return heading;
    }
  }

  for (let i = 0; i < lines.length - 1; i++) {
    const current = lines[i].trim();
    if (current && /^=+$/.test(lines[i + 1].trim())) {
      return current;
    }
  }

  return filenameToTitle(stem);
}
