/**
 * Content filters applied before diagram rendering
 */

const TABLE_OF_CONTENTS =
  /^#{2,3}\s+Table\s+of\s+contents\s*$[\s\S]*?(?=^#{1,3}\s|(?![\s\S]))/gim;

const PAGE_BREAK_DIV = '<div class="page-break"></div>';

// Every marker syntax accepted in source documents
const PAGE_BREAK_MARKERS: RegExp[] = [
  /<!--\s*page-break\s*-->/gi,
  /```page-break\n```/gi,
  /<page-break>/gi,
  /---\s*\n\s*\{\.page-break\}/gi,
];

/**
 * Remove "## Table of contents" / "### Table of contents" sections up to
 * the next heading of level 1-3
 */
export function stripTableOfContents(content: string): string {
  const filtered = content.replace(TABLE_OF_CONTENTS, "");
  if (filtered === content) return content;
  return filtered.replace(/\n\s*\n\s*\n/g, "\n\n");
}

/**
 * Paged output turns every marker into a page-break div.
 * Reflowable output drops the markers (and existing divs) instead.
 */
export function applyPageBreaks(content: string, paged: boolean): string {
  let result = content;
  for (const marker of PAGE_BREAK_MARKERS) {
    result = result.replace(marker, paged ? PAGE_BREAK_DIV : "");
  }
  if (!paged) {
    result = result.replace(/<div class="page-break"><\/div>/gi, "");
  }
  return result;
}
