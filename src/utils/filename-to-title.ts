/**
 * Convert a filename stem to a readable title
 * Splits by hyphens/underscores and capitalizes each word
 *
 * @example
 * filenameToTitle("release_notes") // "Release Notes"
 * filenameToTitle("api-GUIDE") // "Api Guide"
 */
export function filenameToTitle(filename: string): string {
  const title = filename
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
  return title || filename;
}
