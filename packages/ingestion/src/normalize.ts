/**
 * Normalizes extracted page text before chunking: whitespace runs become a
 * single space, "- " left behind by line-break hyphenation is removed, and
 * anything outside ASCII is dropped.
 */
export function normalizePageText(text: string): string {
  return text
    .split(/\s+/)
    .filter((w) => w.length > 0)
    .join(" ")
    .replaceAll("- ", "")
    .replace(/[^\x00-\x7F]/g, "");
}
