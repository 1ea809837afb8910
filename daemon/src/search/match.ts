export const SNIPPET_CONTEXT = 80;

/** Non-overlapping occurrences of needle in haystack; both already lowercased. */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0;
  let count = 0;
  let at = haystack.indexOf(needle);
  while (at !== -1) {
    count++;
    at = haystack.indexOf(needle, at + needle.length);
  }
  return count;
}

/**
 * Text around the first case-insensitive occurrence of needle, with
 * whitespace collapsed and "..." where the text was cut.
 */
export function snippet(text: string, needle: string, context = SNIPPET_CONTEXT): string {
  const at = Math.max(0, text.toLowerCase().indexOf(needle));
  const start = Math.max(0, at - context);
  const end = Math.min(text.length, at + needle.length + context);
  const body = text.slice(start, end).replace(/\s+/g, " ").trim();
  return `${start > 0 ? "..." : ""}${body}${end < text.length ? "..." : ""}`;
}

/** Trimmed, lowercased query; empty when there is nothing to look for. */
export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase();
}
