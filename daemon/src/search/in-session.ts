import type { Message, Role } from "../sessions/types.js";
import { countOccurrences, normalizeQuery, snippet } from "./match.js";

export const DEFAULT_WINDOW = 20;
export const MAX_WINDOW = 500;

export interface SessionMatch {
  lineIndex: number;
  role: Role;
  occurrences: number;
  snippet: string;
}

export interface SessionSearchResult {
  query: string;
  total: number;
  offset: number;
  limit: number;
  matches: SessionMatch[];
}

export interface SessionSearchWindow {
  offset?: number;
  limit?: number;
}

/** One window of the messages matching query, in file order, plus the full match count. */
export function searchSession(
  messages: readonly Message[],
  query: string,
  window: SessionSearchWindow = {},
): SessionSearchResult {
  const needle = normalizeQuery(query);
  const offset = Math.max(0, Math.floor(window.offset ?? 0));
  const limit = Math.min(MAX_WINDOW, Math.max(1, Math.floor(window.limit ?? DEFAULT_WINDOW)));

  const all: SessionMatch[] = [];
  if (needle.length > 0) {
    for (const message of messages) {
      if (message.isPlaceholder) continue;
      const occurrences = countOccurrences(message.content.toLowerCase(), needle);
      if (occurrences === 0) continue;
      all.push({
        lineIndex: message.lineIndex,
        role: message.role,
        occurrences,
        snippet: snippet(message.content, needle),
      });
    }
  }

  return {
    query: query.trim(),
    total: all.length,
    offset,
    limit,
    matches: all.slice(offset, offset + limit),
  };
}
