import Database from "better-sqlite3";
import { isRecord } from "../json.js";
import { findItemList, hasTextField, LIST_FIELDS } from "./state-items.js";

const KEY_PATTERNS = [
  "%prompt%",
  "%ai%",
  "%chat%",
  "%message%",
  "%history%",
  "%conversation%",
  "%thread%",
  "%session%",
  "%kiro%",
];

// Editor UI state that matches the patterns above but never holds chats
const BLACKLISTED_PREFIXES = [
  "memento/",
  "workbench.",
  "terminal",
  "scm.",
  "debug.",
  "vscode.",
  "output.",
];

const TEXT_BONUS = 1000;
const FALLBACK_CANDIDATES = 50;

export function openStateDb(path: string): Database.Database {
  return new Database(path, { readonly: true, fileMustExist: true });
}

/** The ItemTable value stored under key, decoded as text; null when absent. */
export function readStateValue(db: Database.Database, key: string): string | null {
  const row = db
    .prepare<[string], { value: string | Buffer }>("SELECT value FROM ItemTable WHERE key = ?")
    .get(key);
  if (!row) return null;
  return typeof row.value === "string" ? row.value : row.value.toString("utf-8");
}

/**
 * The ItemTable key most likely to hold the chat history. Preferred keys win
 * when present; otherwise candidates matching chat-like patterns are scored
 * by item count, with a bonus when items carry a text field, and as a last
 * resort the largest values are inspected.
 */
export function discoverStateKey(
  db: Database.Database,
  preferred: readonly string[] = [],
): string | null {
  for (const key of preferred) {
    if (readStateValue(db, key) !== null) return key;
  }

  const byPattern = db.prepare<[string], { key: string }>(
    "SELECT key FROM ItemTable WHERE key LIKE ? LIMIT 100",
  );
  const candidates = new Set<string>();
  for (const pattern of KEY_PATTERNS) {
    for (const row of byPattern.all(pattern)) {
      if (!isBlacklisted(row.key)) candidates.add(row.key);
    }
  }

  let bestKey: string | null = null;
  let bestScore = -1;
  for (const key of candidates) {
    const raw = readStateValue(db, key);
    if (raw === null) continue;
    const data = parseStrict(raw);
    if (data === undefined) continue;
    const score = scoreValue(data);
    if (score > bestScore) {
      bestScore = score;
      bestKey = key;
    }
  }
  if (bestKey) return bestKey;

  const largest = db
    .prepare<[number], { key: string; value: string | Buffer }>(
      "SELECT key, value FROM ItemTable ORDER BY LENGTH(value) DESC LIMIT ?",
    )
    .all(FALLBACK_CANDIDATES);
  for (const row of largest) {
    if (isBlacklisted(row.key)) continue;
    const raw = typeof row.value === "string" ? row.value : row.value.toString("utf-8");
    const data = parseStrict(raw);
    if (data !== undefined && findItemList(data, hasMessageShape)) return row.key;
  }
  return null;
}

function scoreValue(data: unknown): number {
  if (Array.isArray(data)) return scoreList(data);
  if (!isRecord(data)) return 0;

  for (const field of LIST_FIELDS) {
    const value = data[field];
    if (Array.isArray(value) && value.length > 0) return scoreList(value);
  }
  const nested = findItemList(data, hasTextField);
  return nested ? nested.length + TEXT_BONUS : 0;
}

function scoreList(list: readonly unknown[]): number {
  return list.length + (hasTextField(list[0]) ? TEXT_BONUS : 0);
}

function hasMessageShape(item: unknown): boolean {
  return hasTextField(item) || (isRecord(item) && ("role" in item || "type" in item));
}

function isBlacklisted(key: string): boolean {
  return BLACKLISTED_PREFIXES.some((prefix) => key.startsWith(prefix));
}

function parseStrict(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
