import { isRecord, parseJsonMaybe, type JsonObject } from "../json.js";

/** Field names that hold the chat list inside a stored object. */
export const LIST_FIELDS = [
  "prompts",
  "messages",
  "items",
  "history",
  "chatHistory",
  "threads",
  "sessions",
] as const;

/** Field names that hold a message's text, in order of preference. */
export const TEXT_FIELDS = [
  "content",
  "text",
  "prompt",
  "message",
  "inputText",
  "outputText",
  "body",
  "textContent",
] as const;

// Substrings of keys whose longest string value is taken when no text field is set
const DEEP_TEXT_HINTS = [
  ...TEXT_FIELDS,
  "query",
  "question",
  "request",
  "description",
  "desc",
  "title",
];

/** One chat entry from a state value: the unwrapped payload plus the wrapper's timestamp. */
export interface StateItem {
  payload: JsonObject | string;
  timestamp: unknown;
}

/** The chat list inside a stored value: the value itself, a known list field, or the longest nested list of objects. */
export function extractItems(data: unknown): unknown[] {
  if (Array.isArray(data)) return data;
  if (!isRecord(data)) return [];

  for (const field of LIST_FIELDS) {
    const value = parseJsonMaybe(data[field]);
    if (Array.isArray(value) && value.length > 0) return value;
  }
  return findItemList(data, () => true) ?? [];
}

/**
 * Unwrap and flatten stored entries. Entries may be JSON strings, objects
 * whose payload sits in a `value` field, or nested lists of either.
 */
export function flattenItems(items: readonly unknown[]): StateItem[] {
  const out: StateItem[] = [];
  const visit = (item: unknown): void => {
    const parsed = parseJsonMaybe(item);
    if (Array.isArray(parsed)) {
      for (const child of parsed) visit(child);
      return;
    }
    if (isRecord(parsed)) {
      const payload = parsed.value != null ? parseJsonMaybe(parsed.value) : parsed;
      out.push({
        payload: isRecord(payload) ? payload : String(payload),
        timestamp: parsed.timestamp,
      });
      return;
    }
    if (parsed != null) out.push({ payload: String(parsed), timestamp: undefined });
  };
  for (const item of items) visit(item);
  return out;
}

/** First non-empty text field of an item, else the longest string under a text-like key. */
export function itemText(payload: JsonObject | string): string {
  if (typeof payload === "string") return payload;
  for (const field of TEXT_FIELDS) {
    const value = payload[field];
    if (typeof value === "string" && value.trim().length > 0) return value;
    if (Array.isArray(value) && value.length > 0) {
      return value.map((v) => (typeof v === "string" ? v : JSON.stringify(v))).join("\n\n");
    }
  }
  return deepText(payload);
}

function deepText(obj: unknown): string {
  let best = "";
  const visit = (node: unknown): void => {
    if (Array.isArray(node)) {
      for (const child of node) visit(child);
    } else if (isRecord(node)) {
      for (const [key, value] of Object.entries(node)) {
        if (
          typeof value === "string" &&
          value.trim().length > 0 &&
          value.length > best.length &&
          DEEP_TEXT_HINTS.some((hint) => key.includes(hint))
        ) {
          best = value;
        }
        visit(value);
      }
    }
  };
  visit(obj);
  return best;
}

/** Longest list, anywhere in data, whose first element is an object accepted by test. */
export function findItemList(data: unknown, test: (first: unknown) => boolean): unknown[] | null {
  let best: unknown[] | null = null;
  const visit = (node: unknown): void => {
    if (Array.isArray(node)) {
      if (node.length > 0 && isRecord(node[0]) && test(node[0])) {
        if (!best || node.length > best.length) best = node;
      }
      for (const child of node) visit(child);
    } else if (isRecord(node)) {
      for (const value of Object.values(node)) visit(value);
    }
  };
  visit(data);
  return best;
}

export function hasTextField(item: unknown): boolean {
  return isRecord(item) && TEXT_FIELDS.some((field) => field in item);
}
