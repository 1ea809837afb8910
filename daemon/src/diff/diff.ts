import type { DiffLine, DiffResult } from "../sessions/types.js";

export const DEFAULT_MAX_LINES = 1_000;

export interface DiffOptions {
  /** Lines kept per side; the rest is dropped and the result marked truncated. */
  maxLines?: number;
}

type Op =
  | { kind: "context"; oldIndex: number; newIndex: number }
  | { kind: "removed"; oldIndex: number }
  | { kind: "added"; newIndex: number };

/** Split text into lines; a trailing newline does not produce an empty last line. */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Line diff of two texts using Myers' O(ND) shortest edit script.
 * The common prefix and suffix are matched before the search so typical
 * edits only pay for the changed region.
 */
export function diff(
  before: string,
  after: string,
  options: DiffOptions = {},
): DiffResult {
  const maxLines = options.maxLines ?? DEFAULT_MAX_LINES;
  let a = splitLines(before);
  let b = splitLines(after);

  const truncated = a.length > maxLines || b.length > maxLines;
  if (truncated) {
    a = a.slice(0, maxLines);
    b = b.slice(0, maxLines);
  }

  let prefix = 0;
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) {
    prefix++;
  }
  let suffix = 0;
  while (
    suffix < a.length - prefix &&
    suffix < b.length - prefix &&
    a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
  ) {
    suffix++;
  }

  const ops: Op[] = [];
  for (let i = 0; i < prefix; i++) {
    ops.push({ kind: "context", oldIndex: i, newIndex: i });
  }
  for (const op of shortestEditScript(
    a.slice(prefix, a.length - suffix),
    b.slice(prefix, b.length - suffix),
  )) {
    ops.push(shift(op, prefix));
  }
  for (let i = suffix; i > 0; i--) {
    ops.push({ kind: "context", oldIndex: a.length - i, newIndex: b.length - i });
  }

  const lines: DiffLine[] = [];
  let added = 0;
  let removed = 0;
  for (const op of ops) {
    if (op.kind === "context") {
      lines.push({
        kind: "context",
        oldLineNo: op.oldIndex + 1,
        newLineNo: op.newIndex + 1,
        text: a[op.oldIndex],
      });
    } else if (op.kind === "removed") {
      removed++;
      lines.push({ kind: "removed", oldLineNo: op.oldIndex + 1, text: a[op.oldIndex] });
    } else {
      added++;
      lines.push({ kind: "added", newLineNo: op.newIndex + 1, text: b[op.newIndex] });
    }
  }

  return { lines, added, removed, truncated };
}

/** Render a diff as unified-style text: one "+", "-" or " " prefixed line per entry. */
export function formatUnified(result: DiffResult): string {
  const out = result.lines.map((line) => {
    const marker = line.kind === "added" ? "+" : line.kind === "removed" ? "-" : " ";
    return `${marker}${line.text}`;
  });
  if (result.truncated) out.push("... (diff truncated)");
  return out.join("\n");
}

function shift(op: Op, by: number): Op {
  switch (op.kind) {
    case "context":
      return { kind: "context", oldIndex: op.oldIndex + by, newIndex: op.newIndex + by };
    case "removed":
      return { kind: "removed", oldIndex: op.oldIndex + by };
    case "added":
      return { kind: "added", newIndex: op.newIndex + by };
  }
}

function shortestEditScript(a: string[], b: string[]): Op[] {
  const n = a.length;
  const m = b.length;
  if (n === 0 && m === 0) return [];

  const max = n + m;
  const offset = max + 1;
  const v = new Int32Array(2 * max + 3);
  // trace[d] holds v[-(d+1) .. d+1] as it was before round d
  const trace: Int32Array[] = [];

  search: for (let d = 0; d <= max; d++) {
    trace.push(v.slice(offset - d - 1, offset + d + 2));
    for (let k = -d; k <= d; k += 2) {
      let x =
        k === -d || (k !== d && v[offset + k - 1] < v[offset + k + 1])
          ? v[offset + k + 1]
          : v[offset + k - 1] + 1;
      let y = x - k;
      while (x < n && y < m && a[x] === b[y]) {
        x++;
        y++;
      }
      v[offset + k] = x;
      if (x >= n && y >= m) break search;
    }
  }

  const ops: Op[] = [];
  let x = n;
  let y = m;
  for (let d = trace.length - 1; d >= 0; d--) {
    const snapshot = trace[d];
    const at = (k: number): number => snapshot[k + d + 1];
    const k = x - y;
    const prevK = k === -d || (k !== d && at(k - 1) < at(k + 1)) ? k + 1 : k - 1;
    const prevX = at(prevK);
    const prevY = prevX - prevK;

    while (x > prevX && y > prevY) {
      ops.push({ kind: "context", oldIndex: x - 1, newIndex: y - 1 });
      x--;
      y--;
    }
    if (d > 0) {
      if (x === prevX) {
        ops.push({ kind: "added", newIndex: y - 1 });
      } else {
        ops.push({ kind: "removed", oldIndex: x - 1 });
      }
    }
    x = prevX;
    y = prevY;
  }

  return ops.reverse();
}
