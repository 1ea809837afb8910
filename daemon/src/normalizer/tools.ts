import type { DiffResult, ToolCall } from "../sessions/types.js";
import { formatUnified } from "../diff/diff.js";

export const IMAGE_PLACEHOLDER = "[Image attached]";

const PARAM_PREVIEW_CHARS = 100;
const RESULT_MAX_CHARS = 5_000;
const PRE_TRUNCATED_MARKER = "... (output truncated)";

const EDIT_TOOLS = new Set(
  [
    "Edit",
    "MultiEdit",
    "str_replace_editor",
    "str_replace",
    "replace",
    "edit_file",
    "search_replace",
    "fsReplace",
  ].map((name) => name.toLowerCase()),
);

const EDIT_PAYLOADS = [
  ["old_string", "new_string"],
  ["oldString", "newString"],
  ["old_str", "new_str"],
] as const;

export type DiffFn = (before: string, after: string) => DiffResult;

export interface EditPayload {
  before: string;
  after: string;
  filePath: string | null;
}

/** Before/after texts of an edit-tool invocation; null for any other call. */
export function editPayload(name: string, params: Record<string, unknown>): EditPayload | null {
  if (!EDIT_TOOLS.has(name.toLowerCase())) return null;
  return beforeAfter(params);
}

/** First recognized before/after pair in an object, regardless of tool name. */
export function beforeAfter(params: Record<string, unknown>): EditPayload | null {
  for (const [beforeKey, afterKey] of EDIT_PAYLOADS) {
    const before = params[beforeKey];
    const after = params[afterKey];
    if (typeof before === "string" && typeof after === "string" && (before || after)) {
      return { before, after, filePath: filePathOf(params) };
    }
  }
  return null;
}

function filePathOf(params: Record<string, unknown>): string | null {
  for (const key of ["file_path", "filePath", "path", "target_file"]) {
    const value = params[key];
    if (typeof value === "string" && value) return value;
  }
  return null;
}

/** Build a tool invocation, computing its diff when it is an edit. */
export function toolCall(
  id: string | null,
  name: string,
  parameters: Record<string, unknown>,
  result: unknown,
  diff: DiffFn,
): ToolCall {
  const edit = editPayload(name, parameters);
  return {
    id,
    name,
    parameters,
    result,
    isEdit: edit !== null,
    diff: edit ? diff(edit.before, edit.after) : null,
  };
}

export function renderToolUse(call: ToolCall): string {
  if (call.isEdit && call.diff) {
    const edit = editPayload(call.name, call.parameters);
    return renderDiff(`Edit: ${edit?.filePath ?? "unknown file"}`, call.diff);
  }

  const entries = Object.entries(call.parameters);
  const params =
    entries.length === 0
      ? "  (no parameters)"
      : entries.map(([key, value]) => `  **${key}**: ${previewParam(value)}`).join("\n");
  return `**Tool: ${call.name}**\n${params}`;
}

export function renderDiff(title: string, diff: DiffResult): string {
  return `**${title}**\n\`\`\`diff\n${formatUnified(diff)}\n\`\`\``;
}

/** Tool output in a fenced block; long text output is cut. */
export function renderToolResult(output: unknown): string {
  if (typeof output === "string") {
    const text =
      output.length > RESULT_MAX_CHARS && !output.includes(PRE_TRUNCATED_MARKER)
        ? `${output.slice(0, RESULT_MAX_CHARS)}\n... (output truncated by viewer)`
        : output;
    return `**Tool output:**\n\`\`\`\n${text}\n\`\`\``;
  }
  return `**Tool output:**\n\`\`\`json\n${JSON.stringify(output, null, 2)}\n\`\`\``;
}

/** Opaque block kept as JSON so nothing is silently dropped. */
export function renderUnknown(kind: string, block: unknown): string {
  return `**${kind}:**\n\`\`\`json\n${JSON.stringify(block, null, 2)}\n\`\`\``;
}

function previewParam(value: unknown): string {
  const text = typeof value === "string" ? value : JSON.stringify(value);
  return text.length > PARAM_PREVIEW_CHARS ? `${text.slice(0, PARAM_PREVIEW_CHARS)}...` : text;
}

const CODE_PATTERN =
  /```|\bdef \w+\(|\bclass \w+[\s({:]|^\s*(?:import|from) [\w.@/'"-]+|<[a-zA-Z][^>]*>|^\s*\$ \w+/m;

export function hasCode(content: string): boolean {
  return CODE_PATTERN.test(content);
}
