import type { Role, Source, ToolCall } from "../sessions/types.js";
import { isRecord, str, toIsoTimestamp, type JsonObject } from "../json.js";
import { itemText } from "../sources/state-items.js";
import type { BodyContext, RecordBody, RecordProfile } from "./profile.js";
import {
  beforeAfter,
  IMAGE_PLACEHOLDER,
  renderDiff,
  renderToolResult,
  renderToolUse,
  renderUnknown,
  toolCall,
} from "./tools.js";

interface Rendered {
  parts: string[];
  toolCalls: ToolCall[];
}

function body(rendered: Rendered, timestamp: string | null, role?: Role): RecordBody {
  const content = rendered.parts.join("\n\n");
  return role ? { content, toolCalls: rendered.toolCalls, timestamp, role } : { content, toolCalls: rendered.toolCalls, timestamp };
}

function params(value: unknown): JsonObject {
  return isRecord(value) ? value : {};
}

function unknownBlock(block: unknown, kind: string, out: Rendered): void {
  out.toolCalls.push({
    id: null,
    name: "unknown",
    parameters: isRecord(block) ? block : { value: block },
    result: null,
    isEdit: false,
    diff: null,
  });
  out.parts.push(renderUnknown(kind, block));
}

/** Text of a tool_result payload: plain text when every piece is text, else the raw value. */
function resultOutput(content: unknown): unknown {
  if (!Array.isArray(content)) return content ?? "";
  const texts: string[] = [];
  for (const piece of content) {
    if (typeof piece === "string") texts.push(piece);
    else if (isRecord(piece) && piece.type === "text" && typeof piece.text === "string") texts.push(piece.text);
    else if (isRecord(piece) && piece.type === "image") texts.push(IMAGE_PLACEHOLDER);
    else return content;
  }
  return texts.join("\n");
}

// Claude Code ---------------------------------------------------------------

function claudeBlocks(blocks: readonly unknown[], toolUseResult: unknown, ctx: BodyContext): Rendered {
  const out: Rendered = { parts: [], toolCalls: [] };

  for (const block of blocks) {
    if (typeof block === "string") {
      if (block) out.parts.push(block);
      continue;
    }
    if (!isRecord(block)) {
      out.parts.push(String(block));
      continue;
    }

    switch (block.type) {
      case "text": {
        const text = str(block.text);
        if (text) out.parts.push(text);
        break;
      }
      case "thinking":
      case "redacted_thinking":
        break;
      case "image":
        out.parts.push(IMAGE_PLACEHOLDER);
        break;
      case "tool_use": {
        const call = toolCall(str(block.id), str(block.name) ?? "unknown", params(block.input), null, ctx.diff);
        out.toolCalls.push(call);
        out.parts.push(renderToolUse(call));
        break;
      }
      case "tool_result": {
        const output = resultOutput(block.content);
        const edit = isRecord(toolUseResult) ? beforeAfter(toolUseResult) : null;
        const diff = edit ? ctx.diff(edit.before, edit.after) : null;
        out.toolCalls.push({
          id: str(block.tool_use_id),
          name: "tool_result",
          parameters: {},
          result: output,
          isEdit: edit !== null,
          diff,
        });
        if (edit && diff) {
          out.parts.push(renderDiff(`Edit result: ${edit.filePath ?? "unknown file"}`, diff));
          if (typeof output === "string" && output.trim()) out.parts.push(renderToolResult(output));
        } else {
          out.parts.push(renderToolResult(output));
        }
        break;
      }
      default:
        unknownBlock(block, str(block.type) ?? "unknown", out);
    }
  }
  return out;
}

export const claudeProfile: RecordProfile = {
  roles: {
    field: "type",
    values: { user: "user", assistant: "assistant", summary: "summary", system: "summary" },
  },
  // Older logs carry a bare role field instead of a record type
  inferRole: (record) => {
    const role = record.type === undefined ? record.role : undefined;
    return role === "user" || role === "assistant" ? role : null;
  },
  body(record, role, ctx) {
    const timestamp = toIsoTimestamp(record.timestamp);
    if (record.type === "summary") {
      const text = str(record.summary)?.trim();
      return text ? { content: text, toolCalls: [], timestamp } : null;
    }
    if (record.type === "system") {
      const text = str(record.content);
      return text ? { content: text, toolCalls: [], timestamp } : null;
    }

    const message = isRecord(record.message) ? record.message : record;
    const content = message.content;
    if (typeof content === "string") return { content, toolCalls: [], timestamp };
    if (!Array.isArray(content)) return null;

    const onlyResults =
      role === "user" &&
      content.length > 0 &&
      content.every((block) => isRecord(block) && block.type === "tool_result");
    return body(claudeBlocks(content, record.toolUseResult, ctx), timestamp, onlyResults ? "tool" : undefined);
  },
};

// Qwen Code -----------------------------------------------------------------

function qwenParts(content: readonly unknown[], ctx: BodyContext, out: Rendered): void {
  for (const part of content) {
    if (typeof part === "string") {
      if (part) out.parts.push(part);
    } else if (isRecord(part) && typeof part.text === "string") {
      if (part.thought !== true && part.text) out.parts.push(part.text);
    } else if (isRecord(part) && isRecord(part.functionCall)) {
      const fn = part.functionCall;
      const call = toolCall(str(fn.id), str(fn.name) ?? "unknown", params(fn.args), null, ctx.diff);
      out.toolCalls.push(call);
      out.parts.push(renderToolUse(call));
    } else if (isRecord(part) && isRecord(part.functionResponse)) {
      const fn = part.functionResponse;
      out.toolCalls.push({
        id: str(fn.id),
        name: "tool_result",
        parameters: {},
        result: fn.response,
        isEdit: false,
        diff: null,
      });
      out.parts.push(renderToolResult(fn.response));
    } else if (isRecord(part) && isRecord(part.inlineData)) {
      out.parts.push(IMAGE_PLACEHOLDER);
    } else {
      unknownBlock(part, "part", out);
    }
  }
}

export const qwenProfile: RecordProfile = {
  roles: {
    field: "type",
    values: {
      user: "user",
      qwen: "assistant",
      gemini: "assistant",
      model: "assistant",
      assistant: "assistant",
      summary: "summary",
      info: "summary",
      warning: "summary",
      error: "summary",
    },
  },
  body(record, _role, ctx) {
    const out: Rendered = { parts: [], toolCalls: [] };
    const content = record.content ?? record.parts;
    if (typeof content === "string") {
      if (content) out.parts.push(content);
    } else if (Array.isArray(content)) {
      qwenParts(content, ctx, out);
    }

    if (Array.isArray(record.toolCalls)) {
      for (const entry of record.toolCalls) {
        if (!isRecord(entry)) {
          unknownBlock(entry, "toolCall", out);
          continue;
        }
        const result = typeof entry.resultDisplay === "string" ? entry.resultDisplay : entry.result;
        const call = toolCall(str(entry.id), str(entry.name) ?? "unknown", params(entry.args), result ?? null, ctx.diff);
        out.toolCalls.push(call);
        out.parts.push(renderToolUse(call));
        if (result !== undefined && result !== null) out.parts.push(renderToolResult(result));
      }
    }
    return body(out, toIsoTimestamp(record.timestamp));
  },
};

// Kiro ----------------------------------------------------------------------

export const kiroProfile: RecordProfile = {
  roles: {
    field: "message.role",
    values: { user: "user", assistant: "assistant", bot: "assistant" },
    fallback: "assistant",
  },
  body(record, _role, ctx) {
    const message = record.message;
    if (!isRecord(message)) return null;
    const out: Rendered = { parts: [], toolCalls: [] };

    const content = message.content;
    if (typeof content === "string") {
      if (content) out.parts.push(content);
    } else if (Array.isArray(content)) {
      for (const item of content) {
        if (typeof item === "string") {
          if (item) out.parts.push(item);
        } else if (isRecord(item) && item.type === "text") {
          const text = str(item.text);
          if (text) out.parts.push(text);
        } else if (isRecord(item) && item.type === "image") {
          out.parts.push(IMAGE_PLACEHOLDER);
        } else if (isRecord(item) && str(item.name) && (isRecord(item.input) || isRecord(item.args))) {
          const call = toolCall(
            str(item.id),
            str(item.name) ?? "unknown",
            params(item.input ?? item.args),
            item.result ?? null,
            ctx.diff,
          );
          out.toolCalls.push(call);
          out.parts.push(renderToolUse(call));
        } else {
          unknownBlock(item, (isRecord(item) && str(item.type)) || "unknown", out);
        }
      }
    }
    return body(out, toIsoTimestamp(record.timestamp ?? message.timestamp));
  },
};

// Cursor and Trae ------------------------------------------------------------

export const workspaceStateProfile: RecordProfile = {
  roles: {
    field: "role",
    values: {
      user: "user",
      assistant: "assistant",
      ai: "assistant",
      bot: "assistant",
      model: "assistant",
      system: "summary",
    },
  },
  inferRole: (record) => {
    if (record.from !== undefined && record.from !== null && record.from !== "") {
      return String(record.from).toLowerCase() === "user" ? "user" : "assistant";
    }
    if (typeof record.isUser === "boolean") return record.isUser ? "user" : "assistant";
    return str(record.outputText) ? "assistant" : "user";
  },
  // Bare strings in the stored list are assistant output
  coerce: (data) => (typeof data === "string" ? { role: "assistant", text: data } : null),
  body(record) {
    const content = itemText(record);
    return {
      content,
      toolCalls: [],
      timestamp: toIsoTimestamp(record.timestamp ?? record.time),
    };
  },
};

export const PROFILES: Record<Source, RecordProfile> = {
  claude: claudeProfile,
  qwen: qwenProfile,
  cursor: workspaceStateProfile,
  trae: workspaceStateProfile,
  kiro: kiroProfile,
};
