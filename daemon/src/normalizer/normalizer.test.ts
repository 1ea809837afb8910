import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { Normalizer } from "./normalizer.js";
import { PROFILES } from "./profiles.js";
import { jsonlRecords } from "../sources/records.js";
import { SOURCES, type Source } from "../sessions/types.js";

const log = pino({ level: "silent" });

function normalizer(maxDiffLines?: number): Normalizer {
  const n = new Normalizer(log, { maxDiffLines });
  for (const source of SOURCES) n.register(source, PROFILES[source]);
  return n;
}

function one(source: Source, data: unknown, lineIndex = 0) {
  return normalizer().normalize(source, { lineIndex, data });
}

describe("claude records", () => {
  it("reads a plain user message", () => {
    const m = one("claude", {
      type: "user",
      timestamp: "2025-03-01T10:00:00Z",
      message: { role: "user", content: "How do I rename a branch?" },
    });
    expect(m).toEqual({
      lineIndex: 0,
      role: "user",
      timestamp: "2025-03-01T10:00:00.000Z",
      content: "How do I rename a branch?",
      toolCalls: [],
      hasCode: false,
      isPlaceholder: false,
    });
  });

  it("joins text blocks and skips thinking", () => {
    const m = one("claude", {
      type: "assistant",
      message: {
        content: [
          { type: "thinking", thinking: "hmm" },
          { type: "text", text: "First" },
          { type: "image", source: {} },
          { type: "text", text: "Second" },
        ],
      },
    });
    expect(m.role).toBe("assistant");
    expect(m.content).toBe("First\n\n[Image attached]\n\nSecond");
  });

  it("uses the summary text of summary records", () => {
    const m = one("claude", { type: "summary", summary: "  Branch renaming  " });
    expect(m.role).toBe("summary");
    expect(m.content).toBe("Branch renaming");
    expect(m.isPlaceholder).toBe(false);
  });

  it("accepts legacy records that only carry a role", () => {
    expect(one("claude", { role: "assistant", content: "legacy" }).role).toBe("assistant");
  });

  it("renders tool uses with their parameters", () => {
    const m = one("claude", {
      type: "assistant",
      message: { content: [{ type: "tool_use", id: "t1", name: "Bash", input: { command: "ls" } }] },
    });
    expect(m.content).toBe("**Tool: Bash**\n  **command**: ls");
    expect(m.toolCalls).toEqual([
      { id: "t1", name: "Bash", parameters: { command: "ls" }, result: null, isEdit: false, diff: null },
    ]);
  });

  it("cuts long parameter previews", () => {
    const m = one("claude", {
      type: "assistant",
      message: { content: [{ type: "tool_use", id: "t1", name: "Write", input: { content: "x".repeat(150) } }] },
    });
    expect(m.content).toBe(`**Tool: Write**\n  **content**: ${"x".repeat(100)}...`);
  });

  it("attaches a diff to edit tools", () => {
    const m = one("claude", {
      type: "assistant",
      message: {
        content: [
          {
            type: "tool_use",
            id: "t2",
            name: "edit",
            input: { file_path: "/src/a.ts", old_string: "a\nb", new_string: "a\nc" },
          },
        ],
      },
    });
    const [call] = m.toolCalls;
    expect(call.isEdit).toBe(true);
    expect(call.diff?.added).toBe(1);
    expect(call.diff?.removed).toBe(1);
    expect(m.content.startsWith("**Edit: /src/a.ts**\n```diff\n")).toBe(true);
  });

  it("does not treat an edit tool without before and after as an edit", () => {
    const m = one("claude", {
      type: "assistant",
      message: { content: [{ type: "tool_use", id: "t3", name: "MultiEdit", input: { edits: [] } }] },
    });
    expect(m.toolCalls[0].isEdit).toBe(false);
    expect(m.toolCalls[0].diff).toBeNull();
  });

  it("maps user records holding only tool results to the tool role", () => {
    const m = one("claude", {
      type: "user",
      message: { content: [{ type: "tool_result", tool_use_id: "t1", content: "file.txt" }] },
    });
    expect(m.role).toBe("tool");
    expect(m.content).toBe("**Tool output:**\n```\nfile.txt\n```");
  });

  it("cuts long tool output", () => {
    const m = one("claude", {
      type: "user",
      message: { content: [{ type: "tool_result", tool_use_id: "t1", content: "y".repeat(6_000) }] },
    });
    expect(m.content).toBe(`**Tool output:**\n\`\`\`\n${"y".repeat(5_000)}\n... (output truncated by viewer)\n\`\`\``);
  });

  it("keeps unknown blocks as unknown tool calls", () => {
    const m = one("claude", {
      type: "assistant",
      message: { content: [{ type: "server_widget", id: 7 }] },
    });
    expect(m.toolCalls).toHaveLength(1);
    expect(m.toolCalls[0].name).toBe("unknown");
    expect(m.content).toBe('**server_widget:**\n```json\n{\n  "type": "server_widget",\n  "id": 7\n}\n```');
  });

  it("flags code in content", () => {
    expect(one("claude", { type: "assistant", message: { content: "```ts\nlet a = 1;\n```" } }).hasCode).toBe(true);
  });
});

describe("placeholders", () => {
  it("replaces records of an unknown kind", () => {
    const m = one("claude", { type: "file-history-snapshot", timestamp: 1_700_000_000 }, 4);
    expect(m).toEqual({
      lineIndex: 4,
      role: "summary",
      timestamp: "2023-11-14T22:13:20.000Z",
      content: "[Unrecognized claude record (file-history-snapshot)]",
      toolCalls: [],
      hasCode: false,
      isPlaceholder: true,
    });
  });

  it("replaces records that are not objects", () => {
    const m = one("qwen", 42);
    expect(m.content).toBe("[Unrecognized qwen record]");
    expect(m.isPlaceholder).toBe(true);
  });

  it("replaces records with nothing to show", () => {
    const m = one("claude", { type: "assistant", message: { content: [] } });
    expect(m.content).toBe("[Empty claude record (assistant)]");
    expect(m.isPlaceholder).toBe(true);
  });

  it("throws for a source without a profile", () => {
    const bare = new Normalizer(log);
    expect(() => bare.normalize("claude", { lineIndex: 0, data: {} })).toThrow(/No record profile/);
  });
});

describe("qwen records", () => {
  it("maps the model role to assistant and reads parts", () => {
    const m = one("qwen", {
      type: "qwen",
      content: [{ text: "Sure." }, { functionCall: { id: "c1", name: "read_file", args: { path: "a.md" } } }],
    });
    expect(m.role).toBe("assistant");
    expect(m.content).toBe("Sure.\n\n**Tool: read_file**\n  **path**: a.md");
    expect(m.toolCalls[0].name).toBe("read_file");
  });

  it("renders recorded tool calls with their display result", () => {
    const m = one("qwen", {
      type: "gemini",
      content: "Done",
      toolCalls: [{ id: "c2", name: "run_shell_command", args: { command: "pwd" }, resultDisplay: "/tmp" }],
    });
    expect(m.toolCalls[0].result).toBe("/tmp");
    expect(m.content).toBe("Done\n\n**Tool: run_shell_command**\n  **command**: pwd\n\n**Tool output:**\n```\n/tmp\n```");
  });

  it("treats info records as summaries", () => {
    expect(one("qwen", { type: "info", content: "Session resumed" }).role).toBe("summary");
  });
});

describe("kiro records", () => {
  it("reads the role from the nested message", () => {
    const m = one("kiro", { message: { role: "user", content: [{ type: "text", text: "Plan the task" }] } });
    expect(m.role).toBe("user");
    expect(m.content).toBe("Plan the task");
  });

  it("falls back to assistant", () => {
    expect(one("kiro", { message: { content: "Working on it" } }).role).toBe("assistant");
  });

  it("extracts tool items", () => {
    const m = one("kiro", {
      message: { role: "bot", content: [{ name: "fsWrite", input: { path: "x.ts" } }] },
    });
    expect(m.role).toBe("assistant");
    expect(m.toolCalls[0]).toMatchObject({ name: "fsWrite", parameters: { path: "x.ts" } });
  });
});

describe("cursor and trae records", () => {
  it("uses an explicit role", () => {
    const m = one("cursor", { role: "ai", text: "Here you go" });
    expect(m.role).toBe("assistant");
    expect(m.content).toBe("Here you go");
  });

  it("infers the role from structural fields", () => {
    expect(one("trae", { from: "User", text: "a" }).role).toBe("user");
    expect(one("trae", { from: "copilot", text: "b" }).role).toBe("assistant");
    expect(one("cursor", { isUser: false, text: "c" }).role).toBe("assistant");
    expect(one("cursor", { outputText: "d" }).role).toBe("assistant");
    expect(one("cursor", { inputText: "e" }).role).toBe("user");
  });

  it("treats bare strings as assistant output", () => {
    const m = one("cursor", "plain answer");
    expect(m.role).toBe("assistant");
    expect(m.content).toBe("plain answer");
  });

  it("reads epoch timestamps", () => {
    expect(one("trae", { role: "user", text: "t", timestamp: 1_700_000_000_000 }).timestamp).toBe(
      "2023-11-14T22:13:20.000Z",
    );
  });
});

describe("normalizeSession", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "normalizer-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("skips a truncated trailing line and keeps line positions", async () => {
    const lines = Array.from({ length: 50 }, (_, i) =>
      JSON.stringify({ type: i % 2 === 0 ? "user" : "assistant", message: { content: `message ${i}` } }),
    );
    const file = join(dir, "s.jsonl");
    writeFileSync(file, `${lines.join("\n")}\n{"type":"user","mess`);

    const messages = await normalizer().normalizeSession("claude", jsonlRecords(file, log));

    expect(messages).toHaveLength(50);
    expect(messages.map((m) => m.lineIndex)).toEqual(Array.from({ length: 50 }, (_, i) => i));
    expect(messages[49].content).toBe("message 49");

    const again = await normalizer().normalizeSession("claude", jsonlRecords(file, log));
    expect(again.map((m) => m.lineIndex)).toEqual(messages.map((m) => m.lineIndex));
  });

  it("pairs tool results with their invocation", async () => {
    const file = join(dir, "t.jsonl");
    writeFileSync(
      file,
      [
        { type: "assistant", message: { content: [{ type: "tool_use", id: "t1", name: "Bash", input: { command: "ls" } }] } },
        { type: "user", message: { content: [{ type: "tool_result", tool_use_id: "t1", content: "a.txt" }] } },
      ]
        .map((r) => JSON.stringify(r))
        .join("\n"),
    );

    const [use, result] = await normalizer().normalizeSession("claude", jsonlRecords(file, log));

    expect(use.toolCalls[0].result).toBe("a.txt");
    expect(result.toolCalls[0].name).toBe("Bash");
  });

  it("limits diffs to the configured line count", () => {
    const before = Array.from({ length: 5 }, (_, i) => `old ${i}`).join("\n");
    const after = Array.from({ length: 5 }, (_, i) => `new ${i}`).join("\n");
    const m = normalizer(2).normalize("claude", {
      lineIndex: 0,
      data: {
        type: "assistant",
        message: { content: [{ type: "tool_use", id: "e", name: "Edit", input: { old_string: before, new_string: after } }] },
      },
    });
    expect(m.toolCalls[0].diff?.truncated).toBe(true);
    expect(m.toolCalls[0].diff?.removed).toBe(2);
    expect(m.toolCalls[0].diff?.added).toBe(2);
  });
});
