import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { appendFileSync, mkdirSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { Catalog, deriveTitle, type CachedValue } from "./catalog.js";
import type { Message, Source } from "./types.js";
import { cacheKeys } from "../cache/keys.js";
import { CacheManager } from "../cache/manager.js";
import { defaults } from "../config.js";
import { InvalidRequestError, ScanTimeoutError } from "../errors.js";
import type { SourceAdapter } from "../sources/adapter.js";
import { ClaudeAdapter } from "../sources/claude.js";
import { QwenAdapter } from "../sources/qwen.js";
import type { RawRecord } from "../sources/records.js";
import { createNormalizer } from "../sources/registry.js";

const log = pino({ level: "silent" });

function lines(records: unknown[]): string {
  return records.map((r) => `${JSON.stringify(r)}\n`).join("");
}

describe("Catalog", () => {
  let root: string;
  let cache: CacheManager<CachedValue>;
  let catalog: Catalog;

  function build(scanTimeoutMs = 5_000): Catalog {
    const adapters = new Map<Source, SourceAdapter>([
      ["claude", new ClaudeAdapter(join(root, "claude"), log)],
      ["qwen", new QwenAdapter(join(root, "missing"), log)],
    ]);
    return new Catalog(adapters, createNormalizer(defaults(), log), cache, { scanTimeoutMs }, log);
  }

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "catalog-"));
    const project = join(root, "claude", "-p1");
    mkdirSync(project, { recursive: true });
    writeFileSync(
      join(project, "s1.jsonl"),
      lines([
        { type: "summary", summary: "Refactor parser" },
        { type: "user", message: { content: "Please refactor the parser" } },
        { type: "assistant", message: { content: "Parser refactored" } },
        { type: "user", message: { content: "Thanks" } },
      ]),
    );
    writeFileSync(join(project, "s2.jsonl"), lines([{ type: "user", message: { content: "  hello\nworld  " } }]));

    cache = new CacheManager<CachedValue>(
      { hotCapacity: 100, warmCapacity: 10, warmTtlMs: 60_000, sweepIntervalMs: 0 },
      log,
    );
    catalog = build();
  });

  afterEach(() => {
    cache.dispose();
    rmSync(root, { recursive: true, force: true });
  });

  it("lists projects with their source", async () => {
    const projects = await catalog.listProjects("claude");
    expect(projects.map((p) => [p.source, p.projectId, p.sessionCount])).toEqual([["claude", "-p1", 2]]);
  });

  it("derives session titles and message counts", async () => {
    const sessions = await catalog.listSessions("claude", "-p1");
    const byId = new Map(sessions.map((s) => [s.sessionId, s]));
    expect(byId.get("s1")).toMatchObject({ title: "Refactor parser", messageCount: 4, projectId: "-p1" });
    expect(byId.get("s2")).toMatchObject({ title: "hello world", messageCount: 1 });
  });

  it("paginates conversations", async () => {
    const page = await catalog.getConversation("claude", "-p1", "s1", { page: 2, perPage: 2 });
    expect(page.messages.map((m) => m.lineIndex)).toEqual([2, 3]);
    expect(page).toMatchObject({ total: 4, page: 2, perPage: 2, totalPages: 2 });
  });

  it("filters by role and text", async () => {
    const users = await catalog.getConversation("claude", "-p1", "s1", { role: "user" });
    expect(users.messages.map((m) => m.lineIndex)).toEqual([1, 3]);

    const parser = await catalog.getConversation("claude", "-p1", "s1", { search: " PARSER " });
    expect(parser.messages.map((m) => m.lineIndex)).toEqual([0, 1, 2]);
    expect(parser.total).toBe(3);
  });

  it("does not match placeholder text when filtering", async () => {
    writeFileSync(
      join(root, "claude", "-p1", "s3.jsonl"),
      lines([{ type: "file-history-snapshot" }, { type: "user", message: { content: "Keep a record of this" } }]),
    );
    const page = await catalog.getConversation("claude", "-p1", "s3", { search: "record" });
    expect(page.messages.map((m) => m.lineIndex)).toEqual([1]);
  });

  it("clamps the page size", async () => {
    expect((await catalog.getConversation("claude", "-p1", "s1", { perPage: 0 })).perPage).toBe(1);
    expect((await catalog.getConversation("claude", "-p1", "s1", { perPage: 10_000 })).perPage).toBe(500);
  });

  it("returns an empty page past the end", async () => {
    const page = await catalog.getConversation("claude", "-p1", "s2", { page: 3 });
    expect(page.messages).toEqual([]);
    expect(page.totalPages).toBe(1);
  });

  it("returns the summary text", async () => {
    expect(await catalog.getSummary("claude", "-p1", "s1")).toBe("Refactor parser");
    expect(await catalog.getSummary("claude", "-p1", "s2")).toBeNull();
  });

  it("reuses cached messages until the log grows", async () => {
    const first = await catalog.getMessages("claude", "-p1", "s2");
    expect(await catalog.getMessages("claude", "-p1", "s2")).toBe(first);

    appendFileSync(join(root, "claude", "-p1", "s2.jsonl"), lines([{ type: "assistant", message: { content: "hi" } }]));
    const next = await catalog.getMessages("claude", "-p1", "s2");
    expect(next).not.toBe(first);
    expect(next).toHaveLength(2);
  });

  it("caps the number of session logs read at once", async () => {
    const project = join(root, "claude", "-many");
    mkdirSync(project);
    for (let i = 0; i < 12; i++) {
      writeFileSync(join(project, `s${i}.jsonl`), lines([{ type: "user", message: { content: `task ${i}` } }]));
    }

    let active = 0;
    let peak = 0;
    class SlowAdapter extends ClaudeAdapter {
      protected records(projectId: string, sessionId: string): AsyncIterable<RawRecord> {
        const inner = super.records(projectId, sessionId);
        return {
          async *[Symbol.asyncIterator]() {
            active++;
            peak = Math.max(peak, active);
            try {
              await new Promise((resolve) => setTimeout(resolve, 5));
              yield* inner;
            } finally {
              active--;
            }
          },
        };
      }
    }
    const adapters = new Map<Source, SourceAdapter>([["claude", new SlowAdapter(join(root, "claude"), log)]]);
    const capped = new Catalog(
      adapters,
      createNormalizer(defaults(), log),
      cache,
      { scanTimeoutMs: 5_000, readConcurrency: 3 },
      log,
    );

    const sessions = await capped.listSessions("claude", "-many");
    expect(sessions).toHaveLength(12);
    expect(sessions.every((s) => s.messageCount === 1)).toBe(true);
    expect(peak).toBe(3);
  });

  it("reads a listing again when one of its sessions could not be read", async () => {
    let failures = 1;
    class FlakyAdapter extends ClaudeAdapter {
      protected records(projectId: string, sessionId: string): AsyncIterable<RawRecord> {
        if (sessionId === "s2" && failures > 0) {
          failures--;
          throw new Error("EMFILE: too many open files");
        }
        return super.records(projectId, sessionId);
      }
    }
    const adapters = new Map<Source, SourceAdapter>([["claude", new FlakyAdapter(join(root, "claude"), log)]]);
    const flaky = new Catalog(adapters, createNormalizer(defaults(), log), cache, { scanTimeoutMs: 5_000 }, log);

    const first = await flaky.listSessions("claude", "-p1");
    expect(first.find((s) => s.sessionId === "s2")).toMatchObject({ title: "Untitled Session", messageCount: 0 });
    expect(cache.has(cacheKeys.sessions("claude", "-p1"))).toBe(false);

    const second = await flaky.listSessions("claude", "-p1");
    expect(second.find((s) => s.sessionId === "s2")).toMatchObject({ title: "hello world", messageCount: 1 });
    expect(cache.has(cacheKeys.sessions("claude", "-p1"))).toBe(true);
  });

  it("recounts a project's sessions when a chat is added", async () => {
    const qwenRoot = join(root, "qwen");
    const chats = join(qwenRoot, "abc123", "chats");
    mkdirSync(chats, { recursive: true });
    const chat = JSON.stringify({ messages: [{ type: "user", content: "hi" }] });
    writeFileSync(join(chats, "one.json"), chat);
    utimesSync(chats, new Date(1_000_000), new Date(1_000_000));

    const adapters = new Map<Source, SourceAdapter>([["qwen", new QwenAdapter(qwenRoot, log)]]);
    const qwen = new Catalog(adapters, createNormalizer(defaults(), log), cache, { scanTimeoutMs: 5_000 }, log);
    expect((await qwen.listProjects("qwen"))[0].sessionCount).toBe(1);
    expect((await qwen.health()).totalSessions).toBe(1);

    writeFileSync(join(chats, "two.json"), chat);
    utimesSync(chats, new Date(2_000_000), new Date(2_000_000));

    expect((await qwen.listProjects("qwen"))[0].sessionCount).toBe(2);
    expect((await qwen.health()).totalSessions).toBe(2);
    expect(await qwen.listSessions("qwen", "abc123")).toHaveLength(2);
  });

  it("reports a missing source root without affecting the others", async () => {
    const report = await catalog.health();
    expect(report.sources).toEqual([
      { source: "claude", available: true, rootPath: join(root, "claude"), projectCount: 1, sessionCount: 2 },
      {
        source: "qwen",
        available: false,
        rootPath: join(root, "missing"),
        projectCount: 0,
        sessionCount: 0,
        error: "root directory not found",
      },
    ]);
    expect(report.totalProjects).toBe(1);
    expect(report.totalSessions).toBe(2);
  });

  it("rejects disabled sources", async () => {
    await expect(catalog.listProjects("cursor")).rejects.toBeInstanceOf(InvalidRequestError);
  });

  it("abandons scans that exceed the timeout", async () => {
    const slow = build(20);
    await expect(slow.runScan("claude", () => new Promise<never>(() => {}))).rejects.toBeInstanceOf(
      ScanTimeoutError,
    );
  });
});

describe("deriveTitle", () => {
  function message(role: Message["role"], content: string, isPlaceholder = false): Message {
    return { lineIndex: 0, role, timestamp: null, content, toolCalls: [], hasCode: false, isPlaceholder };
  }

  it("uses the first user message when there is no summary", () => {
    expect(deriveTitle([message("summary", "[Unrecognized claude record]", true), message("user", "Fix tests")])).toBe(
      "Fix tests",
    );
  });

  it("cuts long titles", () => {
    expect(deriveTitle([message("user", "a".repeat(120))])).toBe(`${"a".repeat(100)}...`);
  });

  it("falls back to a fixed title", () => {
    expect(deriveTitle([message("assistant", "hello")])).toBe("Untitled Session");
  });
});
