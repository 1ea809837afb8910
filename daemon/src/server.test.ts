import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import Fastify, { type FastifyInstance } from "fastify";
import pino from "pino";
import { defaults } from "./config.js";
import { registerRoutes } from "./server.js";
import { createViewer, type Viewer } from "./viewer.js";

const log = pino({ level: "silent" });

describe("HTTP API", () => {
  let root: string;
  let viewer: Viewer;
  let app: FastifyInstance;

  beforeEach(async () => {
    root = mkdtempSync(join(tmpdir(), "viewer-http-"));
    const project = join(root, "claude", "-p1");
    mkdirSync(project, { recursive: true });
    writeFileSync(
      join(project, "s1.jsonl"),
      [
        { type: "user", message: { content: "Where is the parser?" } },
        { type: "assistant", message: { content: "The parser lives in src/parse." } },
        { type: "user", message: { content: "Thanks" } },
      ]
        .map((r) => JSON.stringify(r))
        .join("\n"),
    );

    const config = defaults();
    config.sources.claude.root = join(root, "claude");
    config.sources.qwen.root = join(root, "missing");
    config.sources.cursor.enabled = false;
    config.sources.trae.enabled = false;
    config.sources.kiro.enabled = false;
    config.watch.enabled = false;
    config.cache.sweepIntervalMs = 0;

    viewer = createViewer(config, log, { home: root, platform: "linux", env: {} });
    app = Fastify({ logger: false });
    registerRoutes(app, viewer);
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    await viewer.stop();
    rmSync(root, { recursive: true, force: true });
  });

  it("lists projects", async () => {
    const res = await app.inject({ method: "GET", url: "/api/claude/projects" });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.source).toBe("claude");
    expect(body.projects.map((p: { projectId: string }) => p.projectId)).toEqual(["-p1"]);
  });

  it("lists sessions with derived titles", async () => {
    const res = await app.inject({ method: "GET", url: "/api/claude/projects/-p1/sessions" });
    expect(res.statusCode).toBe(200);
    expect(res.json().sessions[0]).toMatchObject({
      sessionId: "s1",
      title: "Where is the parser?",
      messageCount: 3,
    });
  });

  it("pages a conversation", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/claude/projects/-p1/sessions/s1?perPage=1&page=2",
    });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({ total: 3, page: 2, perPage: 1, totalPages: 3, summary: null });
    expect(body.messages[0].content).toBe("The parser lives in src/parse.");
  });

  it("filters a conversation by role", async () => {
    const res = await app.inject({ method: "GET", url: "/api/claude/projects/-p1/sessions/s1?role=user" });
    expect(res.json().total).toBe(2);
  });

  it("searches inside a session", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/claude/projects/-p1/sessions/s1/search?q=parser&limit=1",
    });
    expect(res.json()).toEqual({
      query: "parser",
      total: 2,
      offset: 0,
      limit: 1,
      matches: [{ lineIndex: 0, role: "user", occurrences: 1, snippet: "Where is the parser?" }],
    });
  });

  it("searches across sources and reports unavailable ones", async () => {
    const res = await app.inject({ method: "GET", url: "/api/search?q=parser" });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.total).toBe(1);
    expect(body.hits[0]).toMatchObject({ source: "claude", sessionId: "s1", score: 3, matchingMessages: 2 });
    expect(body.diagnostics).toEqual([
      {
        source: "qwen",
        reason: "unavailable",
        message: `qwen logs unavailable at ${join(root, "missing")}: root directory not found`,
      },
    ]);
  });

  it("rejects unknown sources with 400", async () => {
    const res = await app.inject({ method: "GET", url: "/api/nope/projects" });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "INVALID_REQUEST",
      message: 'Unknown source "nope"',
      action: "Check the source name and query parameters",
    });
  });

  it("rejects malformed parameters with 400", async () => {
    for (const url of [
      "/api/claude/projects/-p1/sessions/s1?page=two",
      "/api/claude/projects/-p1/sessions/s1?role=robot",
      "/api/search?q=x&sources=claude,bogus",
    ]) {
      const res = await app.inject({ method: "GET", url });
      expect(res.statusCode).toBe(400);
    }
  });

  it("answers 404 for unknown sessions", async () => {
    const res = await app.inject({ method: "GET", url: "/api/claude/projects/-p1/sessions/absent" });
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe("NOT_FOUND");
  });

  it("answers 503 for a source whose root is missing", async () => {
    const res = await app.inject({ method: "GET", url: "/api/qwen/projects" });
    expect(res.statusCode).toBe(503);
    expect(res.json().error).toBe("SOURCE_UNAVAILABLE");
  });

  it("reports health per source", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    const body = res.json();
    expect(body.status).toBe("ok");
    expect(body.totalSessions).toBe(1);
    expect(body.sources.map((s: { source: string; available: boolean }) => [s.source, s.available])).toEqual([
      ["claude", true],
      ["qwen", false],
    ]);
  });

  it("exposes and clears the cache", async () => {
    await app.inject({ method: "GET", url: "/api/claude/projects/-p1/sessions/s1" });
    const stats = (await app.inject({ method: "GET", url: "/api/cache/stats" })).json();
    expect(stats.tiers.hot.entries).toBe(1);

    const cleared = await app.inject({ method: "POST", url: "/api/cache/clear?tier=hot" });
    expect(cleared.json().cleared).toBe("hot");
    expect(cleared.json().stats.tiers.hot.entries).toBe(0);

    const bad = await app.inject({ method: "POST", url: "/api/cache/clear?tier=cold" });
    expect(bad.statusCode).toBe(400);
  });
});
