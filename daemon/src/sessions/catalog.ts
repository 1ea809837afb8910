import type { FastifyBaseLogger } from "fastify";
import pLimit from "p-limit";
import type { CacheManager } from "../cache/manager.js";
import { cacheKeys } from "../cache/keys.js";
import { describe, InvalidRequestError, ScanTimeoutError } from "../errors.js";
import type { Normalizer } from "../normalizer/normalizer.js";
import type { SessionDescriptor, SourceAdapter } from "../sources/adapter.js";
import type {
  ConversationPage,
  HealthReport,
  Message,
  Project,
  Role,
  Session,
  Source,
  SourceHealth,
} from "./types.js";

/** Everything the catalog keeps in the shared cache. */
export type CachedValue =
  | { kind: "projects"; projects: Project[]; files: string[] }
  | { kind: "sessions"; sessions: Session[]; files: string[] }
  | { kind: "messages"; messages: Message[] }
  | { kind: "health"; health: SourceHealth; files: string[] };

type ProjectListing = Extract<CachedValue, { kind: "projects" }>;

export interface CatalogOptions {
  scanTimeoutMs: number;
  /** Session logs read at once across all requests. */
  readConcurrency?: number;
}

export interface ConversationQuery {
  page?: number;
  perPage?: number;
  search?: string;
  role?: Role;
}

export const DEFAULT_PER_PAGE = 50;
export const MAX_PER_PAGE = 500;
export const DEFAULT_READ_CONCURRENCY = 16;
const TITLE_MAX_CHARS = 100;
const UNTITLED = "Untitled Session";

/**
 * Browse API over every enabled source. All reads go through the cache;
 * listings are validated against directory fingerprints and conversations
 * against their log files.
 */
export class Catalog {
  private log: FastifyBaseLogger;
  private adapters: Map<Source, SourceAdapter>;
  private normalizer: Normalizer;
  private cache: CacheManager<CachedValue>;
  private options: CatalogOptions;
  private reads: ReturnType<typeof pLimit>;

  constructor(
    adapters: Map<Source, SourceAdapter>,
    normalizer: Normalizer,
    cache: CacheManager<CachedValue>,
    options: CatalogOptions,
    log: FastifyBaseLogger,
  ) {
    this.log = log.child({ module: "catalog" });
    this.adapters = adapters;
    this.normalizer = normalizer;
    this.cache = cache;
    this.options = options;
    this.reads = pLimit(Math.max(1, options.readConcurrency ?? DEFAULT_READ_CONCURRENCY));
  }

  /** Enabled sources in their fixed order. */
  sources(): Source[] {
    return [...this.adapters.keys()];
  }

  adapter(source: Source): SourceAdapter {
    const adapter = this.adapters.get(source);
    if (!adapter) throw new InvalidRequestError(`Source ${source} is disabled`);
    return adapter;
  }

  async listProjects(source: Source): Promise<Project[]> {
    return (await this.projectListing(source)).projects;
  }

  async listSessions(source: Source, projectId: string): Promise<Session[]> {
    const adapter = this.adapter(source);
    const key = cacheKeys.sessions(source, projectId);
    let failed = 0;

    const value = await this.cache.getOrCompute(
      key,
      async () => {
        const projectFiles = await adapter.projectFiles(projectId);
        const descriptors = await adapter.listSessions(projectId);
        const described = await Promise.all(
          descriptors.map((d) => this.describeSession(source, projectId, d)),
        );
        failed = described.filter((d) => d.readFailed).length;
        const sessions = described.map((d) => d.session);
        return { kind: "sessions", sessions, files: [...projectFiles, ...sessions.map((s) => s.path)] };
      },
      {
        files: (v) => (v.kind === "sessions" ? v.files : []),
        // A listing with unreadable sessions is served once and read again next time
        keep: () => failed === 0,
      },
    );
    if (value.kind !== "sessions") throw unexpected(key, value);
    if (failed > 0) {
      this.log.warn({ source, projectId, failed }, "Session listing incomplete, not cached");
    }
    return value.sessions;
  }

  async getMessages(source: Source, projectId: string, sessionId: string): Promise<Message[]> {
    const adapter = this.adapter(source);
    const key = cacheKeys.messages(source, projectId, sessionId);
    const files = await adapter.sessionFiles(projectId, sessionId);

    const value = await this.cache.getOrCompute(
      key,
      async () => {
        const messages = await this.reads(() =>
          this.normalizer.normalizeSession(source, adapter.readRecords(projectId, sessionId), {
            projectId,
            sessionId,
          }),
        );
        return { kind: "messages", messages };
      },
      { files },
    );
    if (value.kind !== "messages") throw unexpected(key, value);
    return value.messages;
  }

  /** One page of a conversation, optionally filtered by role and text. */
  async getConversation(
    source: Source,
    projectId: string,
    sessionId: string,
    query: ConversationQuery = {},
  ): Promise<ConversationPage> {
    const all = await this.getMessages(source, projectId, sessionId);
    const needle = query.search?.trim().toLowerCase() ?? "";

    const filtered = all.filter(
      (m) =>
        (!query.role || m.role === query.role) &&
        (needle.length === 0 || (!m.isPlaceholder && m.content.toLowerCase().includes(needle))),
    );

    const perPage = clamp(query.perPage ?? DEFAULT_PER_PAGE, 1, MAX_PER_PAGE);
    const totalPages = Math.max(1, Math.ceil(filtered.length / perPage));
    const page = Math.max(1, Math.floor(query.page ?? 1));
    const start = (page - 1) * perPage;

    return {
      messages: filtered.slice(start, start + perPage),
      total: filtered.length,
      page,
      perPage,
      totalPages,
    };
  }

  /** Text of the first summary record, if the session has one. */
  async getSummary(source: Source, projectId: string, sessionId: string): Promise<string | null> {
    const messages = await this.getMessages(source, projectId, sessionId);
    return messages.find((m) => m.role === "summary" && !m.isPlaceholder)?.content ?? null;
  }

  async health(): Promise<HealthReport> {
    const sources = await Promise.all(this.sources().map((source) => this.sourceHealth(source)));
    return {
      sources,
      totalProjects: sources.reduce((sum, s) => sum + s.projectCount, 0),
      totalSessions: sources.reduce((sum, s) => sum + s.sessionCount, 0),
    };
  }

  /**
   * Run one source's part of a multi-source request, abandoning it after
   * scan.timeoutMs. The abandoned work keeps running; its result is ignored.
   */
  runScan<T>(source: Source, scan: () => Promise<T>): Promise<T> {
    const timeoutMs = this.options.scanTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ScanTimeoutError(source, timeoutMs)), timeoutMs);
    });
    return Promise.race([scan(), timeout]).finally(() => clearTimeout(timer));
  }

  private async sourceHealth(source: Source): Promise<SourceHealth> {
    const adapter = this.adapter(source);
    const key = cacheKeys.health(source);
    try {
      const value = await this.cache.getOrCompute(
        key,
        () => this.runScan(source, () => this.computeHealth(source)),
        { tier: "warm", files: (v) => (v.kind === "health" ? v.files : [adapter.rootPath]) },
      );
      if (value.kind !== "health") throw unexpected(key, value);
      return value.health;
    } catch (err) {
      this.log.warn({ err, source }, "Health scan failed");
      return {
        source,
        available: false,
        rootPath: adapter.rootPath,
        projectCount: 0,
        sessionCount: 0,
        error: describe(err),
      };
    }
  }

  private async computeHealth(source: Source): Promise<CachedValue> {
    const adapter = this.adapter(source);
    const base = { source, rootPath: adapter.rootPath };
    if (!(await adapter.isAvailable())) {
      return {
        kind: "health",
        health: { ...base, available: false, projectCount: 0, sessionCount: 0, error: "root directory not found" },
        files: [adapter.rootPath],
      };
    }
    // Counts come from the project listing, so its files decide when they go stale
    const { projects, files } = await this.projectListing(source);
    return {
      kind: "health",
      health: {
        ...base,
        available: true,
        projectCount: projects.length,
        sessionCount: projects.reduce((sum, p) => sum + p.sessionCount, 0),
      },
      files,
    };
  }

  private async projectListing(source: Source): Promise<ProjectListing> {
    const adapter = this.adapter(source);
    const key = cacheKeys.projects(source);

    const value = await this.cache.getOrCompute(
      key,
      async () => {
        const descriptors = await adapter.listProjects();
        const projectFiles = await Promise.all(descriptors.map((d) => adapter.projectFiles(d.projectId)));
        return {
          kind: "projects",
          projects: descriptors.map((d) => ({ source, ...d })),
          files: [adapter.rootPath, ...descriptors.map((d) => d.path), ...projectFiles.flat()],
        };
      },
      { files: (v) => (v.kind === "projects" ? v.files : []) },
    );
    if (value.kind !== "projects") throw unexpected(key, value);
    return value;
  }

  private async describeSession(
    source: Source,
    projectId: string,
    descriptor: SessionDescriptor,
  ): Promise<{ session: Session; readFailed: boolean }> {
    const { title, ...rest } = descriptor;
    let messages: Message[] = [];
    let readFailed = false;
    try {
      messages = await this.getMessages(source, projectId, descriptor.sessionId);
    } catch (err) {
      readFailed = true;
      this.log.warn({ err, source, projectId, sessionId: descriptor.sessionId }, "Failed to read session");
    }
    const session: Session = {
      source,
      projectId,
      ...rest,
      title: title ?? deriveTitle(messages),
      messageCount: messages.filter((m) => !m.isPlaceholder).length,
    };
    return { session, readFailed };
  }
}

/**
 * A platform-recorded summary names the session best; otherwise the first
 * user message, cut to TITLE_MAX_CHARS.
 */
export function deriveTitle(messages: readonly Message[]): string {
  const summary = messages.find((m) => m.role === "summary" && !m.isPlaceholder);
  if (summary) return cut(summary.content);
  const firstUser = messages.find((m) => m.role === "user" && m.content.trim().length > 0);
  return firstUser ? cut(firstUser.content) : UNTITLED;
}

function cut(text: string): string {
  const line = text.trim().replace(/\s+/g, " ");
  return line.length > TITLE_MAX_CHARS ? `${line.slice(0, TITLE_MAX_CHARS)}...` : line;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, Math.floor(value)));
}

function unexpected(key: string, value: CachedValue): Error {
  return new Error(`Cache entry ${key} holds ${value.kind}`);
}
