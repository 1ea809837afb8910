import { watch, type FSWatcher } from "chokidar";
import { isAbsolute, relative, sep } from "node:path";
import type { FastifyBaseLogger } from "fastify";
import { cacheKeys } from "../cache/keys.js";
import { statOrNull, type SourceAdapter } from "../sources/adapter.js";
import type { Source } from "./types.js";

// Extensions of per-session log files, for sources that keep one file per session
const SESSION_FILE: Partial<Record<Source, string>> = {
  claude: ".jsonl",
  qwen: ".json",
};

/**
 * Cache keys (and key prefixes) made stale by a change to path, which lies
 * under root, the directory watched for source. Per-session logs drop only
 * their own conversation; anything else drops the whole project.
 */
export function cachePrefixesFor(source: Source, root: string, path: string): string[] {
  const rel = relative(root, path);
  if (rel.startsWith("..") || isAbsolute(rel)) return [];

  const prefixes = [cacheKeys.projects(source), cacheKeys.health(source)];
  const segments = rel.split(sep).filter((s) => s.length > 0);
  const [projectId] = segments;
  if (!projectId) return prefixes;

  prefixes.push(cacheKeys.sessions(source, projectId));

  const fileName = segments[segments.length - 1];
  const ext = SESSION_FILE[source];
  const inSessionDir = source !== "qwen" || segments[segments.length - 2] === "chats";
  if (ext !== undefined && segments.length >= 2 && inSessionDir && fileName.endsWith(ext)) {
    prefixes.push(cacheKeys.messages(source, projectId, fileName.slice(0, -ext.length)));
  } else {
    prefixes.push(`messages:${source}:${projectId}`);
  }
  return prefixes;
}

/** The part of the cache the watcher drives. */
export interface Invalidator {
  invalidate(keyOrPrefix: string): number;
}

/**
 * Invalidates cache entries as source files change on disk. Fingerprints
 * already catch stale entries on read; this drops them as soon as the
 * change happens.
 */
export class CacheWatcher {
  private log: FastifyBaseLogger;
  private cache: Invalidator;
  private watcher: FSWatcher | null = null;
  private roots: Array<{ source: Source; root: string; projectLevel: boolean }> = [];

  constructor(
    adapters: Map<Source, SourceAdapter>,
    cache: Invalidator,
    log: FastifyBaseLogger,
  ) {
    this.log = log.child({ module: "watcher" });
    this.cache = cache;
    for (const adapter of adapters.values()) {
      const [root, ...extra] = adapter.watchRoots();
      this.roots.push({ source: adapter.source, root, projectLevel: true });
      // Secondary roots are not laid out by project; a change there drops the source's listings
      for (const dir of extra) this.roots.push({ source: adapter.source, root: dir, projectLevel: false });
    }
  }

  async start(): Promise<void> {
    const available: string[] = [];
    for (const { root } of this.roots) {
      if ((await statOrNull(root))?.isDirectory()) available.push(root);
    }
    if (available.length === 0) {
      this.log.info("No source roots to watch");
      return;
    }

    this.watcher = watch(available, {
      ignoreInitial: true,
      depth: 3,
      persistent: true,
      awaitWriteFinish: { stabilityThreshold: 500, pollInterval: 100 },
    });

    this.watcher.on("add", (path) => this.onChange(path));
    this.watcher.on("change", (path) => this.onChange(path));
    this.watcher.on("unlink", (path) => this.onChange(path));
    this.watcher.on("addDir", (path) => this.onChange(path));
    this.watcher.on("unlinkDir", (path) => this.onChange(path));
    this.watcher.on("error", (err) => this.log.warn({ err }, "File watcher error"));

    this.log.info({ roots: available }, "Watching source roots");
  }

  async stop(): Promise<void> {
    await this.watcher?.close();
    this.watcher = null;
  }

  /** Drop every cache entry the change at path could have made stale. */
  onChange(path: string): void {
    for (const { source, root, projectLevel } of this.roots) {
      const prefixes = projectLevel
        ? cachePrefixesFor(source, root, path)
        : sourceWide(source, root, path);
      if (prefixes.length === 0) continue;

      let removed = 0;
      for (const prefix of prefixes) removed += this.cache.invalidate(prefix);
      this.log.debug({ source, path, removed }, "Source file changed");
    }
  }
}

function sourceWide(source: Source, root: string, path: string): string[] {
  const rel = relative(root, path);
  if (rel.startsWith("..") || isAbsolute(rel)) return [];
  return [
    cacheKeys.projects(source),
    cacheKeys.health(source),
    `sessions:${source}`,
    `messages:${source}`,
  ];
}
