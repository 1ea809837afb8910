import { readFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { SOURCES, type Source } from "./sessions/types.js";

export interface SourceConfig {
  enabled: boolean;
  /** Explicit root override; null falls back to the environment, then the platform default. */
  root: string | null;
}

export interface ViewerConfig {
  port: number;
  host: string;
  sources: Record<Source, SourceConfig>;
  kiro: {
    sessionsRoot: string | null;
  };
  cache: {
    hotCapacity: number;
    warmCapacity: number;
    warmTtlMs: number;
    sweepIntervalMs: number;
  };
  scan: {
    timeoutMs: number;
    /** Session logs read at once. */
    readConcurrency: number;
  };
  diff: {
    maxLines: number;
  };
  search: {
    defaultLimit: number;
    maxLimit: number;
  };
  watch: {
    enabled: boolean;
  };
}

const CONFIG_DIR = join(homedir(), ".config", "agent-log-viewer");
const CONFIG_PATH = join(CONFIG_DIR, "config.yaml");

export function defaults(): ViewerConfig {
  return {
    port: 7861,
    host: "127.0.0.1",
    sources: {
      claude: { enabled: true, root: null },
      qwen: { enabled: true, root: null },
      cursor: { enabled: true, root: null },
      trae: { enabled: true, root: null },
      kiro: { enabled: true, root: null },
    },
    kiro: {
      sessionsRoot: null,
    },
    cache: {
      hotCapacity: 500,
      warmCapacity: 100,
      warmTtlMs: 30_000,
      sweepIntervalMs: 60_000,
    },
    scan: {
      timeoutMs: 5_000,
      readConcurrency: 16,
    },
    diff: {
      maxLines: 1_000,
    },
    search: {
      defaultLimit: 50,
      maxLimit: 500,
    },
    watch: {
      enabled: true,
    },
  };
}

export function loadConfig(
  path: string = CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): ViewerConfig {
  let config = defaults();

  if (existsSync(path)) {
    try {
      const raw = readFileSync(path, "utf-8");
      const parsed: unknown = parseYaml(raw);
      if (isObject(parsed)) {
        config = mergeConfig(config, parsed);
      }
    } catch (err) {
      throw new Error(`Failed to parse config at ${path}: ${err}`);
    }
  }

  const port = parseInt(env.PORT ?? "", 10);
  if (port > 0) config.port = port;
  if (env.HOST) config.host = env.HOST;

  return config;
}

export function mergeConfig(
  base: ViewerConfig,
  overrides: Record<string, unknown>,
): ViewerConfig {
  const result: ViewerConfig = {
    ...base,
    sources: { ...base.sources },
    kiro: { ...base.kiro },
    cache: { ...base.cache },
    scan: { ...base.scan },
    diff: { ...base.diff },
    search: { ...base.search },
    watch: { ...base.watch },
  };

  if (typeof overrides.port === "number") result.port = overrides.port;
  if (typeof overrides.host === "string") result.host = overrides.host;

  const sources = overrides.sources;
  if (isObject(sources)) {
    for (const source of SOURCES) {
      const entry = sources[source];
      if (!isObject(entry)) continue;
      const next = { ...result.sources[source] };
      if (typeof entry.enabled === "boolean") next.enabled = entry.enabled;
      if (typeof entry.root === "string" && entry.root) next.root = expandHome(entry.root);
      result.sources[source] = next;
    }
  }

  const kiro = overrides.kiro;
  if (isObject(kiro)) {
    if (typeof kiro.sessionsRoot === "string" && kiro.sessionsRoot)
      result.kiro.sessionsRoot = expandHome(kiro.sessionsRoot);
  }

  const cache = overrides.cache;
  if (isObject(cache)) {
    if (isPositive(cache.hotCapacity)) result.cache.hotCapacity = cache.hotCapacity;
    if (isPositive(cache.warmCapacity)) result.cache.warmCapacity = cache.warmCapacity;
    if (isPositive(cache.warmTtlMs)) result.cache.warmTtlMs = cache.warmTtlMs;
    // 0 turns the sweep off
    if (typeof cache.sweepIntervalMs === "number" && cache.sweepIntervalMs >= 0)
      result.cache.sweepIntervalMs = cache.sweepIntervalMs;
  }

  const scan = overrides.scan;
  if (isObject(scan)) {
    if (isPositive(scan.timeoutMs)) result.scan.timeoutMs = scan.timeoutMs;
    if (isPositive(scan.readConcurrency)) result.scan.readConcurrency = Math.floor(scan.readConcurrency);
  }

  const diff = overrides.diff;
  if (isObject(diff)) {
    if (isPositive(diff.maxLines)) result.diff.maxLines = diff.maxLines;
  }

  const search = overrides.search;
  if (isObject(search)) {
    if (isPositive(search.defaultLimit)) result.search.defaultLimit = search.defaultLimit;
    if (isPositive(search.maxLimit)) result.search.maxLimit = search.maxLimit;
  }

  const watch = overrides.watch;
  if (isObject(watch)) {
    if (typeof watch.enabled === "boolean") result.watch.enabled = watch.enabled;
  }

  return result;
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPositive(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

export { CONFIG_DIR, CONFIG_PATH };
