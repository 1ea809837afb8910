import type { FastifyBaseLogger } from "fastify";
import { CacheManager } from "./cache/manager.js";
import type { ViewerConfig } from "./config.js";
import { SearchAggregator } from "./search/aggregator.js";
import { Catalog, type CachedValue } from "./sessions/catalog.js";
import type { Source } from "./sessions/types.js";
import { CacheWatcher } from "./sessions/watcher.js";
import type { SourceAdapter } from "./sources/adapter.js";
import { currentContext, type PathContext } from "./sources/paths.js";
import { createAdapters, createNormalizer } from "./sources/registry.js";

/** The wired core: one cache shared by browsing, search and the watcher. */
export interface Viewer {
  config: ViewerConfig;
  adapters: Map<Source, SourceAdapter>;
  cache: CacheManager<CachedValue>;
  catalog: Catalog;
  search: SearchAggregator;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createViewer(
  config: ViewerConfig,
  log: FastifyBaseLogger,
  ctx: PathContext = currentContext(),
): Viewer {
  const adapters = createAdapters(config, log, ctx);
  const cache = new CacheManager<CachedValue>(config.cache, log);
  const catalog = new Catalog(
    adapters,
    createNormalizer(config, log),
    cache,
    { scanTimeoutMs: config.scan.timeoutMs, readConcurrency: config.scan.readConcurrency },
    log,
  );
  const search = new SearchAggregator(catalog, config.search, log);
  const watcher = config.watch.enabled ? new CacheWatcher(adapters, cache, log) : null;

  return {
    config,
    adapters,
    cache,
    catalog,
    search,
    async start() {
      cache.startSweep();
      await watcher?.start();
      for (const adapter of adapters.values()) {
        log.info(
          { source: adapter.source, root: adapter.rootPath, available: await adapter.isAvailable() },
          "Source registered",
        );
      }
    },
    async stop() {
      await watcher?.stop();
      cache.dispose();
    },
  };
}
