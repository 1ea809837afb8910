import type { FastifyInstance } from "fastify";
import { InvalidRequestError } from "../errors.js";
import type { Viewer } from "../viewer.js";

const TIERS = ["hot", "warm", "all"] as const;

export function registerStatusRoutes(app: FastifyInstance, viewer: Viewer): void {
  // GET /health — per-source availability and counts
  app.get("/health", async () => {
    const report = await viewer.catalog.health();
    return {
      status: report.sources.some((s) => s.available) ? "ok" : "degraded",
      uptime: process.uptime(),
      ...report,
    };
  });

  // GET /api/sources — enabled sources and their roots
  app.get("/api/sources", async () => {
    const sources = await Promise.all(
      [...viewer.adapters.values()].map(async (adapter) => ({
        source: adapter.source,
        rootPath: adapter.rootPath,
        available: await adapter.isAvailable(),
      })),
    );
    return { sources };
  });

  app.get("/api/cache/stats", async () => viewer.cache.stats());

  // POST /api/cache/clear?tier=hot|warm|all
  app.post<{ Querystring: { tier?: string } }>("/api/cache/clear", async (request) => {
    const requested = request.query.tier ?? "all";
    const tier = TIERS.find((t) => t === requested);
    if (!tier) {
      throw new InvalidRequestError(`tier must be one of ${TIERS.join(", ")}`);
    }
    viewer.cache.clear(tier);
    return { cleared: tier, stats: viewer.cache.stats() };
  });
}
