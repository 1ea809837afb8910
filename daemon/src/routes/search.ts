import type { FastifyInstance } from "fastify";
import type { SearchAggregator } from "../search/aggregator.js";
import { parseInteger, parseSources } from "./params.js";

export function registerSearchRoutes(app: FastifyInstance, search: SearchAggregator): void {
  // GET /api/search?q=&limit=&sources=a,b — ranked hits across sources
  app.get<{ Querystring: { q?: string; limit?: string; sources?: string } }>(
    "/api/search",
    async (request) =>
      search.searchGlobal(request.query.q ?? "", {
        limit: parseInteger(request.query.limit, "limit"),
        sources: parseSources(request.query.sources),
      }),
  );
}
