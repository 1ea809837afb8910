import type { FastifyInstance } from "fastify";
import { registerBrowseRoutes } from "./routes/browse.js";
import { registerErrorHandler } from "./routes/errors.js";
import { registerSearchRoutes } from "./routes/search.js";
import { registerStatusRoutes } from "./routes/status.js";
import type { Viewer } from "./viewer.js";

/** Mount the viewer's HTTP API on app. */
export function registerRoutes(app: FastifyInstance, viewer: Viewer): void {
  registerErrorHandler(app);
  registerStatusRoutes(app, viewer);
  registerSearchRoutes(app, viewer.search);
  registerBrowseRoutes(app, viewer.catalog);
}
