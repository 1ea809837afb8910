import type { FastifyInstance } from "fastify";
import type { Catalog } from "../sessions/catalog.js";
import { searchSession } from "../search/in-session.js";
import { parseInteger, parseRole, parseSource } from "./params.js";

interface ProjectParams {
  source: string;
  projectId: string;
}

interface SessionParams extends ProjectParams {
  sessionId: string;
}

export function registerBrowseRoutes(app: FastifyInstance, catalog: Catalog): void {
  // GET /api/:source/projects — projects of one source, newest first
  app.get<{ Params: { source: string } }>("/api/:source/projects", async (request) => {
    const source = parseSource(request.params.source);
    const projects = await catalog.listProjects(source);
    return { source, projects };
  });

  // GET /api/:source/projects/:projectId/sessions — sessions of one project, newest first
  app.get<{ Params: ProjectParams }>(
    "/api/:source/projects/:projectId/sessions",
    async (request) => {
      const source = parseSource(request.params.source);
      const { projectId } = request.params;
      const sessions = await catalog.listSessions(source, projectId);
      return { source, projectId, sessions };
    },
  );

  // GET /api/:source/projects/:projectId/sessions/:sessionId — one page of a conversation
  app.get<{
    Params: SessionParams;
    Querystring: { page?: string; perPage?: string; search?: string; role?: string };
  }>("/api/:source/projects/:projectId/sessions/:sessionId", async (request) => {
    const source = parseSource(request.params.source);
    const { projectId, sessionId } = request.params;
    const page = await catalog.getConversation(source, projectId, sessionId, {
      page: parseInteger(request.query.page, "page"),
      perPage: parseInteger(request.query.perPage, "perPage"),
      search: request.query.search,
      role: parseRole(request.query.role),
    });
    const summary = await catalog.getSummary(source, projectId, sessionId);
    return { source, projectId, sessionId, summary, ...page };
  });

  // GET /api/:source/projects/:projectId/sessions/:sessionId/search — matches inside one session
  app.get<{
    Params: SessionParams;
    Querystring: { q?: string; offset?: string; limit?: string };
  }>("/api/:source/projects/:projectId/sessions/:sessionId/search", async (request) => {
    const source = parseSource(request.params.source);
    const { projectId, sessionId } = request.params;
    const messages = await catalog.getMessages(source, projectId, sessionId);
    return searchSession(messages, request.query.q ?? "", {
      offset: parseInteger(request.query.offset, "offset"),
      limit: parseInteger(request.query.limit, "limit"),
    });
  });
}
