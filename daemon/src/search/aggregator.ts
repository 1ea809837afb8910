import type { FastifyBaseLogger } from "fastify";
import { describe, ScanTimeoutError, SourceUnavailableError } from "../errors.js";
import type { Catalog } from "../sessions/catalog.js";
import type { Message, Project, Role, Session, Source } from "../sessions/types.js";
import { countOccurrences, normalizeQuery, snippet } from "./match.js";

const MAX_SNIPPETS = 3;

export interface SnippetPreview {
  lineIndex: number;
  role: Role;
  snippet: string;
}

export interface SearchHit {
  source: Source;
  projectId: string;
  projectName: string;
  sessionId: string;
  title: string;
  modifiedAt: Date;
  /** Occurrences across all messages plus occurrences in the title. */
  score: number;
  matchingMessages: number;
  snippets: SnippetPreview[];
}

export type DiagnosticReason = "unavailable" | "timeout" | "disabled" | "error";

export interface SearchDiagnostic {
  source: Source;
  reason: DiagnosticReason;
  message: string;
}

export interface SearchResult {
  query: string;
  hits: SearchHit[];
  /** Hits before the limit was applied. */
  total: number;
  diagnostics: SearchDiagnostic[];
}

export interface SearchOptions {
  limit?: number;
  /** Restrict to these sources; every enabled source when omitted. */
  sources?: readonly Source[];
}

export interface SearchLimits {
  defaultLimit: number;
  maxLimit: number;
}

/**
 * Cross-source full-text search. Every candidate session is scored before
 * the limit is applied, so the top hits do not depend on which source
 * answered first or how many hits each one had.
 */
export class SearchAggregator {
  private log: FastifyBaseLogger;
  private catalog: Catalog;
  private limits: SearchLimits;

  constructor(catalog: Catalog, limits: SearchLimits, log: FastifyBaseLogger) {
    this.log = log.child({ module: "search" });
    this.catalog = catalog;
    this.limits = limits;
  }

  async searchGlobal(query: string, options: SearchOptions = {}): Promise<SearchResult> {
    const needle = normalizeQuery(query);
    const limit = Math.min(
      this.limits.maxLimit,
      Math.max(1, Math.floor(options.limit ?? this.limits.defaultLimit)),
    );
    const result: SearchResult = { query: query.trim(), hits: [], total: 0, diagnostics: [] };
    if (needle.length === 0) return result;

    const enabled = this.catalog.sources();
    const requested = options.sources ?? enabled;
    const sources: Source[] = [];
    for (const source of requested) {
      if (enabled.includes(source)) {
        sources.push(source);
      } else {
        result.diagnostics.push({ source, reason: "disabled", message: `${source} is not enabled` });
      }
    }

    const settled = await Promise.allSettled(
      sources.map((source) => this.catalog.runScan(source, () => this.searchSource(source, needle))),
    );

    const hits: SearchHit[] = [];
    settled.forEach((outcome, i) => {
      const source = sources[i];
      if (outcome.status === "fulfilled") {
        hits.push(...outcome.value);
        return;
      }
      const diagnostic = diagnose(source, outcome.reason);
      this.log.warn({ source, reason: diagnostic.reason, err: outcome.reason }, "Source skipped in search");
      result.diagnostics.push(diagnostic);
    });

    hits.sort(compareHits);
    result.total = hits.length;
    result.hits = hits.slice(0, limit);
    this.log.debug({ query: result.query, total: result.total, returned: result.hits.length }, "Search complete");
    return result;
  }

  private async searchSource(source: Source, needle: string): Promise<SearchHit[]> {
    const projects = await this.catalog.listProjects(source);
    const perProject = await Promise.all(projects.map((project) => this.searchProject(project, needle)));
    return perProject.flat();
  }

  private async searchProject(project: Project, needle: string): Promise<SearchHit[]> {
    let sessions: Session[];
    try {
      sessions = await this.catalog.listSessions(project.source, project.projectId);
    } catch (err) {
      this.log.warn({ err, source: project.source, projectId: project.projectId }, "Project skipped in search");
      return [];
    }
    const hits = await Promise.all(
      sessions.map(async (session) => {
        try {
          const messages = await this.catalog.getMessages(session.source, session.projectId, session.sessionId);
          return scoreSession(project, session, messages, needle);
        } catch (err) {
          this.log.warn({ err, source: session.source, sessionId: session.sessionId }, "Session skipped in search");
          return null;
        }
      }),
    );
    return hits.filter((hit): hit is SearchHit => hit !== null);
  }
}

/**
 * A hit for session when needle occurs in its title or any message read
 * from the log; placeholders are the viewer's own text and never match.
 */
export function scoreSession(
  project: Project,
  session: Session,
  messages: readonly Message[],
  needle: string,
): SearchHit | null {
  let occurrences = 0;
  let matchingMessages = 0;
  const snippets: SnippetPreview[] = [];

  for (const message of messages) {
    if (message.isPlaceholder) continue;
    const count = countOccurrences(message.content.toLowerCase(), needle);
    if (count === 0) continue;
    occurrences += count;
    matchingMessages++;
    if (snippets.length < MAX_SNIPPETS) {
      snippets.push({ lineIndex: message.lineIndex, role: message.role, snippet: snippet(message.content, needle) });
    }
  }

  const score = occurrences + countOccurrences(session.title.toLowerCase(), needle);
  if (score === 0) return null;
  return {
    source: session.source,
    projectId: session.projectId,
    projectName: project.displayName,
    sessionId: session.sessionId,
    title: session.title,
    modifiedAt: session.modifiedAt,
    score,
    matchingMessages,
    snippets,
  };
}

/** Score descending, then newest first, then source, project and session ids. */
export function compareHits(a: SearchHit, b: SearchHit): number {
  return (
    b.score - a.score ||
    b.modifiedAt.getTime() - a.modifiedAt.getTime() ||
    lexical(a.source, b.source) ||
    lexical(a.projectId, b.projectId) ||
    lexical(a.sessionId, b.sessionId)
  );
}

function lexical(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function diagnose(source: Source, err: unknown): SearchDiagnostic {
  if (err instanceof SourceUnavailableError) return { source, reason: "unavailable", message: err.message };
  if (err instanceof ScanTimeoutError) return { source, reason: "timeout", message: err.message };
  return { source, reason: "error", message: describe(err) };
}
