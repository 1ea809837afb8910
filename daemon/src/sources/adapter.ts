import { stat } from "node:fs/promises";
import type { Stats } from "node:fs";
import type { FastifyBaseLogger } from "fastify";
import type { Source } from "../sessions/types.js";
import { InvalidRequestError, SourceUnavailableError } from "../errors.js";
import type { RawRecord } from "./records.js";

export interface ProjectDescriptor {
  projectId: string;
  displayName: string;
  path: string;
  sessionCount: number;
  lastModified: Date;
}

export interface SessionDescriptor {
  sessionId: string;
  path: string;
  sizeBytes: number;
  createdAt: Date;
  modifiedAt: Date;
  /** Title recorded by the platform itself; null derives it from the messages. */
  title: string | null;
}

/**
 * Reads one platform's on-disk logs. Every variant answers the same calls;
 * the variant is picked from the Source when the viewer starts.
 */
export interface SourceAdapter {
  readonly source: Source;
  readonly rootPath: string;
  isAvailable(): Promise<boolean>;
  /** Newest first. Throws SourceUnavailableError when the root is missing. */
  listProjects(): Promise<ProjectDescriptor[]>;
  /** Newest first. Throws NotFoundError for an unknown project. */
  listSessions(projectId: string): Promise<SessionDescriptor[]>;
  /** Raw records in file order; every iteration starts from the beginning. */
  readRecords(projectId: string, sessionId: string): AsyncIterable<RawRecord>;
  /** Files whose change alters the project's session listing. */
  projectFiles(projectId: string): Promise<string[]>;
  /** Files backing one session; empty when it does not exist. */
  sessionFiles(projectId: string, sessionId: string): Promise<string[]>;
  /** Directories whose changes can alter this source's listings or logs. */
  watchRoots(): string[];
}

export abstract class BaseAdapter implements SourceAdapter {
  readonly source: Source;
  readonly rootPath: string;
  protected log: FastifyBaseLogger;

  constructor(source: Source, rootPath: string, log: FastifyBaseLogger) {
    this.source = source;
    this.rootPath = rootPath;
    this.log = log.child({ module: "source", source });
  }

  async isAvailable(): Promise<boolean> {
    const s = await statOrNull(this.rootPath);
    return s !== null && s.isDirectory();
  }

  async listProjects(): Promise<ProjectDescriptor[]> {
    await this.ensureAvailable();
    const projects = await this.scanProjects();
    return projects.sort((a, b) => b.lastModified.getTime() - a.lastModified.getTime());
  }

  async listSessions(projectId: string): Promise<SessionDescriptor[]> {
    assertSegment(projectId, "project id");
    await this.ensureAvailable();
    const sessions = await this.scanSessions(projectId);
    return sessions.sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime());
  }

  readRecords(projectId: string, sessionId: string): AsyncIterable<RawRecord> {
    assertSegment(projectId, "project id");
    assertSegment(sessionId, "session id");
    return this.records(projectId, sessionId);
  }

  watchRoots(): string[] {
    return [this.rootPath];
  }

  abstract projectFiles(projectId: string): Promise<string[]>;
  abstract sessionFiles(projectId: string, sessionId: string): Promise<string[]>;

  protected abstract scanProjects(): Promise<ProjectDescriptor[]>;
  protected abstract scanSessions(projectId: string): Promise<SessionDescriptor[]>;
  protected abstract records(projectId: string, sessionId: string): AsyncIterable<RawRecord>;

  protected async ensureAvailable(): Promise<void> {
    const s = await statOrNull(this.rootPath);
    if (!s) throw new SourceUnavailableError(this.source, this.rootPath);
    if (!s.isDirectory()) {
      throw new SourceUnavailableError(this.source, this.rootPath, "not a directory");
    }
  }
}

export async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch {
    return null;
  }
}

/** Birth time where the filesystem records one, else the modification time. */
export function createdAt(s: Stats): Date {
  return s.birthtimeMs > 0 ? s.birthtime : s.mtime;
}

/** Ids become path segments; reject anything that could leave the source root. */
export function assertSegment(value: string, what: string): void {
  if (
    value.length === 0 ||
    value === "." ||
    value === ".." ||
    value.includes("/") ||
    value.includes("\\") ||
    value.includes("\0")
  ) {
    throw new InvalidRequestError(`Invalid ${what}: ${JSON.stringify(value)}`);
  }
}

/** Last three segments of a folder path or file:// URI, joined with "/". */
export function shortFolderName(folder: string): string {
  const path = folder.startsWith("file://") ? safeDecode(folder.slice("file://".length)) : folder;
  const parts = path.split(/[\\/]/).filter((p) => p.length > 0);
  return parts.slice(-3).join("/");
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
