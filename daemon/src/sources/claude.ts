import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import type { FastifyBaseLogger } from "fastify";
import { NotFoundError } from "../errors.js";
import { BaseAdapter, createdAt, statOrNull, type ProjectDescriptor, type SessionDescriptor } from "./adapter.js";
import { jsonlRecords, type RawRecord } from "./records.js";

const SESSION_EXT = ".jsonl";

/**
 * Claude Code: one directory per project under ~/.claude/projects, named
 * after the working directory with "/" replaced by "-", holding one JSONL
 * file per session.
 */
export class ClaudeAdapter extends BaseAdapter {
  constructor(rootPath: string, log: FastifyBaseLogger) {
    super("claude", rootPath, log);
  }

  protected async scanProjects(): Promise<ProjectDescriptor[]> {
    const entries = await readdir(this.rootPath, { withFileTypes: true });
    const projects: ProjectDescriptor[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const path = join(this.rootPath, entry.name);
      try {
        const [dirStat, files] = await Promise.all([stat(path), readdir(path)]);
        projects.push({
          projectId: entry.name,
          displayName: displayName(entry.name),
          path,
          sessionCount: files.filter((f) => f.endsWith(SESSION_EXT)).length,
          lastModified: dirStat.mtime,
        });
      } catch (err) {
        this.log.warn({ err, path }, "Failed to read project directory");
      }
    }
    return projects;
  }

  protected async scanSessions(projectId: string): Promise<SessionDescriptor[]> {
    const dir = join(this.rootPath, projectId);
    const files = await readdirOrNull(dir);
    if (!files) throw new NotFoundError(`Project ${projectId}`);

    const sessions: SessionDescriptor[] = [];
    for (const file of files) {
      if (!file.endsWith(SESSION_EXT)) continue;
      const path = join(dir, file);
      const s = await statOrNull(path);
      if (!s?.isFile()) continue;
      sessions.push({
        sessionId: file.slice(0, -SESSION_EXT.length),
        path,
        sizeBytes: s.size,
        createdAt: createdAt(s),
        modifiedAt: s.mtime,
        title: null,
      });
    }
    return sessions;
  }

  protected records(projectId: string, sessionId: string): AsyncIterable<RawRecord> {
    const path = this.sessionPath(projectId, sessionId);
    const log = this.log;
    return {
      async *[Symbol.asyncIterator](): AsyncGenerator<RawRecord> {
        const s = await statOrNull(path);
        if (!s?.isFile()) throw new NotFoundError(`Session ${sessionId}`);
        yield* jsonlRecords(path, log);
      },
    };
  }

  async projectFiles(projectId: string): Promise<string[]> {
    return [join(this.rootPath, projectId)];
  }

  async sessionFiles(projectId: string, sessionId: string): Promise<string[]> {
    const path = this.sessionPath(projectId, sessionId);
    return (await statOrNull(path)) ? [path] : [];
  }

  private sessionPath(projectId: string, sessionId: string): string {
    return join(this.rootPath, projectId, `${sessionId}${SESSION_EXT}`);
  }
}

/** "-Users-ada-src-viewer" reads as "ada/src/viewer". */
export function displayName(dirName: string): string {
  if (!dirName.startsWith("-")) return dirName;
  return dirName.slice(1).split("-").slice(-3).join("/");
}

async function readdirOrNull(dir: string): Promise<string[] | null> {
  try {
    return await readdir(dir);
  } catch {
    return null;
  }
}
