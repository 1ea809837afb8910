import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { FastifyBaseLogger } from "fastify";
import { NotFoundError } from "../errors.js";
import { isRecord, str } from "../json.js";
import {
  BaseAdapter,
  createdAt,
  shortFolderName,
  statOrNull,
  type ProjectDescriptor,
  type SessionDescriptor,
} from "./adapter.js";
import { arrayRecords, readJsonFile, type RawRecord } from "./records.js";

interface SessionIndexEntry {
  sessionId: string;
  title: string | null;
}

/**
 * Kiro: workspaces are listed under workspaceStorage like any VS Code fork,
 * but chats live in globalStorage, in a directory named after the base64 of
 * the workspace folder, holding sessions.json and one <id>.json per session.
 */
export class KiroAdapter extends BaseAdapter {
  readonly sessionsRoot: string;

  constructor(rootPath: string, sessionsRoot: string, log: FastifyBaseLogger) {
    super("kiro", rootPath, log);
    this.sessionsRoot = sessionsRoot;
  }

  watchRoots(): string[] {
    return [this.rootPath, this.sessionsRoot];
  }

  protected async scanProjects(): Promise<ProjectDescriptor[]> {
    const entries = await readdir(this.rootPath, { withFileTypes: true });
    const projects: ProjectDescriptor[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const path = join(this.rootPath, entry.name);
      const folder = await this.folderOf(entry.name);
      if (!folder) continue;
      const dirStat = await statOrNull(path);
      if (!dirStat) continue;
      const index = await this.readIndex(folder);
      projects.push({
        projectId: entry.name,
        displayName: shortFolderName(folder) || entry.name,
        path,
        sessionCount: index?.length ?? 0,
        lastModified: dirStat.mtime,
      });
    }
    return projects;
  }

  protected async scanSessions(projectId: string): Promise<SessionDescriptor[]> {
    const folder = await this.folderOf(projectId);
    if (!folder) throw new NotFoundError(`Project ${projectId}`);
    const index = await this.readIndex(folder);
    if (!index) return [];

    const dir = this.sessionsDir(folder);
    const sessions: SessionDescriptor[] = [];
    for (const { sessionId, title } of index) {
      const path = join(dir, `${sessionId}.json`);
      const s = await statOrNull(path);
      if (!s?.isFile()) continue;
      sessions.push({
        sessionId,
        path,
        sizeBytes: s.size,
        createdAt: createdAt(s),
        modifiedAt: s.mtime,
        title,
      });
    }
    return sessions;
  }

  protected records(projectId: string, sessionId: string): AsyncIterable<RawRecord> {
    return arrayRecords(async () => {
      const [path] = await this.sessionFiles(projectId, sessionId);
      if (!path) throw new NotFoundError(`Session ${sessionId}`);
      const doc = await readJsonFile(path, this.log);
      return isRecord(doc) && Array.isArray(doc.history) ? doc.history : [];
    });
  }

  async projectFiles(projectId: string): Promise<string[]> {
    const workspaceJson = join(this.rootPath, projectId, "workspace.json");
    const folder = await this.folderOf(projectId);
    if (!folder) return [workspaceJson];
    return [workspaceJson, join(this.sessionsDir(folder), "sessions.json")];
  }

  async sessionFiles(projectId: string, sessionId: string): Promise<string[]> {
    const folder = await this.folderOf(projectId);
    if (!folder) return [];
    const path = join(this.sessionsDir(folder), `${sessionId}.json`);
    return (await statOrNull(path)) ? [path] : [];
  }

  private sessionsDir(folder: string): string {
    return join(this.sessionsRoot, sessionsDirName(folder));
  }

  /** Folder path from workspace.json, without the file:// scheme. */
  private async folderOf(projectId: string): Promise<string | null> {
    const file = join(this.rootPath, projectId, "workspace.json");
    try {
      const data: unknown = JSON.parse(await readFile(file, "utf-8"));
      const folder = isRecord(data) ? str(data.folder) : null;
      return folder ? folder.replace(/^file:\/\//, "") : null;
    } catch (err) {
      this.log.debug({ err, file }, "No readable workspace.json");
      return null;
    }
  }

  private async readIndex(folder: string): Promise<SessionIndexEntry[] | null> {
    const file = join(this.sessionsDir(folder), "sessions.json");
    if (!(await statOrNull(file))) return null;
    const data = await readJsonFile(file, this.log);
    if (!Array.isArray(data)) return null;

    const entries: SessionIndexEntry[] = [];
    for (const item of data) {
      if (!isRecord(item)) continue;
      const sessionId = str(item.sessionId);
      if (sessionId) entries.push({ sessionId, title: str(item.title) });
    }
    return entries;
  }
}

/**
 * Kiro's directory name for a workspace folder: base64 of the path with the
 * "=" padding dropped and one or two "_" appended in its place.
 */
export function sessionsDirName(folder: string): string {
  const bytes = Buffer.from(folder.replace(/^file:\/\//, ""), "utf-8");
  const encoded = bytes.toString("base64").replace(/=+$/, "");
  const padding = (3 - (bytes.length % 3)) % 3;
  if (padding === 1) return `${encoded}__`;
  if (padding === 2) return `${encoded}_`;
  return encoded;
}
