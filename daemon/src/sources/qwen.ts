import { open, readdir, stat, type FileHandle } from "node:fs/promises";
import { join } from "node:path";
import type { FastifyBaseLogger } from "fastify";
import { NotFoundError } from "../errors.js";
import { isRecord } from "../json.js";
import { BaseAdapter, createdAt, statOrNull, type ProjectDescriptor, type SessionDescriptor } from "./adapter.js";
import { arrayRecords, readJsonFile, type RawRecord } from "./records.js";

const SESSION_EXT = ".json";

/**
 * Qwen Code: ~/.qwen/tmp/<project hash>/chats/<session>.json, each file a
 * document with a `messages` array. QWEN.md beside `chats` names the project.
 */
export class QwenAdapter extends BaseAdapter {
  constructor(rootPath: string, log: FastifyBaseLogger) {
    super("qwen", rootPath, log);
  }

  protected async scanProjects(): Promise<ProjectDescriptor[]> {
    const entries = await readdir(this.rootPath, { withFileTypes: true });
    const projects: ProjectDescriptor[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const path = join(this.rootPath, entry.name);
      const chats = await listSessionFiles(join(path, "chats"));
      if (!chats) continue;
      try {
        const dirStat = await stat(path);
        projects.push({
          projectId: entry.name,
          displayName: (await readTitle(join(path, "QWEN.md"))) ?? entry.name.slice(0, 12),
          path,
          sessionCount: chats.length,
          lastModified: dirStat.mtime,
        });
      } catch (err) {
        this.log.warn({ err, path }, "Failed to read project directory");
      }
    }
    return projects;
  }

  protected async scanSessions(projectId: string): Promise<SessionDescriptor[]> {
    const chatsDir = join(this.rootPath, projectId, "chats");
    const files = await listSessionFiles(chatsDir);
    if (!files) throw new NotFoundError(`Project ${projectId}`);

    const sessions: SessionDescriptor[] = [];
    for (const file of files) {
      const path = join(chatsDir, file);
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
    return arrayRecords(async () => {
      const s = await statOrNull(path);
      if (!s?.isFile()) throw new NotFoundError(`Session ${sessionId}`);
      const doc = await readJsonFile(path, this.log);
      if (isRecord(doc) && Array.isArray(doc.messages)) return doc.messages;
      if (Array.isArray(doc)) return doc;
      return [];
    });
  }

  async projectFiles(projectId: string): Promise<string[]> {
    return [join(this.rootPath, projectId, "chats")];
  }

  async sessionFiles(projectId: string, sessionId: string): Promise<string[]> {
    const path = this.sessionPath(projectId, sessionId);
    return (await statOrNull(path)) ? [path] : [];
  }

  private sessionPath(projectId: string, sessionId: string): string {
    return join(this.rootPath, projectId, "chats", `${sessionId}${SESSION_EXT}`);
  }
}

async function listSessionFiles(dir: string): Promise<string[] | null> {
  try {
    const files = await readdir(dir);
    return files.filter((f) => f.endsWith(SESSION_EXT));
  } catch {
    return null;
  }
}

/** First line of a markdown file without its "# " heading marker. */
async function readTitle(path: string): Promise<string | null> {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch {
    return null;
  }
  try {
    const buf = Buffer.alloc(512);
    const { bytesRead } = await handle.read(buf, 0, buf.length, 0);
    const firstLine = buf.subarray(0, bytesRead).toString("utf-8").split(/\r?\n/)[0].trim();
    const title = firstLine.startsWith("# ") ? firstLine.slice(2).trim() : firstLine;
    return title.length > 0 ? title : null;
  } finally {
    await handle.close();
  }
}
