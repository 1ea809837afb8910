import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { FastifyBaseLogger } from "fastify";
import type { Source } from "../sessions/types.js";
import { NotFoundError } from "../errors.js";
import { isRecord, parseJsonMaybe, str } from "../json.js";
import {
  BaseAdapter,
  createdAt,
  shortFolderName,
  statOrNull,
  type ProjectDescriptor,
  type SessionDescriptor,
} from "./adapter.js";
import type { RawRecord } from "./records.js";
import { discoverStateKey, openStateDb, readStateValue } from "./state-db.js";
import { extractItems, flattenItems, itemText } from "./state-items.js";

const STATE_DB = "state.vscdb";

/**
 * VS Code derived editors that keep chat history inside each workspace's
 * state.vscdb. A workspace is a project and its chat key is its only session.
 */
export class WorkspaceStateAdapter extends BaseAdapter {
  private preferredKeys: readonly string[];

  constructor(
    source: Source,
    rootPath: string,
    log: FastifyBaseLogger,
    preferredKeys: readonly string[],
  ) {
    super(source, rootPath, log);
    this.preferredKeys = preferredKeys;
  }

  protected async scanProjects(): Promise<ProjectDescriptor[]> {
    const entries = await readdir(this.rootPath, { withFileTypes: true });
    const projects: ProjectDescriptor[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const path = join(this.rootPath, entry.name);
      const db = await statOrNull(join(path, STATE_DB));
      if (!db?.isFile()) continue;
      projects.push({
        projectId: entry.name,
        displayName: (await this.folderName(path)) ?? entry.name,
        path,
        sessionCount: 1,
        lastModified: db.mtime,
      });
    }
    return projects;
  }

  protected async scanSessions(projectId: string): Promise<SessionDescriptor[]> {
    const path = join(this.rootPath, projectId, STATE_DB);
    const s = await statOrNull(path);
    if (!s?.isFile()) throw new NotFoundError(`Project ${projectId}`);

    let key: string | null;
    try {
      key = this.withDb(path, (db) => discoverStateKey(db, this.preferredKeys));
    } catch (err) {
      this.log.warn({ err, path }, "Failed to read workspace state database");
      return [];
    }
    if (!key) return [];
    return [
      {
        sessionId: key,
        path,
        sizeBytes: s.size,
        createdAt: createdAt(s),
        modifiedAt: s.mtime,
        title: null,
      },
    ];
  }

  protected records(projectId: string, sessionId: string): AsyncIterable<RawRecord> {
    const path = join(this.rootPath, projectId, STATE_DB);
    const read = (): RawRecord[] => {
      const raw = this.withDb(path, (db) => readStateValue(db, sessionId));
      if (raw === null) throw new NotFoundError(`Session ${sessionId}`);

      const records: RawRecord[] = [];
      flattenItems(extractItems(parseJsonMaybe(raw))).forEach(({ payload, timestamp }, lineIndex) => {
        // Entries without text are not messages; their index is still consumed
        if (itemText(payload).trim().length === 0) return;
        const data =
          typeof payload === "string" || timestamp === undefined || "timestamp" in payload
            ? payload
            : { ...payload, timestamp };
        records.push({ lineIndex, data });
      });
      return records;
    };

    return {
      async *[Symbol.asyncIterator](): AsyncGenerator<RawRecord> {
        const s = await statOrNull(path);
        if (!s?.isFile()) throw new NotFoundError(`Session ${sessionId}`);
        yield* read();
      },
    };
  }

  async projectFiles(projectId: string): Promise<string[]> {
    return [join(this.rootPath, projectId, STATE_DB)];
  }

  async sessionFiles(projectId: string, _sessionId: string): Promise<string[]> {
    const path = join(this.rootPath, projectId, STATE_DB);
    return (await statOrNull(path)) ? [path] : [];
  }

  /** Run fn against a read-only connection that is closed afterwards. */
  private withDb<T>(path: string, fn: (db: ReturnType<typeof openStateDb>) => T): T {
    const db = openStateDb(path);
    try {
      return fn(db);
    } finally {
      db.close();
    }
  }

  private async folderName(workspaceDir: string): Promise<string | null> {
    try {
      const raw = await readFile(join(workspaceDir, "workspace.json"), "utf-8");
      const folder = workspaceFolder(JSON.parse(raw));
      return folder ? shortFolderName(folder) || null : null;
    } catch (err) {
      this.log.debug({ err, workspaceDir }, "No readable workspace.json");
      return null;
    }
  }
}

/** Folder URI or path recorded in a workspace.json document. */
export function workspaceFolder(data: unknown): string | null {
  if (typeof data === "string") return str(data);
  if (!isRecord(data)) return null;

  for (const field of ["folder", "path", "workspace", "workspacePath", "name"]) {
    const value = data[field];
    if (typeof value === "string" && value) return value;
    if (isRecord(value)) {
      const nested = str(value.path) ?? str(value.folder);
      if (nested) return nested;
    }
  }

  const configuration = parseJsonMaybe(data.configuration);
  for (const holder of [data, configuration]) {
    if (!isRecord(holder) || !Array.isArray(holder.folders)) continue;
    const first: unknown = holder.folders[0];
    if (typeof first === "string" && first) return first;
    if (isRecord(first)) {
      const nested = str(first.path) ?? str(first.folder) ?? str(first.name);
      if (nested) return nested;
    }
  }
  return null;
}
