export const SOURCES = ["claude", "qwen", "cursor", "trae", "kiro"] as const;

export type Source = (typeof SOURCES)[number];

export function isSource(value: string): value is Source {
  return SOURCES.some((source) => source === value);
}

export type Role = "user" | "assistant" | "summary" | "tool";

export const ROLES: readonly Role[] = ["user", "assistant", "summary", "tool"];

export interface Project {
  source: Source;
  projectId: string;
  displayName: string;
  path: string;
  sessionCount: number;
  lastModified: Date;
}

export interface Session {
  source: Source;
  projectId: string;
  sessionId: string;
  title: string;
  messageCount: number;
  sizeBytes: number;
  createdAt: Date;
  modifiedAt: Date;
  path: string;
}

export type DiffLineKind = "context" | "added" | "removed";

export interface DiffLine {
  kind: DiffLineKind;
  oldLineNo?: number;
  newLineNo?: number;
  text: string;
}

export interface DiffResult {
  lines: DiffLine[];
  added: number;
  removed: number;
  /** Set when either side was cut to the configured line limit before diffing. */
  truncated: boolean;
}

export interface ToolCall {
  /** Platform tool-use id, used to pair invocations with their results. */
  id: string | null;
  name: string;
  parameters: Record<string, unknown>;
  result: unknown;
  isEdit: boolean;
  diff: DiffResult | null;
}

export interface Message {
  /** 0-based record position in the backing log; stable while the file is unchanged. */
  lineIndex: number;
  role: Role;
  timestamp: string | null;
  content: string;
  toolCalls: ToolCall[];
  hasCode: boolean;
  isPlaceholder: boolean;
}

/**
 * Identity tuple handed to external stores (favorites, bookmarks).
 * The core never resolves it back to anything but a session lookup.
 */
export interface SessionRef {
  source: Source;
  projectId: string;
  sessionId: string;
  lineIndex?: number;
}

export interface ConversationPage {
  messages: Message[];
  total: number;
  page: number;
  perPage: number;
  totalPages: number;
}

export interface SourceHealth {
  source: Source;
  available: boolean;
  rootPath: string;
  projectCount: number;
  sessionCount: number;
  error?: string;
}

export interface HealthReport {
  sources: SourceHealth[];
  totalProjects: number;
  totalSessions: number;
}
