import type { Source } from "../sessions/types.js";

export const cacheKeys = {
  projects: (source: Source): string => `projects:${source}`,
  sessions: (source: Source, projectId: string): string => `sessions:${source}:${projectId}`,
  messages: (source: Source, projectId: string, sessionId: string): string =>
    `messages:${source}:${projectId}:${sessionId}`,
  health: (source: Source): string => `health:${source}`,
};
