import { homedir } from "node:os";
import { join } from "node:path";
import type { Source } from "../sessions/types.js";
import { expandHome } from "../config.js";

export const ROOT_ENV: Record<Source, string> = {
  claude: "CLAUDE_PROJECTS_PATH",
  qwen: "QWEN_PROJECTS_PATH",
  cursor: "CURSOR_WORKSPACE_STORAGE_PATH",
  trae: "TRAE_WORKSPACE_STORAGE_PATH",
  kiro: "KIRO_WORKSPACE_STORAGE_PATH",
};

export const KIRO_SESSIONS_ENV = "KIRO_SESSIONS_PATH";

// Application folder names of the VS Code derived editors
const EDITOR_APPS = {
  cursor: "Cursor",
  trae: "Trae",
  kiro: "Kiro",
} as const;

export interface PathContext {
  home: string;
  platform: NodeJS.Platform;
  env: NodeJS.ProcessEnv;
}

export function currentContext(): PathContext {
  return { home: homedir(), platform: process.platform, env: process.env };
}

/** The editor's `User` directory, which holds workspaceStorage and globalStorage. */
export function editorUserDir(app: string, ctx: PathContext): string {
  switch (ctx.platform) {
    case "darwin":
      return join(ctx.home, "Library", "Application Support", app, "User");
    case "win32":
      return join(ctx.env.APPDATA ?? join(ctx.home, "AppData", "Roaming"), app, "User");
    default:
      return join(ctx.env.XDG_CONFIG_HOME ?? join(ctx.home, ".config"), app, "User");
  }
}

export function defaultRoot(source: Source, ctx: PathContext): string {
  switch (source) {
    case "claude":
      return join(ctx.home, ".claude", "projects");
    case "qwen":
      return join(ctx.home, ".qwen", "tmp");
    case "cursor":
    case "trae":
    case "kiro":
      return join(editorUserDir(EDITOR_APPS[source], ctx), "workspaceStorage");
  }
}

/** Explicit override, then the source's environment variable, then the platform default. */
export function resolveRoot(
  source: Source,
  override: string | null,
  ctx: PathContext = currentContext(),
): string {
  if (override) return expandHome(override);
  const fromEnv = ctx.env[ROOT_ENV[source]];
  if (fromEnv) return expandHome(fromEnv);
  return defaultRoot(source, ctx);
}

export function resolveKiroSessionsRoot(
  override: string | null,
  ctx: PathContext = currentContext(),
): string {
  if (override) return expandHome(override);
  const fromEnv = ctx.env[KIRO_SESSIONS_ENV];
  if (fromEnv) return expandHome(fromEnv);
  return join(
    editorUserDir(EDITOR_APPS.kiro, ctx),
    "globalStorage",
    "kiro.kiroagent",
    "workspace-sessions",
  );
}
