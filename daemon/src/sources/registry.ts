import type { FastifyBaseLogger } from "fastify";
import type { ViewerConfig } from "../config.js";
import { Normalizer } from "../normalizer/normalizer.js";
import { PROFILES } from "../normalizer/profiles.js";
import { SOURCES, type Source } from "../sessions/types.js";
import type { SourceAdapter } from "./adapter.js";
import { ClaudeAdapter } from "./claude.js";
import { KiroAdapter } from "./kiro.js";
import { currentContext, resolveKiroSessionsRoot, resolveRoot, type PathContext } from "./paths.js";
import { QwenAdapter } from "./qwen.js";
import { WorkspaceStateAdapter } from "./workspace-state.js";

// ItemTable keys each editor is known to keep its chat history under
const PREFERRED_KEYS = {
  cursor: ["aiService.prompts", "workbench.panel.aichat.view.aichat.chatdata"],
  trae: ["icube-ai-agent-storage-input-history"],
} as const;

export function createAdapter(
  source: Source,
  config: ViewerConfig,
  log: FastifyBaseLogger,
  ctx: PathContext = currentContext(),
): SourceAdapter {
  const root = resolveRoot(source, config.sources[source].root, ctx);
  switch (source) {
    case "claude":
      return new ClaudeAdapter(root, log);
    case "qwen":
      return new QwenAdapter(root, log);
    case "cursor":
    case "trae":
      return new WorkspaceStateAdapter(source, root, log, PREFERRED_KEYS[source]);
    case "kiro":
      return new KiroAdapter(root, resolveKiroSessionsRoot(config.kiro.sessionsRoot, ctx), log);
  }
}

/** One adapter per enabled source, in the fixed source order. */
export function createAdapters(
  config: ViewerConfig,
  log: FastifyBaseLogger,
  ctx: PathContext = currentContext(),
): Map<Source, SourceAdapter> {
  const adapters = new Map<Source, SourceAdapter>();
  for (const source of SOURCES) {
    if (config.sources[source].enabled) {
      adapters.set(source, createAdapter(source, config, log, ctx));
    }
  }
  return adapters;
}

export function createNormalizer(config: ViewerConfig, log: FastifyBaseLogger): Normalizer {
  const normalizer = new Normalizer(log, { maxDiffLines: config.diff.maxLines });
  for (const source of SOURCES) {
    normalizer.register(source, PROFILES[source]);
  }
  return normalizer;
}
