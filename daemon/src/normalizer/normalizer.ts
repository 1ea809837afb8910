import type { FastifyBaseLogger } from "fastify";
import { diff, DEFAULT_MAX_LINES } from "../diff/diff.js";
import { describe } from "../errors.js";
import { isRecord, toIsoTimestamp, type JsonObject } from "../json.js";
import type { Message, Role, Source, ToolCall } from "../sessions/types.js";
import type { RawRecord } from "../sources/records.js";
import { tableRole, type BodyContext, type RecordBody, type RecordProfile } from "./profile.js";
import { hasCode } from "./tools.js";

export interface NormalizerOptions {
  maxDiffLines?: number;
}

/**
 * Turns raw platform records into Messages using the profile registered for
 * each source. A record that cannot be read becomes a summary placeholder;
 * a session is never aborted because of one bad record.
 */
export class Normalizer {
  private log: FastifyBaseLogger;
  private profiles = new Map<Source, RecordProfile>();
  private ctx: BodyContext;

  constructor(log: FastifyBaseLogger, options: NormalizerOptions = {}) {
    this.log = log.child({ module: "normalizer" });
    const maxLines = options.maxDiffLines ?? DEFAULT_MAX_LINES;
    this.ctx = { diff: (before, after) => diff(before, after, { maxLines }) };
  }

  register(source: Source, profile: RecordProfile): void {
    this.profiles.set(source, profile);
  }

  normalize(source: Source, raw: RawRecord): Message {
    const profile = this.profiles.get(source);
    if (!profile) {
      throw new Error(`No record profile registered for ${source}`);
    }

    const record = isRecord(raw.data) ? raw.data : (profile.coerce?.(raw.data) ?? null);
    if (!record) {
      return placeholder(raw.lineIndex, null, `Unrecognized ${source} record`);
    }

    const timestamp = toIsoTimestamp(record.timestamp);
    const role = resolveRole(profile, record);
    if (!role) {
      return placeholder(raw.lineIndex, timestamp, `Unrecognized ${source} record${kindOf(record)}`);
    }

    let body: RecordBody | null;
    try {
      body = profile.body(record, role, this.ctx);
    } catch (err) {
      return placeholder(raw.lineIndex, timestamp, `Unreadable ${source} record: ${describe(err)}`);
    }
    if (!body || (body.content.trim().length === 0 && body.toolCalls.length === 0)) {
      return placeholder(raw.lineIndex, timestamp, `Empty ${source} record${kindOf(record)}`);
    }

    return {
      lineIndex: raw.lineIndex,
      role: body.role ?? role,
      timestamp: body.timestamp ?? timestamp,
      content: body.content,
      toolCalls: body.toolCalls,
      hasCode: hasCode(body.content),
      isPlaceholder: false,
    };
  }

  /**
   * Normalize every record of a session in file order, then pair tool
   * results with the invocations that produced them.
   */
  async normalizeSession(
    source: Source,
    records: AsyncIterable<RawRecord>,
    context: Record<string, string> = {},
  ): Promise<Message[]> {
    const messages: Message[] = [];
    for await (const raw of records) {
      messages.push(this.normalize(source, raw));
    }
    linkToolResults(messages);

    const placeholders = messages.filter((m) => m.isPlaceholder).length;
    if (placeholders > 0) {
      this.log.warn({ source, ...context, placeholders }, "Records replaced by placeholders");
    }
    return messages;
  }
}

function resolveRole(profile: RecordProfile, record: JsonObject): Role | null {
  return tableRole(profile, record) ?? profile.inferRole?.(record) ?? profile.roles.fallback ?? null;
}

function kindOf(record: JsonObject): string {
  return typeof record.type === "string" ? ` (${record.type})` : "";
}

function placeholder(lineIndex: number, timestamp: string | null, content: string): Message {
  return {
    lineIndex,
    role: "summary",
    timestamp,
    content: `[${content}]`,
    toolCalls: [],
    hasCode: false,
    isPlaceholder: true,
  };
}

/** Copy each tool result onto the earlier invocation with the same id. */
function linkToolResults(messages: readonly Message[]): void {
  const invocations = new Map<string, ToolCall>();
  for (const message of messages) {
    for (const call of message.toolCalls) {
      if (!call.id) continue;
      if (call.name !== "tool_result") {
        invocations.set(call.id, call);
        continue;
      }
      const origin = invocations.get(call.id);
      if (!origin) continue;
      origin.result = call.result;
      call.name = origin.name;
    }
  }
}
