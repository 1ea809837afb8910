import type { Role, ToolCall } from "../sessions/types.js";
import { getPath, type JsonObject } from "../json.js";
import type { DiffFn } from "./tools.js";

/** Where a platform stores the role, and what its values mean. */
export interface RoleTable {
  /** Dotted path of the role field, e.g. "message.role". */
  field: string;
  values: Record<string, Role>;
  /** Role when the field is absent or unmapped and no structural rule applies. */
  fallback?: Role;
}

export interface RecordBody {
  content: string;
  toolCalls: ToolCall[];
  timestamp: string | null;
  /** Overrides the table role, e.g. a user record that only carries tool output. */
  role?: Role;
}

export interface BodyContext {
  diff: DiffFn;
}

/**
 * How one platform's raw records become messages. Registered per source
 * when the viewer starts; normalization never inspects data to pick one.
 */
export interface RecordProfile {
  roles: RoleTable;
  /** Structural role convention, consulted when the table has no answer. */
  inferRole?: (record: JsonObject) => Role | null;
  /** Turn a non-object record into an object, or null to reject it. */
  coerce?: (data: unknown) => JsonObject | null;
  /** Content and tool calls; null when the record has nothing to show. */
  body(record: JsonObject, role: Role, ctx: BodyContext): RecordBody | null;
}

/** Role the profile's table assigns to a record, if any. */
export function tableRole(profile: RecordProfile, record: JsonObject): Role | null {
  const value = getPath(record, profile.roles.field);
  if (typeof value !== "string") return null;
  return Object.hasOwn(profile.roles.values, value) ? profile.roles.values[value] : null;
}
