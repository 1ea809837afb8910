import { InvalidRequestError } from "../errors.js";
import { isSource, ROLES, type Role, type Source } from "../sessions/types.js";

export function parseSource(value: string): Source {
  if (!isSource(value)) {
    throw new InvalidRequestError(`Unknown source ${JSON.stringify(value)}`);
  }
  return value;
}

/** Comma-separated source list; undefined when the parameter is absent or empty. */
export function parseSources(value: string | undefined): Source[] | undefined {
  if (!value) return undefined;
  const names = value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return names.length > 0 ? names.map(parseSource) : undefined;
}

/** Integer query parameter; undefined when absent. */
export function parseInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidRequestError(`${name} must be an integer`);
  }
  return parsed;
}

export function parseRole(value: string | undefined): Role | undefined {
  if (!value) return undefined;
  const role = ROLES.find((r) => r === value);
  if (!role) {
    throw new InvalidRequestError(`role must be one of ${ROLES.join(", ")}`);
  }
  return role;
}
