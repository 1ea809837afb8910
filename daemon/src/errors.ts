import type { Source } from "./sessions/types.js";

/** Base class for conditions the core reports to callers by code. */
export class ViewerError extends Error {
  code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "ViewerError";
  }
}

/** Root path missing or unreadable. Multi-source requests skip the source. */
export class SourceUnavailableError extends ViewerError {
  source: Source;
  rootPath: string;

  constructor(source: Source, rootPath: string, reason = "root directory not found") {
    super("SOURCE_UNAVAILABLE", `${source} logs unavailable at ${rootPath}: ${reason}`);
    this.name = "SourceUnavailableError";
    this.source = source;
    this.rootPath = rootPath;
  }
}

export class ScanTimeoutError extends ViewerError {
  source: Source;
  timeoutMs: number;

  constructor(source: Source, timeoutMs: number) {
    super("SCAN_TIMEOUT", `${source} scan exceeded ${timeoutMs}ms`);
    this.name = "ScanTimeoutError";
    this.source = source;
    this.timeoutMs = timeoutMs;
  }
}

/** A cache compute function threw. Every caller waiting on the key receives it. */
export class CacheComputeError extends ViewerError {
  key: string;

  constructor(key: string, cause: unknown) {
    super("CACHE_COMPUTE_FAILED", `Failed to compute cache entry ${key}: ${describe(cause)}`, {
      cause,
    });
    this.name = "CacheComputeError";
    this.key = key;
  }
}

export class NotFoundError extends ViewerError {
  constructor(what: string) {
    super("NOT_FOUND", `${what} not found`);
    this.name = "NotFoundError";
  }
}

export class InvalidRequestError extends ViewerError {
  constructor(message: string) {
    super("INVALID_REQUEST", message);
    this.name = "InvalidRequestError";
  }
}

export function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
