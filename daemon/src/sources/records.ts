import { createReadStream } from "node:fs";
import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline";
import type { FastifyBaseLogger } from "fastify";

/** One undecoded record and its 0-based position in the backing log. */
export interface RawRecord {
  lineIndex: number;
  data: unknown;
}

/**
 * Records of a JSONL file, one per line. Each iteration reopens the file,
 * so the sequence can be restarted at any time.
 * Blank lines consume an index; lines that fail to parse are skipped.
 */
export function jsonlRecords(path: string, log: FastifyBaseLogger): AsyncIterable<RawRecord> {
  return {
    async *[Symbol.asyncIterator](): AsyncGenerator<RawRecord> {
      const rl = createInterface({
        input: createReadStream(path, { encoding: "utf-8" }),
        crlfDelay: Number.POSITIVE_INFINITY,
      });

      let lineIndex = -1;
      let malformed = 0;
      try {
        for await (const line of rl) {
          lineIndex++;
          if (line.trim().length === 0) continue;

          let data: unknown;
          try {
            data = JSON.parse(line);
          } catch {
            malformed++;
            log.debug({ path, lineIndex }, "Skipping malformed record");
            continue;
          }
          yield { lineIndex, data };
        }
      } finally {
        rl.close();
      }

      if (malformed > 0) {
        log.debug({ path, malformed }, "Malformed records skipped");
      }
    },
  };
}

/**
 * Parse a whole JSON document. A file cut off mid-write does not parse;
 * that is reported as null rather than thrown.
 */
export async function readJsonFile(path: string, log: FastifyBaseLogger): Promise<unknown> {
  const raw = await readFile(path, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (err) {
    log.debug({ err, path }, "Skipping unparsable JSON document");
    return null;
  }
}

/** Restartable sequence over array elements produced by load(). */
export function arrayRecords(load: () => Promise<readonly unknown[]>): AsyncIterable<RawRecord> {
  return {
    async *[Symbol.asyncIterator](): AsyncGenerator<RawRecord> {
      const items = await load();
      for (let i = 0; i < items.length; i++) {
        yield { lineIndex: i, data: items[i] };
      }
    },
  };
}
