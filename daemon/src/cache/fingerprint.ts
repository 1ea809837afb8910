import { stat } from "node:fs/promises";

/**
 * mtime+size signature of a set of files. A file that cannot be stat'ed
 * contributes "missing", so deletion also changes the signature.
 */
export async function fingerprint(files: readonly string[]): Promise<string> {
  const parts = await Promise.all(
    files.map(async (file) => {
      try {
        const s = await stat(file);
        return `${file}:${s.mtimeMs}:${s.size}`;
      } catch {
        return `${file}:missing`;
      }
    }),
  );
  return parts.join("|");
}
