import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

/**
 * Runs `fn` with a fresh directory under the OS temp dir and removes the directory
 * (recursively) once `fn` settles, whether it resolved or threw.
 */
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), `${prefix}-`));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export function sanitizeFilename(name: string): string {
  const base = path.basename(name.replace(/\\/g, "/"));
  const cleaned = base.replace(/[^A-Za-z0-9._-]/g, "_");
  if (/^\.*$/.test(cleaned)) return "upload";
  // ".csv" keeps its extension as "upload.csv"
  return cleaned.startsWith(".") ? `upload${cleaned.replace(/^\.+/, ".")}` : cleaned;
}
