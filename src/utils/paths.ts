import { realpath, stat } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";

/**
 * Resolve path with tilde expansion
 */
export function resolvePath(path: string): string {
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (path === "~") {
    return homedir();
  }
  return resolve(path);
}

/**
 * Resolve a path to its canonical absolute form if it names an existing file.
 * Returns null when nothing (or a directory) is there.
 */
export async function canonicalFilePath(path: string): Promise<string | null> {
  try {
    const canonical = await realpath(resolvePath(path));
    const info = await stat(canonical);
    return info.isFile() ? canonical : null;
  } catch (error) {
    if (isMissingPathError(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Check whether a file exists (directories do not count)
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.isFile();
  } catch (error) {
    if (isMissingPathError(error)) {
      return false;
    }
    throw error;
  }
}

function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}
