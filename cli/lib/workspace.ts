/**
 * Work directory management.
 *
 * Environments are created under a work directory. Three modes:
 * - Explicit (--work-dir): the given directory, kept after the run
 * - Cached (--cache-workspace): ~/.cache/covbench/<hash>, kept and
 *   reused, so environments provisioned before are not reinstalled
 * - Temporary (default): removed when the scope exits
 *
 * @module
 */

import { createHash } from "node:crypto";
import { mkdir, rm } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { call, type Operation } from "effection";
import { useTempDir } from "./temp-dir.js";

export interface WorkDirConfig {
  /** Explicit directory */
  workDir?: string;
  /** Use the persistent cache directory */
  useCache?: boolean;
  /** Distinguishes cache directories, e.g. the experiment file contents */
  cacheKey: string;
}

/**
 * Compute a short cache key from arbitrary text.
 */
export function computeCacheKey(data: string): string {
  return createHash("sha256").update(data).digest("hex").slice(0, 16);
}

/**
 * Get the cache directory path.
 */
export function getCacheDir(): string {
  const base = process.env.XDG_CACHE_HOME || join(homedir(), ".cache");
  return join(base, "covbench");
}

/**
 * Resolve the work directory for an experiment, creating it if needed.
 * A temporary directory lives until the calling scope exits.
 */
export function* useWorkDir(config: WorkDirConfig): Operation<string> {
  if (config.workDir) {
    const dir = resolve(config.workDir);
    yield* call(() => mkdir(dir, { recursive: true }));
    return dir;
  }

  if (config.useCache) {
    const dir = join(getCacheDir(), computeCacheKey(config.cacheKey));
    yield* call(() => mkdir(dir, { recursive: true }));
    return dir;
  }

  return yield* useTempDir();
}

/**
 * Remove the cache directory. Returns false if there was nothing to remove.
 */
export function* clearWorkspaceCache(): Operation<boolean> {
  const cacheDir = getCacheDir();
  try {
    yield* call(() => rm(cacheDir, { recursive: true }));
    return true;
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}
