/**
 * Temporary directory resource.
 *
 * @module
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { call, resource, type Operation } from "effection";

/**
 * Create a temporary directory as a resource.
 * The directory is removed when the scope exits.
 *
 * @param prefix - Prefix for the temp directory name
 * @returns The path to the created temp directory
 */
export function useTempDir(prefix = "covbench-"): Operation<string> {
  return resource(function* (provide) {
    const dir = yield* call(() => mkdtemp(join(tmpdir(), prefix)));
    try {
      yield* provide(dir);
    } finally {
      yield* call(() => rm(dir, { recursive: true, force: true }));
    }
  });
}

/**
 * Convenience wrapper for callback-style usage.
 *
 * @param fn - Function to execute with the temp directory path
 */
export function* withTempDir<T>(
  fn: (dir: string) => Operation<T>,
): Operation<T> {
  const dir = yield* useTempDir();
  return yield* fn(dir);
}
