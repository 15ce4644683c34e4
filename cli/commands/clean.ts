/**
 * clean command implementation.
 *
 * @module
 */

import type { Operation } from "effection";
import { clearWorkspaceCache, getCacheDir } from "../lib/workspace.js";

/**
 * Remove cached environments.
 */
export function* cleanCommand(_args: string[]): Operation<number> {
  const removed = yield* clearWorkspaceCache();
  console.log(removed ? `Cleared workspace cache at ${getCacheDir()}` : "No cache to clear");
  return 0;
}
