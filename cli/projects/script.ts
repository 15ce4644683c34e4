/**
 * Ad-hoc projects: a single Python script run as-is.
 *
 * @module
 */

import { basename } from "node:path";
import type { Project } from "../lib/types.js";
import { reportCoverage, runPython } from "./python.js";

export interface ScriptProjectOptions {
  /** Absolute path to the script */
  path: string;
  /** Defaults to the script's file name without extension */
  slug?: string;
  args?: string[];
}

export function scriptProject(opts: ScriptProjectOptions): Project {
  const slug = opts.slug ?? basename(opts.path).replace(/\.py$/, "");
  const args = opts.args ?? [];

  return {
    slug,
    location: opts.path,

    *prepare() {
      // Scripts use only the standard library.
    },

    *runTests(env, tool) {
      yield* runPython(env, tool, [opts.path, ...args], {
        project: slug,
        cwd: env.dir,
      });
    },

    *summarize(env, tool) {
      return yield* reportCoverage(env, tool, { project: slug, cwd: env.dir });
    },
  };
}
