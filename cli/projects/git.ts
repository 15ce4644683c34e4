/**
 * Projects cloned from a git repository and tested with pytest.
 *
 * @module
 */

import { rm } from "node:fs/promises";
import { join } from "node:path";
import { call } from "effection";
import { errorOutput, PrepareError } from "../lib/errors.js";
import { toError } from "../lib/result.js";
import type { Environment, Project } from "../lib/types.js";
import { reportCoverage, runPython } from "./python.js";

export interface GitProjectOptions {
  slug: string;
  /** URL or path to clone */
  repository: string;
  /** Branch or tag to check out (default: the remote's default branch) */
  ref?: string;
  /** `pip install` arguments run in the checkout (default: `-e .`) */
  install?: string[];
  /** Arguments to pytest, e.g. `["-k", "ck"]` */
  testArgs?: string[];
  /** Environment variables for test runs */
  env?: Record<string, string>;
}

/**
 * Directory of the checkout inside an environment.
 */
export function checkoutDir(env: Environment): string {
  return join(env.dir, "src");
}

export function gitProject(opts: GitProjectOptions): Project {
  const install = opts.install ?? ["-e", "."];
  const testArgs = opts.testArgs ?? [];

  return {
    slug: opts.slug,
    location: opts.repository,

    *prepare(env) {
      const src = checkoutDir(env);
      const branch = opts.ref ? ["--branch", opts.ref] : [];
      try {
        yield* call(() => rm(src, { recursive: true, force: true }));
        yield* env.shell.expect("git", ["clone", "--depth=1", ...branch, opts.repository, src]);
        yield* env.shell.expect(env.python, ["-m", "pip", "install", "-q", "--upgrade", "pip"]);
        yield* env.shell.expect(env.python, ["-m", "pip", "install", "-q", ...install], { cwd: src });
        yield* env.shell.expect(env.python, ["-m", "pip", "install", "-q", "pytest"]);
      } catch (caught: unknown) {
        const error = toError(caught);
        throw new PrepareError(opts.slug, error.message, errorOutput(error));
      }
    },

    *runTests(env, tool) {
      yield* runPython(env, tool, ["-m", "pytest", ...testArgs], {
        project: opts.slug,
        cwd: checkoutDir(env),
        env: opts.env,
      });
    },

    *summarize(env, tool) {
      return yield* reportCoverage(env, tool, {
        project: opts.slug,
        cwd: checkoutDir(env),
        env: opts.env,
      });
    },
  };
}
