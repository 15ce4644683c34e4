/**
 * Project adapters and their registry.
 *
 * @module
 */

import { isAbsolute, resolve } from "node:path";
import type { ProjectConfig } from "../lib/schema.js";
import type { Project } from "../lib/types.js";
import { gitProject } from "./git.js";
import { scriptProject } from "./script.js";

export { gitProject, type GitProjectOptions } from "./git.js";
export { scriptProject, type ScriptProjectOptions } from "./script.js";
export { parseCoverageTotal } from "./summary.js";

/**
 * Local repository paths are resolved against `baseDir`; URLs are kept.
 */
function resolveRepository(repository: string, baseDir: string): string {
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(repository) || /^[\w.-]+@[\w.-]+:/.test(repository)) {
    return repository;
  }
  return isAbsolute(repository) ? repository : resolve(baseDir, repository);
}

/**
 * Build a project from its experiment-file form.
 *
 * @param baseDir - Directory relative paths are resolved against
 */
export function projectFromConfig(config: ProjectConfig, baseDir: string): Project {
  switch (config.kind) {
    case "git":
      return gitProject({
        slug: config.slug,
        repository: resolveRepository(config.repository, baseDir),
        ref: config.ref,
        install: config.install,
        testArgs: config.testArgs,
        env: config.env,
      });
    case "script":
      return scriptProject({
        slug: config.slug,
        path: resolve(baseDir, config.path),
        args: config.args,
      });
    default: {
      const _exhaustive: never = config;
      throw new Error(`Unknown project kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
