/**
 * Coverage-tool specs.
 *
 * @module
 */

import { join } from "node:path";
import type { CoverageToolConfig } from "./schema.js";
import type { CoverageToolSpec, Environment } from "./types.js";

export interface CoverageOptions {
  /** Extra environment variables, e.g. `{ COVERAGE_CORE: "sysmon" }` */
  env?: Record<string, string>;
  /** `[run]` settings, e.g. `{ dynamic_context: "test_function" }` */
  settings?: Record<string, string>;
}

/**
 * The baseline: run tests without measuring coverage.
 */
export function noCoverage(slug = "nocov"): CoverageToolSpec {
  return Object.freeze({
    slug,
    kind: "none",
    install: [],
    env: {},
    settings: {},
  });
}

/**
 * A released coverage package, installed by pip specifier
 * (e.g. `coverage==7.5.3`).
 */
export function coveragePackage(
  slug: string,
  specifier: string,
  opts: CoverageOptions = {},
): CoverageToolSpec {
  return Object.freeze({
    slug,
    kind: "package",
    install: [specifier],
    env: { ...opts.env },
    settings: { ...opts.settings },
  });
}

/**
 * Coverage installed from a source checkout.
 */
export function coverageSource(
  slug: string,
  directory: string,
  opts: CoverageOptions = {},
): CoverageToolSpec {
  return Object.freeze({
    slug,
    kind: "package",
    install: [directory],
    env: { ...opts.env },
    settings: { ...opts.settings },
  });
}

/**
 * True when the tool measures coverage.
 */
export function measuresCoverage(tool: CoverageToolSpec): boolean {
  return tool.kind !== "none";
}

/**
 * Identity of what a tool installs, to skip redundant installs.
 */
export function installKey(tool: CoverageToolSpec): string {
  return tool.install.join(" ");
}

/**
 * Path of the rc file generated for a coverage tool.
 */
export function rcFilePath(env: Environment, tool: CoverageToolSpec): string {
  return join(env.dir, `coveragerc-${tool.slug}`);
}

/**
 * Contents of the rc file used for a measured run.
 */
export function renderRcFile(tool: CoverageToolSpec): string {
  const lines = ["[run]"];
  for (const [key, value] of Object.entries(tool.settings)) {
    lines.push(`${key} = ${value}`);
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Build a coverage-tool spec from its experiment-file form.
 */
export function coverageFromConfig(config: CoverageToolConfig): CoverageToolSpec {
  switch (config.kind) {
    case "none":
      return noCoverage(config.slug);
    case "package":
      return coveragePackage(config.slug, config.specifier, config);
    case "source":
      return coverageSource(config.slug, config.directory, config);
    default: {
      const _exhaustive: never = config;
      throw new Error(`Unknown coverage tool: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
