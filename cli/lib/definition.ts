/**
 * Building and validating experiment specs.
 *
 * @module
 */

import { resolve } from "node:path";
import { ConfigurationError } from "./errors.js";
import { coverageFromConfig } from "./coverage.js";
import { interpreterFromConfig } from "./interpreters.js";
import { DEFAULT_ORDER } from "./matrix.js";
import { DIMENSIONS, type Dimension, type ExperimentConfig } from "./schema.js";
import { projectFromConfig } from "../projects/mod.js";
import type {
  CoverageToolSpec,
  EnvironmentIsolation,
  ExperimentSpec,
  InterpreterSpec,
  Project,
  RatioDefinition,
  ReportLayout,
} from "./types.js";

/**
 * Input to {@link defineExperiment}. Fields with defaults may be omitted.
 */
export interface ExperimentInput {
  name?: string;
  interpreters: InterpreterSpec[];
  coverageTools: CoverageToolSpec[];
  projects: Project[];
  /** Repetitions per cell (default: 1) */
  numRuns?: number;
  rows: Dimension[];
  column: Dimension;
  ratios?: RatioDefinition[];
  order?: Dimension[];
  environments?: EnvironmentIsolation;
  concurrency?: number;
  timeoutSeconds?: number;
  wipe?: boolean;
}

function slugsOf(spec: Pick<ExperimentSpec, "projects" | "interpreters" | "coverageTools">): Record<Dimension, string[]> {
  return {
    project: spec.projects.map((p) => p.slug),
    interpreter: spec.interpreters.map((i) => i.slug),
    coverage: spec.coverageTools.map((c) => c.slug),
  };
}

function duplicates(values: string[]): string[] {
  return values.filter((v, i) => values.indexOf(v) !== i);
}

/**
 * Check an experiment for structural problems. Returns one message per
 * problem; an empty list means the experiment is valid.
 */
export function validateExperiment(input: ExperimentInput): string[] {
  const issues: string[] = [];
  const slugs = slugsOf(input);

  for (const dimension of DIMENSIONS) {
    if (slugs[dimension].length === 0) {
      issues.push(`no ${dimension} values configured`);
    }
    for (const dup of new Set(duplicates(slugs[dimension]))) {
      issues.push(`duplicate ${dimension} "${dup}"`);
    }
  }

  const numRuns = input.numRuns ?? 1;
  if (!Number.isInteger(numRuns) || numRuns < 1) {
    issues.push(`numRuns must be a positive integer, got ${numRuns}`);
  }

  const concurrency = input.concurrency ?? 1;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    issues.push(`concurrency must be a positive integer, got ${concurrency}`);
  }

  if (input.timeoutSeconds !== undefined && !(input.timeoutSeconds > 0)) {
    issues.push(`timeoutSeconds must be positive, got ${input.timeoutSeconds}`);
  }

  if (input.rows.length === 0) {
    issues.push("at least one row dimension is required");
  }
  for (const dup of new Set(duplicates(input.rows))) {
    issues.push(`row dimension "${dup}" is repeated`);
  }
  if (input.rows.includes(input.column)) {
    issues.push(`"${input.column}" cannot be both a row and the column dimension`);
  }

  // A dimension left out of the pivot would fold several cells into one
  // table cell, which is only unambiguous when it has a single value.
  for (const dimension of DIMENSIONS) {
    const pivoted = dimension === input.column || input.rows.includes(dimension);
    if (!pivoted && slugs[dimension].length > 1) {
      issues.push(
        `${dimension} has ${slugs[dimension].length} values but is neither a row nor the column`,
      );
    }
  }

  const columnValues = slugs[input.column];
  const labels = new Set<string>();
  for (const ratio of input.ratios ?? []) {
    if (labels.has(ratio.label)) {
      issues.push(`ratio label "${ratio.label}" is repeated`);
    }
    labels.add(ratio.label);
    for (const side of ["numerator", "denominator"] as const) {
      if (!columnValues.includes(ratio[side])) {
        issues.push(
          `ratio "${ratio.label}" ${side} "${ratio[side]}" is not a ${input.column} value (${columnValues.join(", ")})`,
        );
      }
    }
    if (columnValues.includes(ratio.label)) {
      issues.push(`ratio label "${ratio.label}" collides with a ${input.column} value`);
    }
  }

  if (input.order) {
    const order = input.order;
    if (order.length !== DIMENSIONS.length || DIMENSIONS.some((d) => !order.includes(d))) {
      issues.push(`order must list each of ${DIMENSIONS.join(", ")} once`);
    }
  }

  return issues;
}

/**
 * Validate an experiment and freeze it into an ExperimentSpec.
 *
 * @throws ConfigurationError listing every problem found
 */
export function defineExperiment(input: ExperimentInput): ExperimentSpec {
  const issues = validateExperiment(input);
  if (issues.length > 0) {
    throw new ConfigurationError("Invalid experiment", issues);
  }

  return Object.freeze({
    name: input.name ?? "experiment",
    interpreters: Object.freeze([...input.interpreters]),
    coverageTools: Object.freeze([...input.coverageTools]),
    projects: Object.freeze([...input.projects]),
    numRuns: input.numRuns ?? 1,
    rows: Object.freeze([...input.rows]),
    column: input.column,
    ratios: Object.freeze((input.ratios ?? []).map((r) => Object.freeze({ ...r }))),
    order: Object.freeze([...(input.order ?? DEFAULT_ORDER)]),
    environments: input.environments ?? "shared",
    concurrency: input.concurrency ?? 1,
    timeoutSeconds: input.timeoutSeconds,
    wipe: input.wipe ?? false,
  });
}

/**
 * Build an ExperimentSpec from a validated experiment file.
 *
 * @param baseDir - Directory relative paths in the file are resolved against
 */
export function experimentFromConfig(
  config: ExperimentConfig,
  baseDir: string,
): ExperimentSpec {
  return defineExperiment({
    name: config.name,
    interpreters: config.interpreters.map(interpreterFromConfig),
    coverageTools: config.coverageTools.map((tool) =>
      coverageFromConfig(
        tool.kind === "source"
          ? { ...tool, directory: resolve(baseDir, tool.directory) }
          : tool,
      ),
    ),
    projects: config.projects.map((p) => projectFromConfig(p, baseDir)),
    numRuns: config.numRuns,
    rows: config.rows,
    column: config.column,
    ratios: config.ratios,
    order: config.order,
    environments: config.environments,
    concurrency: config.concurrency,
    timeoutSeconds: config.timeoutSeconds,
    wipe: config.wipe,
  });
}

/**
 * The slugs and pivot settings a report needs.
 */
export function reportLayout(spec: ExperimentSpec): ReportLayout {
  return {
    dimensions: slugsOf(spec),
    rows: [...spec.rows],
    column: spec.column,
    ratios: spec.ratios.map((r) => ({ ...r })),
  };
}
