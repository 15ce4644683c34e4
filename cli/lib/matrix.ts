/**
 * Experiment matrix expansion.
 *
 * @module
 */

import { ConfigurationError } from "./errors.js";
import type { Dimension } from "./schema.js";
import type {
  Cell,
  CellKey,
  CoverageToolSpec,
  ExperimentSpec,
  InterpreterSpec,
  PlannedRun,
  Project,
} from "./types.js";

/**
 * Default enumeration order, outermost first.
 */
export const DEFAULT_ORDER: readonly Dimension[] = [
  "project",
  "interpreter",
  "coverage",
];

/**
 * String identity of a cell: "project/interpreter/coverage".
 */
export function cellId(key: CellKey): string {
  return `${key.project}/${key.interpreter}/${key.coverage}`;
}

type DimensionValue = Project | InterpreterSpec | CoverageToolSpec;

function valuesOf(spec: ExperimentSpec, dimension: Dimension): readonly DimensionValue[] {
  switch (dimension) {
    case "project":
      return spec.projects;
    case "interpreter":
      return spec.interpreters;
    case "coverage":
      return spec.coverageTools;
    default: {
      const _exhaustive: never = dimension;
      throw new Error(`Unknown dimension: ${_exhaustive}`);
    }
  }
}

/**
 * Expand the Cartesian product of projects, interpreters and coverage
 * tools. Every combination appears exactly once, in `spec.order`
 * (outermost first), so the same spec always yields the same sequence.
 *
 * @throws ConfigurationError if any dimension is empty
 */
export function expandMatrix(spec: ExperimentSpec): Cell[] {
  const empty = DEFAULT_ORDER.filter((d) => valuesOf(spec, d).length === 0);
  if (empty.length > 0) {
    throw new ConfigurationError(
      "Experiment has nothing to benchmark",
      empty.map((d) => `no ${d} values configured`),
    );
  }

  let partials: Array<Partial<Record<Dimension, DimensionValue>>> = [{}];
  for (const dimension of spec.order) {
    const next: typeof partials = [];
    for (const partial of partials) {
      for (const value of valuesOf(spec, dimension)) {
        next.push({ ...partial, [dimension]: value });
      }
    }
    partials = next;
  }

  return partials.map((partial) => {
    const project = spec.projects.find((p) => p === partial.project);
    const interpreter = spec.interpreters.find((i) => i === partial.interpreter);
    const coverage = spec.coverageTools.find((c) => c === partial.coverage);
    if (!project || !interpreter || !coverage) {
      throw new ConfigurationError(
        `Matrix order ${spec.order.join(", ")} does not cover every dimension`,
      );
    }
    return makeCell(project, interpreter, coverage);
  });
}

export function makeCell(
  project: Project,
  interpreter: InterpreterSpec,
  coverage: CoverageToolSpec,
): Cell {
  const key: CellKey = {
    project: project.slug,
    interpreter: interpreter.slug,
    coverage: coverage.slug,
  };
  return { key, id: cellId(key), project, interpreter, coverage };
}

/**
 * Repeat each cell `numRuns` times. Repetitions are interleaved round
 * by round: every cell's first run, then every cell's second run, so
 * slow drift on the machine is spread over all cells.
 */
export function planRuns(spec: ExperimentSpec, cells: readonly Cell[]): PlannedRun[] {
  const total = cells.length * spec.numRuns;
  const runs: PlannedRun[] = [];
  for (let run = 1; run <= spec.numRuns; run++) {
    for (const cell of cells) {
      runs.push({ cell, run, ordinal: runs.length + 1, total });
    }
  }
  return runs;
}
