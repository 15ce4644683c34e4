/**
 * Statistical aggregation of run results.
 * Pure functions with no Effection dependencies.
 *
 * All time values are in seconds.
 *
 * @module
 */

import { AggregationError } from "./errors.js";
import { cellId } from "./matrix.js";
import type {
  CellKey,
  CellOutcome,
  CellStatistic,
  RunResult,
} from "./types.js";

/**
 * Median of a sample: the middle value of the sorted sample, or the
 * mean of the two middle values for an even count.
 *
 * @throws Error if values is empty
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) {
    throw new Error("Cannot calculate median of empty array");
  }

  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1
    ? sorted[mid]
    : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Population standard deviation. Zero for a single value.
 *
 * @throws Error if values is empty
 */
export function stdev(values: readonly number[]): number {
  if (values.length === 0) {
    throw new Error("Cannot calculate standard deviation of empty array");
  }

  const avg = values.reduce((a, b) => a + b, 0) / values.length;
  const variance =
    values.reduce((acc, t) => acc + (t - avg) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Collapse the runs of one cell into a statistic. Failed runs count
 * toward `attempted` only.
 *
 * @throws AggregationError if no run passed
 */
export function aggregate(
  cell: CellKey,
  samples: readonly RunResult[],
): CellStatistic {
  const durations: number[] = [];
  let coverage: CellStatistic["coverage"] = null;

  for (const sample of samples) {
    if (sample.status === "passed") {
      durations.push(sample.duration);
      if (coverage === null && sample.coverage !== null) {
        coverage = sample.coverage;
      }
    }
  }

  if (durations.length === 0) {
    throw new AggregationError(cellId(cell), samples.length);
  }

  return {
    cell,
    median: median(durations),
    stdev: stdev(durations),
    samples: durations.length,
    attempted: samples.length,
    coverage,
  };
}

/**
 * Group run results by cell and aggregate each group. The first
 * passed run with coverage totals is chosen by run index, so the
 * outcome does not depend on the order of `results`.
 */
export function aggregateAll(
  results: readonly RunResult[],
): Map<string, CellOutcome> {
  const groups = new Map<string, { cell: CellKey; runs: RunResult[] }>();
  for (const result of results) {
    const id = cellId(result.cell);
    let group = groups.get(id);
    if (!group) {
      group = { cell: result.cell, runs: [] };
      groups.set(id, group);
    }
    group.runs.push(result);
  }

  const outcomes = new Map<string, CellOutcome>();
  for (const [id, { cell, runs }] of groups) {
    const ordered = [...runs].sort((a, b) => a.run - b.run);
    try {
      outcomes.set(id, { ok: true, statistic: aggregate(cell, ordered) });
    } catch (error: unknown) {
      if (!(error instanceof AggregationError)) throw error;
      outcomes.set(id, { ok: false, cell, attempted: runs.length, error });
    }
  }
  return outcomes;
}

/**
 * Counts of passed and attempted runs, for "N/M runs succeeded".
 */
export function summarizeRuns(results: readonly RunResult[]): {
  passed: number;
  attempted: number;
} {
  return {
    passed: results.filter((r) => r.status === "passed").length,
    attempted: results.length,
  };
}
