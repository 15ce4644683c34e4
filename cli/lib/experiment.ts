/**
 * Experiment orchestration.
 *
 * Expands the matrix, provisions every environment the matrix needs,
 * runs each cell `numRuns` times, and reduces the runs to a report.
 *
 * Provisioning of distinct environments may run concurrently. Runs are
 * sequential: parallel test suites would contend for CPU and add noise
 * to the measurements.
 *
 * @module
 */

import type { Operation } from "effection";
import { reportLayout } from "./definition.js";
import {
  createProvisioner,
  environmentKey,
  type EnvironmentRegistry,
} from "./environments.js";
import { measuresCoverage } from "./coverage.js";
import type { Logger, ProjectLogs } from "./logging.js";
import { expandMatrix, planRuns } from "./matrix.js";
import { mapConcurrent } from "./pool.js";
import type { CommandRunner } from "./process.js";
import { buildReport, type Report } from "./report.js";
import { attempt, failuresOf, type Failure, type Result } from "./result.js";
import { runCell } from "./runner.js";
import { aggregateAll, summarizeRuns } from "./stats.js";
import type {
  Cell,
  CellOutcome,
  Environment,
  ExperimentSpec,
  RunResult,
} from "./types.js";

/**
 * Collaborators threaded through an experiment run.
 */
export interface ExperimentContext {
  /** Directory environments are created in */
  workDir: string;
  registry: EnvironmentRegistry;
  commands: CommandRunner;
  logs: ProjectLogs;
  /** Experiment-level progress */
  logger: Logger;
  /** Millisecond clock (default: performance.now) */
  clock?: () => number;
}

export interface ExperimentOutcome {
  spec: ExperimentSpec;
  results: RunResult[];
  outcomes: Map<string, CellOutcome>;
  report: Report;
  /** Environments that could not be provisioned */
  provisioningFailures: Failure[];
  passed: number;
  attempted: number;
  /** 1 if any cell had no successful run */
  exitCode: number;
}

/**
 * Variant of the environment a cell runs in. With separate baselines,
 * coverage-free runs get an environment that never has coverage
 * installed.
 */
function variantFor(spec: ExperimentSpec, cell: Cell): string | undefined {
  return spec.environments === "separate-baseline" && !measuresCoverage(cell.coverage)
    ? "baseline"
    : undefined;
}

function keyFor(spec: ExperimentSpec, cell: Cell): string {
  return environmentKey(cell.project.slug, cell.interpreter.slug, variantFor(spec, cell));
}

/**
 * Run an experiment end to end.
 *
 * Only a ConfigurationError (from an empty matrix) escapes; every other
 * failure is recorded against the smallest scope it affects.
 */
export function* runExperiment(
  spec: ExperimentSpec,
  context: ExperimentContext,
): Operation<ExperimentOutcome> {
  const { logger } = context;
  const cells = expandMatrix(spec);
  const planned = planRuns(spec, cells);

  const provisioner = createProvisioner({
    workDir: context.workDir,
    registry: context.registry,
    commands: context.commands,
    logs: context.logs,
    wipe: spec.wipe,
    clock: context.clock,
  });

  // One provisioning task per distinct environment, in matrix order.
  const requests = new Map<string, Cell>();
  for (const cell of cells) {
    const key = keyFor(spec, cell);
    if (!requests.has(key)) requests.set(key, cell);
  }

  logger.info(
    { cells: cells.length, runs: planned.length, environments: requests.size },
    `experiment ${spec.name}`,
  );

  const provisioned = yield* mapConcurrent(
    [...requests],
    spec.concurrency,
    function* ([key, cell]) {
      logger.info({ environment: key }, "provisioning");
      const result = yield* attempt(
        key,
        provisioner.ensure(cell.project, cell.interpreter, variantFor(spec, cell)),
      );
      if (result.ok) {
        logger.info({ environment: key }, "environment ready");
      } else {
        logger.error({ environment: key, err: result.error }, "provisioning failed");
      }
      return [key, result] as const;
    },
  );
  const environments = new Map<string, Result<Environment>>(provisioned);

  const results: RunResult[] = [];
  for (const run of planned) {
    const { cell } = run;
    const key = keyFor(spec, cell);
    logger.info(
      { cell: cell.id, run: run.run, environment: key },
      `running ${run.ordinal} of ${run.total}`,
    );

    const environment = environments.get(key);
    if (!environment || !environment.ok) {
      const error = environment && !environment.ok
        ? environment.error
        : new Error(`No environment for ${key}`);
      results.push({ status: "failed", cell: cell.key, run: run.run, error });
      continue;
    }

    const env = environment.value;
    const result = yield* env.lock.withLock(function* (): Operation<RunResult> {
      const installed = yield* attempt(
        cell.id,
        provisioner.installCoverage(env, cell.coverage),
      );
      if (!installed.ok) {
        return { status: "failed", cell: cell.key, run: run.run, error: installed.error };
      }
      return yield* runCell(run, env, {
        log: context.logs.forProject(cell.project.slug),
        clock: context.clock,
        timeoutSeconds: spec.timeoutSeconds,
      });
    });

    if (result.status === "passed") {
      logger.info({ cell: cell.id, run: run.run, duration: result.duration }, "run passed");
    } else {
      logger.warn({ cell: cell.id, run: run.run, err: result.error }, "run failed");
    }
    results.push(result);
  }

  const outcomes = aggregateAll(results);
  const report = buildReport(reportLayout(spec), outcomes);
  const { passed, attempted } = summarizeRuns(results);
  const failedCells = [...outcomes.values()].filter((o) => !o.ok).length;

  context.logs.flush();
  logger.info({ passed, attempted, failedCells }, `${passed}/${attempted} runs succeeded`);

  return {
    spec,
    results,
    outcomes,
    report,
    provisioningFailures: failuresOf(environments.values()),
    passed,
    attempted,
    exitCode: failedCells > 0 ? 1 : 0,
  };
}
