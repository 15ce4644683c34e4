/**
 * Execution of a single run of a cell.
 *
 * @module
 */

import { race, sleep, type Operation } from "effection";
import { errorOutput, RunTimeoutError } from "./errors.js";
import type { Logger } from "./logging.js";
import { toError } from "./result.js";
import type { Environment, PlannedRun, RunResult } from "./types.js";

export interface RunOptions {
  /** Project log */
  log: Logger;
  /** Millisecond clock (default: performance.now) */
  clock?: () => number;
  /** Fail the run after this many seconds */
  timeoutSeconds?: number;
}

function* timeout(cell: string, seconds: number): Operation<never> {
  yield* sleep(seconds * 1000);
  throw new RunTimeoutError(cell, seconds);
}

/**
 * Run `op`, halting it and throwing RunTimeoutError if it takes longer
 * than `seconds`.
 */
export function* withTimeout<T>(
  op: Operation<T>,
  cell: string,
  seconds?: number,
): Operation<T> {
  if (seconds === undefined) {
    return yield* op;
  }
  return yield* race([op, timeout(cell, seconds)]);
}

/**
 * Execute one run of a cell inside its environment.
 *
 * Wall-clock time is measured around the test command only; the
 * coverage summary is taken after the clock stops. Adapter failures and timeouts are returned as failed results rather
 * than thrown, so one bad run leaves the cell's other runs intact.
 * The caller holds the environment's lock.
 */
export function* runCell(
  planned: PlannedRun,
  env: Environment,
  opts: RunOptions,
): Operation<RunResult> {
  const { cell, run } = planned;
  const clock = opts.clock ?? (() => performance.now());
  const fields = {
    cell: cell.id,
    run,
    progress: `${planned.ordinal} of ${planned.total}`,
    environment: env.key,
  };

  opts.log.info(fields, "running tests");
  const start = clock();
  try {
    yield* withTimeout(
      cell.project.runTests(env, cell.coverage),
      cell.id,
      opts.timeoutSeconds,
    );
    const duration = (clock() - start) / 1000;
    const coverage = yield* cell.project.summarize(env, cell.coverage);
    opts.log.info({ ...fields, duration, coverage }, "tests finished");
    return { status: "passed", cell: cell.key, run, duration, coverage };
  } catch (caught: unknown) {
    const error = toError(caught);
    opts.log.error(
      { ...fields, err: error, output: errorOutput(error) },
      "tests failed",
    );
    return { status: "failed", cell: cell.key, run, error };
  }
}
