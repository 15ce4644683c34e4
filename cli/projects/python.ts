/**
 * Running Python code with or without coverage measurement.
 *
 * Shared by the project adapters: a measured run is
 * `coverage run --rcfile=...` and its summary a later
 * `coverage report`; a baseline run is the bare command.
 *
 * @module
 */

import type { Operation } from "effection";
import { measuresCoverage, rcFilePath } from "../lib/coverage.js";
import { TestRunError } from "../lib/errors.js";
import type {
  CoverageSummary,
  CoverageToolSpec,
  Environment,
} from "../lib/types.js";
import { parseCoverageTotal } from "./summary.js";

export interface PythonRunOptions {
  /** Project whose tests are running, for errors */
  project: string;
  /** Directory to run in */
  cwd: string;
  /** Project-specific environment variables */
  env?: Record<string, string>;
}

/**
 * Run `python <args>` in the environment, under coverage unless `tool`
 * is the baseline. The tool's rc file must already be written.
 *
 * @throws TestRunError if the command exits non-zero
 */
export function* runPython(
  env: Environment,
  tool: CoverageToolSpec,
  args: readonly string[],
  opts: PythonRunOptions,
): Operation<void> {
  const command = measuresCoverage(tool)
    ? ["-m", "coverage", "run", `--rcfile=${rcFilePath(env, tool)}`, ...args]
    : args;
  const result = yield* env.shell.run(env.python, command, {
    cwd: opts.cwd,
    env: { ...opts.env, ...tool.env },
  });
  if (result.code !== 0) {
    throw new TestRunError(opts.project, result.code, result.output);
  }
}

/**
 * Totals of the coverage data left by the last {@link runPython}.
 *
 * @throws TestRunError if `coverage report` exits non-zero
 */
export function* reportCoverage(
  env: Environment,
  tool: CoverageToolSpec,
  opts: PythonRunOptions,
): Operation<CoverageSummary | null> {
  if (!measuresCoverage(tool)) {
    return null;
  }
  const report = yield* env.shell.run(
    env.python,
    ["-m", "coverage", "report", `--rcfile=${rcFilePath(env, tool)}`],
    { cwd: opts.cwd, env: { ...opts.env, ...tool.env } },
  );
  if (report.code !== 0) {
    throw new TestRunError(opts.project, report.code, report.output);
  }
  return parseCoverageTotal(report.stdout);
}
