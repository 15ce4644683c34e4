/**
 * Core type definitions for experiments.
 *
 * @module
 */

import type { Operation } from "effection";
import type { Dimension, RatioConfig } from "./schema.js";
import type { Lock } from "./lock.js";
import type { CommandResult, ExecOptions } from "./process.js";

/**
 * An interpreter to create environments with.
 */
export interface InterpreterSpec {
  /** Identifier used in cell keys and report headers (e.g., "3.12") */
  readonly slug: string;
  /** Executable used to create virtual environments */
  readonly executable: string;
  /** Human-readable description for logs */
  readonly description: string;
}

/**
 * A coverage-tool configuration under test.
 *
 * `kind: "none"` is the baseline pseudo-spec: tests run without
 * coverage measurement and no coverage summary is expected.
 */
export interface CoverageToolSpec {
  readonly slug: string;
  readonly kind: "none" | "package";
  /** Arguments to `pip install` (empty for the baseline) */
  readonly install: readonly string[];
  /** Extra environment variables for the test process */
  readonly env: Readonly<Record<string, string>>;
  /** `[run]` settings written to the generated rc file */
  readonly settings: Readonly<Record<string, string>>;
}

/**
 * Coverage totals parsed from a report.
 */
export interface CoverageSummary {
  statements: number;
  missing: number;
  percent: number;
}

/**
 * Commands bound to an environment. Every command is logged to the
 * project's log before and after it runs.
 */
export interface Shell {
  /** Run a command and return its result whatever the exit code */
  run(
    command: string,
    args: readonly string[],
    opts?: ExecOptions,
  ): Operation<CommandResult>;
  /** Run a command, throwing CommandError on a non-zero exit */
  expect(
    command: string,
    args: readonly string[],
    opts?: ExecOptions,
  ): Operation<CommandResult>;
}

/**
 * A provisioned, reusable execution context.
 */
export interface Environment {
  /** Registry key (e.g., "attrs@3.12") */
  readonly key: string;
  readonly project: string;
  readonly interpreter: InterpreterSpec;
  /** Root directory owned by this environment */
  readonly dir: string;
  /** Python executable inside the environment's venv */
  readonly python: string;
  readonly shell: Shell;
  /** Held for every install or execution step */
  readonly lock: Lock;
  /** Install arguments of the coverage tool currently installed */
  installedCoverage: string | null;
}

/**
 * A project under test. One registry entry per distinct project;
 * the adapter methods know how to prepare and run its test suite.
 */
export interface Project {
  readonly slug: string;
  /** Repository URL or path, for logs */
  readonly location: string;
  /**
   * Install the project's dependencies into the environment.
   * Throws PrepareError.
   */
  prepare(env: Environment): Operation<void>;
  /**
   * Run the test suite, measuring coverage unless the tool is the
   * baseline. This is the timed step. Throws TestRunError.
   */
  runTests(env: Environment, tool: CoverageToolSpec): Operation<void>;
  /**
   * Totals of the data the last measured run wrote, or null for the
   * baseline. Throws TestRunError.
   */
  summarize(env: Environment, tool: CoverageToolSpec): Operation<CoverageSummary | null>;
}

/**
 * String identity of a cell.
 */
export interface CellKey {
  project: string;
  interpreter: string;
  coverage: string;
}

/**
 * One point in the experiment matrix.
 */
export interface Cell {
  readonly key: CellKey;
  /** "project/interpreter/coverage" */
  readonly id: string;
  readonly project: Project;
  readonly interpreter: InterpreterSpec;
  readonly coverage: CoverageToolSpec;
}

/**
 * One repetition of a cell, numbered for logs.
 */
export interface PlannedRun {
  readonly cell: Cell;
  /** 1-based repetition index within the cell */
  readonly run: number;
  /** 1-based position in the whole experiment */
  readonly ordinal: number;
  readonly total: number;
}

/**
 * Outcome of one execution of a cell.
 */
export type RunResult =
  | {
      status: "passed";
      cell: CellKey;
      run: number;
      /** Wall-clock seconds around the adapter invocation */
      duration: number;
      coverage: CoverageSummary | null;
    }
  | {
      status: "failed";
      cell: CellKey;
      run: number;
      error: Error;
    };

/**
 * Aggregate over a cell's passed runs. Times are in seconds.
 */
export interface CellStatistic {
  cell: CellKey;
  median: number;
  stdev: number;
  /** Passed runs that contributed */
  samples: number;
  /** All runs attempted, passed or not */
  attempted: number;
  /** Coverage totals of the first passed run, if measured */
  coverage: CoverageSummary | null;
}

export type CellOutcome =
  | { ok: true; statistic: CellStatistic }
  | { ok: false; cell: CellKey; attempted: number; error: Error };

export type RatioDefinition = RatioConfig;

/**
 * How environments are keyed.
 *
 * - `shared`: one environment per (project, interpreter); coverage
 *   versions are swapped in place and baseline runs use the same
 *   environment.
 * - `separate-baseline`: baseline runs get their own environment that
 *   never has coverage installed.
 */
export type EnvironmentIsolation = "shared" | "separate-baseline";

/**
 * The declarative, validated description of an experiment.
 */
export interface ExperimentSpec {
  readonly name: string;
  readonly interpreters: readonly InterpreterSpec[];
  readonly coverageTools: readonly CoverageToolSpec[];
  readonly projects: readonly Project[];
  readonly numRuns: number;
  readonly rows: readonly Dimension[];
  readonly column: Dimension;
  readonly ratios: readonly RatioDefinition[];
  /** Outer-to-inner enumeration order of the matrix */
  readonly order: readonly Dimension[];
  readonly environments: EnvironmentIsolation;
  /** Maximum environments provisioned at once */
  readonly concurrency: number;
  readonly timeoutSeconds?: number;
  /** Remove environment directories before provisioning */
  readonly wipe: boolean;
}

/**
 * Everything the report needs from an experiment, by slug.
 */
export interface ReportLayout {
  dimensions: Record<Dimension, string[]>;
  rows: Dimension[];
  column: Dimension;
  ratios: RatioDefinition[];
}
