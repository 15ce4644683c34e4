/**
 * Results files: the raw runs of an experiment plus the layout needed
 * to re-render its report.
 *
 * @module
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { arch, platform } from "node:os";
import { dirname } from "node:path";
import { call, type Operation } from "effection";
import { reportLayout } from "./definition.js";
import type { ExperimentOutcome } from "./experiment.js";
import { toError } from "./result.js";
import {
  SCHEMA_VERSION,
  safeParseResultsFile,
  validateResultsFile,
  type ResultsFile,
  type RunRecord,
} from "./schema.js";
import type { ReportLayout, RunResult } from "./types.js";

export function toRunRecord(result: RunResult): RunRecord {
  const { project, interpreter, coverage } = result.cell;
  if (result.status === "passed") {
    return {
      project,
      interpreter,
      coverage,
      status: "passed",
      run: result.run,
      duration: result.duration,
      totals: result.coverage,
    };
  }
  return {
    project,
    interpreter,
    coverage,
    status: "failed",
    run: result.run,
    error: result.error.message,
  };
}

export function fromRunRecord(record: RunRecord): RunResult {
  const cell = {
    project: record.project,
    interpreter: record.interpreter,
    coverage: record.coverage,
  };
  if (record.status === "passed") {
    return {
      status: "passed",
      cell,
      run: record.run,
      duration: record.duration,
      coverage: record.totals,
    };
  }
  return { status: "failed", cell, run: record.run, error: new Error(record.error) };
}

/**
 * Build a validated results file from an experiment outcome.
 */
export function toResultsFile(
  outcome: ExperimentOutcome,
  timestamp = new Date(),
): ResultsFile {
  return validateResultsFile({
    schemaVersion: SCHEMA_VERSION,
    metadata: {
      name: outcome.spec.name,
      timestamp: timestamp.toISOString(),
      runner: { os: platform(), arch: arch() },
      numRuns: outcome.spec.numRuns,
    },
    layout: reportLayout(outcome.spec),
    runs: outcome.results.map(toRunRecord),
  });
}

/**
 * Default path for a results file: `data/json/<date>-<name>.json`.
 */
export function defaultResultsPath(file: ResultsFile): string {
  const date = file.metadata.timestamp.split("T")[0];
  return `data/json/${date}-${file.metadata.name}.json`;
}

export function* writeResultsFile(path: string, file: ResultsFile): Operation<void> {
  yield* call(() => mkdir(dirname(path), { recursive: true }));
  yield* call(() => writeFile(path, `${JSON.stringify(file, null, 2)}\n`));
}

export interface ResultsFileContents {
  file: ResultsFile;
  layout: ReportLayout;
  results: RunResult[];
}

/**
 * Read and validate a results file.
 *
 * @throws Error describing why the file is unreadable or invalid
 */
export function* readResultsFile(
  path: string,
): Operation<ResultsFileContents> {
  const text = yield* call(() => readFile(path, "utf8"));

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new Error(`Failed to parse ${path}: ${toError(e).message}`);
  }

  const parsed = safeParseResultsFile(data);
  if (!parsed.success) {
    throw new Error(`Invalid results file ${path}: ${parsed.error.message}`);
  }
  if (parsed.data.schemaVersion > SCHEMA_VERSION) {
    throw new Error(
      `${path} has schema version ${parsed.data.schemaVersion}; this version reads up to ${SCHEMA_VERSION}`,
    );
  }

  return {
    file: parsed.data,
    layout: parsed.data.layout,
    results: parsed.data.runs.map(fromRunRecord),
  };
}
