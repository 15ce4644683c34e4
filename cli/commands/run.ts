/**
 * run command implementation.
 *
 * Loads an experiment file, provisions environments, runs every cell,
 * prints the report and writes a results file.
 *
 * @module
 */

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { call, type Operation } from "effection";
import { z, ZodError } from "zod";
import { Configliere } from "configliere";
import { experimentFromConfig } from "../lib/definition.js";
import { createEnvironmentRegistry } from "../lib/environments.js";
import { ConfigurationError } from "../lib/errors.js";
import { runExperiment } from "../lib/experiment.js";
import { createExperimentLogger, createProjectLogs, type ProjectLogs } from "../lib/logging.js";
import { processRunner } from "../lib/process.js";
import { renderReport } from "../lib/report.js";
import {
  defaultResultsPath,
  toResultsFile,
  writeResultsFile,
} from "../lib/results.js";
import { toError } from "../lib/result.js";
import { validateExperimentConfig, type ExperimentConfig } from "../lib/schema.js";
import type { CellOutcome, ExperimentSpec } from "../lib/types.js";
import { useWorkDir } from "../lib/workspace.js";

/**
 * Configliere spec for run command options.
 */
const configliere = new Configliere({
  config: {
    schema: z.string().min(1),
    description: "Experiment file (JSON)",
    cli: { alias: "c" },
  },
  runs: {
    schema: z.coerce.number().int().positive().optional(),
    description: "Override the experiment's numRuns",
  },
  concurrency: {
    schema: z.coerce.number().int().positive().optional(),
    description: "Override how many environments are provisioned at once",
  },
  "work-dir": {
    schema: z.string().min(1).optional(),
    description: "Directory for environments (kept)",
  },
  "log-dir": {
    schema: z.string().min(1),
    default: "logs",
    description: "Directory for per-project logs",
  },
  "cache-workspace": {
    schema: z.boolean(),
    default: false,
    description: "Keep environments in ~/.cache/covbench for reuse",
    cli: { switch: true },
  },
  output: {
    schema: z.string().min(1).optional(),
    description: "Results file",
    cli: { alias: "o" },
  },
  json: {
    schema: z.boolean(),
    default: false,
    description: "Print the report as JSON",
    cli: { switch: true },
  },
  stdev: {
    schema: z.boolean(),
    default: false,
    description: "Show standard deviations in the table",
    cli: { switch: true },
  },
  quiet: {
    schema: z.boolean(),
    default: false,
    description: "Only log warnings and errors",
    cli: { switch: true },
  },
});

const ENV_PREFIX = "COVBENCH_";

/**
 * Environment seen by the option parser: only `COVBENCH_` variables,
 * with the prefix removed, so `COVBENCH_WORK_DIR` supplies `--work-dir`.
 */
export function optionEnv(env: Record<string, string | undefined>): Record<string, string> {
  const scoped: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (name.startsWith(ENV_PREFIX) && value) {
      scoped[name.slice(ENV_PREFIX.length)] = value;
    }
  }
  return scoped;
}

function parseExperimentFile(path: string, data: unknown): ExperimentConfig {
  try {
    return validateExperimentConfig(data);
  } catch (e) {
    if (e instanceof ZodError) {
      throw new ConfigurationError(
        `Invalid experiment file ${path}`,
        e.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
      );
    }
    throw e;
  }
}

/**
 * Load and validate an experiment file, applying command-line overrides.
 */
export function* loadExperiment(
  path: string,
  overrides: { runs?: number; concurrency?: number },
): Operation<{ spec: ExperimentSpec; text: string }> {
  const file = resolve(path);
  const text = yield* call(() => readFile(file, "utf8"));

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new ConfigurationError(`Failed to parse ${path}: ${toError(e).message}`);
  }

  const config = parseExperimentFile(path, data);
  const spec = experimentFromConfig(
    {
      ...config,
      numRuns: overrides.runs ?? config.numRuns,
      concurrency: overrides.concurrency ?? config.concurrency,
    },
    dirname(file),
  );
  return { spec, text };
}

/**
 * Print the cells with no successful run and the log files of their
 * projects.
 */
export function printFailedCells(
  outcomes: ReadonlyMap<string, CellOutcome>,
  logs: Pick<ProjectLogs, "pathOf">,
): void {
  const failedCells = [...outcomes.values()].filter(
    (o): o is Extract<CellOutcome, { ok: false }> => !o.ok,
  );
  if (failedCells.length === 0) {
    return;
  }

  console.error("\nCells with no successful runs:");
  for (const cell of failedCells) {
    console.error(`  ${cell.error.message}`);
  }
  const paths = [...new Set(failedCells.map((c) => c.cell.project))]
    .map((slug) => logs.pathOf(slug))
    .filter((path): path is string => path !== undefined);
  if (paths.length > 0) {
    console.error(`\nSee ${paths.join(", ")}`);
  }
}

/**
 * Run an experiment.
 */
export function* runCommand(args: string[]): Operation<number> {
  const parseResult = configliere.parse({
    args,
    env: optionEnv(process.env),
  });

  if (!parseResult.ok) {
    console.error("Error parsing arguments:");
    console.error(parseResult.summary);
    return 1;
  }

  const config = parseResult.config;

  let loaded: { spec: ExperimentSpec; text: string };
  try {
    loaded = yield* loadExperiment(config.config, config);
  } catch (e) {
    const error = toError(e);
    console.error(error instanceof ConfigurationError ? error.message : `Cannot load ${config.config}: ${error.message}`);
    return 1;
  }
  const { spec } = loaded;

  console.log(`\nRunning experiment ${spec.name}`);
  console.log(`Projects: ${spec.projects.map((p) => p.slug).join(", ")}`);
  console.log(`Interpreters: ${spec.interpreters.map((i) => i.slug).join(", ")}`);
  console.log(`Coverage: ${spec.coverageTools.map((c) => c.slug).join(", ")}`);
  console.log(`Options: runs=${spec.numRuns}, concurrency=${spec.concurrency}, environments=${spec.environments}`);

  const workDir = yield* useWorkDir({
    workDir: config["work-dir"],
    useCache: config["cache-workspace"],
    cacheKey: loaded.text,
  });
  const logDir = resolve(config["log-dir"]);
  console.log(`Work directory: ${workDir}`);
  console.log(`Logs: ${logDir}\n`);

  const logs = createProjectLogs(logDir);
  const outcome = yield* runExperiment(spec, {
    workDir,
    registry: createEnvironmentRegistry(),
    commands: processRunner,
    logs,
    logger: createExperimentLogger(config.quiet ? "warn" : "info"),
  });

  console.log();
  if (config.json) {
    console.log(JSON.stringify(outcome.report, null, 2));
  } else {
    console.log(renderReport(outcome.report, { stdev: config.stdev }));
  }

  const results = toResultsFile(outcome);
  const path = config.output ?? defaultResultsPath(results);
  yield* writeResultsFile(path, results);
  console.log(`\nWrote: ${path}`);

  if (outcome.provisioningFailures.length > 0) {
    console.error("\nProvisioning failures:");
    for (const { context, error } of outcome.provisioningFailures) {
      console.error(`  ${context}: ${error.message}`);
    }
  }

  printFailedCells(outcome.outcomes, logs);

  console.log(`\nCompleted: ${outcome.passed}/${outcome.attempted} runs succeeded`);

  return outcome.exitCode;
}
