/**
 * Help command implementation.
 *
 * @module
 */

import type { Operation } from "effection";

const MAIN_HELP = `
Coverage overhead benchmark CLI

Usage: covbench <command> [options]

Commands:
  run       Run an experiment and report test-suite timings
  report    Re-render the report of a saved results file
  clean     Remove cached environments
  help      Show this help message

Run 'covbench help <command>' for command-specific help.

Examples:
  covbench run --config experiments/sample.json
  covbench report data/json/2024-05-01-sample.json --stdev
  covbench clean
`.trim();

const RUN_HELP = `
covbench run - Run an experiment

Usage:
  covbench run --config <file> [options]

Required:
  --config, -c       Experiment file (JSON)

Options:
  --runs             Override the experiment's numRuns
  --concurrency      Override how many environments are provisioned at once
  --work-dir         Directory for environments, kept after the run
                     (env: COVBENCH_WORK_DIR)
  --log-dir          Directory for per-project logs (default: logs)
                     (env: COVBENCH_LOG_DIR)
  --cache-workspace  Keep environments in ~/.cache/covbench for reuse
  --output, -o       Results file (default: data/json/<date>-<name>.json)
  --json             Print the report as JSON
  --stdev            Show standard deviations in the table
  --quiet            Only log warnings and errors

Examples:
  covbench run -c experiments/sample.json
  covbench run -c experiments/sample.json --runs 5 --cache-workspace
  covbench run -c experiments/sample.json --work-dir /tmp/covbench --json
`.trim();

const REPORT_HELP = `
covbench report - Re-render the report of a saved results file

Usage:
  covbench report <results-file> [options]

Options:
  --json     Print the report as JSON
  --stdev    Show standard deviations in the table

Examples:
  covbench report data/json/2024-05-01-sample.json
  covbench report data/json/2024-05-01-sample.json --json
`.trim();

const CLEAN_HELP = `
covbench clean - Remove cached environments

Usage:
  covbench clean

Removes the workspace cache used by 'covbench run --cache-workspace'.
`.trim();

const COMMAND_HELP: Record<string, string> = {
  run: RUN_HELP,
  report: REPORT_HELP,
  clean: CLEAN_HELP,
  help: MAIN_HELP,
};

/**
 * Display help for a command or general usage.
 */
export function* helpCommand(args: string[]): Operation<number> {
  const subcommand = args[0];

  if (subcommand && COMMAND_HELP[subcommand]) {
    console.log(COMMAND_HELP[subcommand]);
  } else if (subcommand) {
    console.error(`Unknown command: ${subcommand}`);
    console.log();
    console.log(MAIN_HELP);
    return 1;
  } else {
    console.log(MAIN_HELP);
  }

  return 0;
}
