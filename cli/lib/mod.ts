/**
 * Library entry point: define experiments in code and run them.
 *
 * @example
 * ```ts
 * import { run } from "effection";
 * import {
 *   coveragePackage, createEnvironmentRegistry, createExperimentLogger,
 *   createProjectLogs, defineExperiment, gitProject, noCoverage,
 *   processRunner, python, renderReport, runExperiment,
 * } from "covbench";
 *
 * const spec = defineExperiment({
 *   interpreters: [python(3, 11), python(3, 12)],
 *   coverageTools: [noCoverage(), coveragePackage("7.5", "coverage==7.5.4")],
 *   projects: [gitProject({ slug: "sample", repository: "https://example.com/sample.git" })],
 *   numRuns: 3,
 *   rows: ["project", "coverage"],
 *   column: "interpreter",
 *   ratios: [{ label: "3.12 vs 3.11", numerator: "3.12", denominator: "3.11" }],
 * });
 *
 * const outcome = await run(() => runExperiment(spec, {
 *   workDir: "/tmp/covbench",
 *   registry: createEnvironmentRegistry(),
 *   commands: processRunner,
 *   logs: createProjectLogs("logs"),
 *   logger: createExperimentLogger(),
 * }));
 * console.log(renderReport(outcome.report));
 * ```
 *
 * @module
 */

export * from "./coverage.js";
export * from "./definition.js";
export * from "./environments.js";
export * from "./errors.js";
export * from "./experiment.js";
export * from "./interpreters.js";
export * from "./logging.js";
export * from "./matrix.js";
export * from "./process.js";
export * from "./report.js";
export * from "./results.js";
export * from "./stats.js";
export type * from "./types.js";
export { gitProject, projectFromConfig, scriptProject } from "../projects/mod.js";
export type { GitProjectOptions, ScriptProjectOptions } from "../projects/mod.js";
