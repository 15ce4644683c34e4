/**
 * Zod schemas for experiment files and results files.
 * This is the single source of truth for the on-disk data formats.
 *
 * @module
 */

import { z } from "zod";

/**
 * Schema version for migration safety.
 * Increment when making breaking changes to the results format.
 */
export const SCHEMA_VERSION = 1;

/**
 * Dimensions of the experiment matrix.
 */
export const DIMENSIONS = ["project", "interpreter", "coverage"] as const;

export const DimensionSchema = z.enum(DIMENSIONS);

export type Dimension = z.infer<typeof DimensionSchema>;

const SlugSchema = z
  .string()
  .min(1)
  .regex(/^[\w.+%-]+$/, "slugs may only contain letters, digits and . _ + % -");

const EnvVarsSchema = z.record(z.string());

/**
 * An interpreter: either `{ "python": "3.12" }` for a versioned
 * executable on PATH, or an ad-hoc install prefix with its own slug.
 */
export const InterpreterConfigSchema = z.union([
  z.object({
    python: z.string().regex(/^\d+\.\d+$/, "expected <major>.<minor>"),
  }),
  z.object({
    prefix: z.string().min(1),
    slug: SlugSchema,
  }),
]);

export type InterpreterConfig = z.infer<typeof InterpreterConfigSchema>;

/**
 * A coverage-tool configuration.
 */
export const CoverageToolConfigSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("none"),
    slug: SlugSchema,
  }),
  z.object({
    kind: z.literal("package"),
    slug: SlugSchema,
    specifier: z.string().min(1),
    env: EnvVarsSchema.default({}),
    settings: z.record(z.string()).default({}),
  }),
  z.object({
    kind: z.literal("source"),
    slug: SlugSchema,
    directory: z.string().min(1),
    env: EnvVarsSchema.default({}),
    settings: z.record(z.string()).default({}),
  }),
]);

export type CoverageToolConfig = z.infer<typeof CoverageToolConfigSchema>;

/**
 * A project to benchmark.
 */
export const ProjectConfigSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("git"),
    slug: SlugSchema,
    repository: z.string().min(1),
    ref: z.string().min(1).optional(),
    install: z.array(z.string().min(1)).default(["-e", "."]),
    testArgs: z.array(z.string()).default([]),
    env: EnvVarsSchema.default({}),
  }),
  z.object({
    kind: z.literal("script"),
    slug: SlugSchema.optional(),
    path: z.string().min(1),
    args: z.array(z.string()).default([]),
  }),
]);

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export const RatioConfigSchema = z.object({
  label: z.string().min(1),
  numerator: z.string().min(1),
  denominator: z.string().min(1),
});

export type RatioConfig = z.infer<typeof RatioConfigSchema>;

/**
 * Experiment file schema. Dimension lists are allowed to be empty here
 * so that the emptiness check reports a ConfigurationError with the
 * other structural problems.
 */
export const ExperimentConfigSchema = z.object({
  name: z.string().min(1).default("experiment"),
  interpreters: z.array(InterpreterConfigSchema),
  coverageTools: z.array(CoverageToolConfigSchema),
  projects: z.array(ProjectConfigSchema),
  numRuns: z.number().int().positive().default(1),
  rows: z.array(DimensionSchema).min(1),
  column: DimensionSchema,
  ratios: z.array(RatioConfigSchema).default([]),
  order: z.array(DimensionSchema).length(3).optional(),
  environments: z.enum(["shared", "separate-baseline"]).default("shared"),
  concurrency: z.number().int().positive().default(1),
  timeoutSeconds: z.number().positive().optional(),
  wipe: z.boolean().default(false),
});

export type ExperimentConfig = z.infer<typeof ExperimentConfigSchema>;

export const CoverageSummarySchema = z.object({
  statements: z.number().int().nonnegative(),
  missing: z.number().int().nonnegative(),
  percent: z.number().min(0).max(100),
});

export const CellKeySchema = z.object({
  project: z.string().min(1),
  interpreter: z.string().min(1),
  coverage: z.string().min(1),
});

/**
 * One recorded run in a results file.
 */
export const RunRecordSchema = z.discriminatedUnion("status", [
  CellKeySchema.extend({
    status: z.literal("passed"),
    run: z.number().int().positive(),
    duration: z.number().nonnegative().finite(),
    totals: CoverageSummarySchema.nullable(),
  }),
  CellKeySchema.extend({
    status: z.literal("failed"),
    run: z.number().int().positive(),
    error: z.string(),
  }),
]);

export type RunRecord = z.infer<typeof RunRecordSchema>;

export const RunnerSchema = z.object({
  os: z.string().min(1),
  arch: z.string().min(1),
});

/**
 * Layout needed to re-render a report: dimension values in configured
 * order plus the pivot and ratio settings.
 */
export const LayoutSchema = z.object({
  dimensions: z.object({
    project: z.array(z.string().min(1)).min(1),
    interpreter: z.array(z.string().min(1)).min(1),
    coverage: z.array(z.string().min(1)).min(1),
  }),
  rows: z.array(DimensionSchema).min(1),
  column: DimensionSchema,
  ratios: z.array(RatioConfigSchema),
});

/**
 * Complete results file schema.
 * This is validated before writing any JSON results file.
 */
export const ResultsFileSchema = z.object({
  schemaVersion: z.number().int().min(1),
  metadata: z.object({
    name: z.string().min(1),
    timestamp: z.string().datetime(),
    runner: RunnerSchema,
    numRuns: z.number().int().positive(),
  }),
  layout: LayoutSchema,
  runs: z.array(RunRecordSchema),
});

export type ResultsFile = z.infer<typeof ResultsFileSchema>;

/**
 * Validate an experiment file. Throws ZodError if validation fails.
 */
export function validateExperimentConfig(data: unknown): ExperimentConfig {
  return ExperimentConfigSchema.parse(data);
}

/**
 * Safe validation that returns a result object instead of throwing.
 */
export function safeParseResultsFile(
  data: unknown,
): z.SafeParseReturnType<unknown, ResultsFile> {
  return ResultsFileSchema.safeParse(data);
}

/**
 * Validate a results file. Throws ZodError if validation fails.
 */
export function validateResultsFile(data: unknown): ResultsFile {
  return ResultsFileSchema.parse(data);
}
