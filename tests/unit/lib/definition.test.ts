import { describe, it, expect } from "vitest";
import { coveragePackage, noCoverage } from "../../../cli/lib/coverage.js";
import {
  defineExperiment,
  experimentFromConfig,
  reportLayout,
  validateExperiment,
  type ExperimentInput,
} from "../../../cli/lib/definition.js";
import { ConfigurationError } from "../../../cli/lib/errors.js";
import { python } from "../../../cli/lib/interpreters.js";
import { validateExperimentConfig } from "../../../cli/lib/schema.js";
import { FakeClock, fakeProject } from "../../helpers/fakes.js";

function input(overrides: Partial<ExperimentInput> = {}): ExperimentInput {
  const clock = new FakeClock();
  return {
    interpreters: [python(3, 10), python(3, 11)],
    coverageTools: [coveragePackage("753", "coverage==7.5.3")],
    projects: [fakeProject("A", clock), fakeProject("B", clock)],
    rows: ["coverage", "project"],
    column: "interpreter",
    ratios: [{ label: "3.11 vs 3.10", numerator: "3.11", denominator: "3.10" }],
    ...overrides,
  };
}

describe("validateExperiment", () => {
  it("accepts a well-formed experiment", () => {
    expect(validateExperiment(input())).toEqual([]);
  });

  it("reports empty dimensions", () => {
    expect(validateExperiment(input({ coverageTools: [] }))).toContain(
      "no coverage values configured",
    );
  });

  it("reports duplicate slugs", () => {
    const issues = validateExperiment(input({ interpreters: [python(3, 11), python(3, 11)] }));
    expect(issues).toContain('duplicate interpreter "3.11"');
  });

  it("rejects a dimension used as both row and column", () => {
    expect(validateExperiment(input({ rows: ["interpreter", "project"] }))).toContain(
      '"interpreter" cannot be both a row and the column dimension',
    );
  });

  it("rejects an unpivoted dimension with several values", () => {
    const issues = validateExperiment(input({ rows: ["project"] }));
    expect(issues).toEqual([]);

    const twoTools = input({
      rows: ["project"],
      coverageTools: [noCoverage(), coveragePackage("753", "coverage==7.5.3")],
    });
    expect(validateExperiment(twoTools)).toEqual([
      "coverage has 2 values but is neither a row nor the column",
    ]);
  });

  it("checks ratio sides against the column values", () => {
    const issues = validateExperiment(
      input({ ratios: [{ label: "r", numerator: "3.12", denominator: "3.10" }] }),
    );
    expect(issues).toEqual([
      'ratio "r" numerator "3.12" is not a interpreter value (3.10, 3.11)',
    ]);
  });

  it("rejects a ratio label that collides with a column header", () => {
    const issues = validateExperiment(
      input({ ratios: [{ label: "3.10", numerator: "3.11", denominator: "3.10" }] }),
    );
    expect(issues).toEqual(['ratio label "3.10" collides with a interpreter value']);
  });

  it("checks numeric settings", () => {
    const issues = validateExperiment(input({ numRuns: 0, concurrency: 1.5, timeoutSeconds: -1 }));
    expect(issues).toEqual([
      "numRuns must be a positive integer, got 0",
      "concurrency must be a positive integer, got 1.5",
      "timeoutSeconds must be positive, got -1",
    ]);
  });

  it("requires the order to list every dimension", () => {
    expect(validateExperiment(input({ order: ["project", "project", "coverage"] }))).toEqual([
      "order must list each of project, interpreter, coverage once",
    ]);
  });
});

describe("defineExperiment", () => {
  it("fills in defaults", () => {
    const spec = defineExperiment(input());
    expect(spec.name).toBe("experiment");
    expect(spec.numRuns).toBe(1);
    expect(spec.order).toEqual(["project", "interpreter", "coverage"]);
    expect(spec.environments).toBe("shared");
    expect(spec.concurrency).toBe(1);
    expect(spec.wipe).toBe(false);
    expect(Object.isFrozen(spec)).toBe(true);
  });

  it("throws ConfigurationError listing every issue", () => {
    expect(() => defineExperiment(input({ projects: [], numRuns: 0 }))).toThrow(
      new ConfigurationError("Invalid experiment", [
        "no project values configured",
        "numRuns must be a positive integer, got 0",
      ]),
    );
  });
});

describe("experimentFromConfig", () => {
  it("builds interpreters, tools and projects from a file", () => {
    const config = validateExperimentConfig({
      name: "sample",
      interpreters: [{ python: "3.12" }, { prefix: "/opt/py313/", slug: "v3.13" }],
      coverageTools: [
        { kind: "none", slug: "nocov" },
        { kind: "package", slug: "753", specifier: "coverage==7.5.3" },
        { kind: "source", slug: "dev", directory: "../coverage", env: { COVERAGE_CORE: "sysmon" } },
      ],
      projects: [{ kind: "script", path: "scripts/bm_sample.py" }],
      rows: ["coverage"],
      column: "interpreter",
    });

    const spec = experimentFromConfig(config, "/work/experiments");

    expect(spec.name).toBe("sample");
    expect(spec.interpreters.map((i) => i.executable)).toEqual([
      "python3.12",
      "/opt/py313/bin/python3",
    ]);
    expect(spec.coverageTools.map((t) => t.install)).toEqual([
      [],
      ["coverage==7.5.3"],
      ["/work/coverage"],
    ]);
    expect(spec.coverageTools[2].env).toEqual({ COVERAGE_CORE: "sysmon" });
    expect(spec.projects.map((p) => [p.slug, p.location])).toEqual([
      ["bm_sample", "/work/experiments/scripts/bm_sample.py"],
    ]);
  });
});

describe("reportLayout", () => {
  it("lists slugs per dimension with the pivot settings", () => {
    expect(reportLayout(defineExperiment(input()))).toEqual({
      dimensions: {
        project: ["A", "B"],
        interpreter: ["3.10", "3.11"],
        coverage: ["753"],
      },
      rows: ["coverage", "project"],
      column: "interpreter",
      ratios: [{ label: "3.11 vs 3.10", numerator: "3.11", denominator: "3.10" }],
    });
  });
});
