import { describe, it, expect } from "vitest";
import { noCoverage, coveragePackage } from "../../../cli/lib/coverage.js";
import { ConfigurationError } from "../../../cli/lib/errors.js";
import { python } from "../../../cli/lib/interpreters.js";
import { cellId, expandMatrix, planRuns } from "../../../cli/lib/matrix.js";
import type { ExperimentSpec } from "../../../cli/lib/types.js";
import { FakeClock, fakeProject } from "../../helpers/fakes.js";

function spec(overrides: Partial<ExperimentSpec> = {}): ExperimentSpec {
  const clock = new FakeClock();
  return {
    name: "matrix",
    interpreters: [python(3, 11), python(3, 12)],
    coverageTools: [noCoverage(), coveragePackage("753", "coverage==7.5.3")],
    projects: [fakeProject("A", clock), fakeProject("B", clock), fakeProject("C", clock)],
    numRuns: 2,
    rows: ["project", "coverage"],
    column: "interpreter",
    ratios: [],
    order: ["project", "interpreter", "coverage"],
    environments: "shared",
    concurrency: 1,
    wipe: false,
    ...overrides,
  };
}

describe("cellId", () => {
  it("joins the key with slashes", () => {
    expect(cellId({ project: "attrs", interpreter: "3.12", coverage: "nocov" })).toBe(
      "attrs/3.12/nocov",
    );
  });
});

describe("expandMatrix", () => {
  it("yields every combination exactly once", () => {
    const cells = expandMatrix(spec());
    expect(cells).toHaveLength(3 * 2 * 2);
    expect(new Set(cells.map((c) => c.id)).size).toBe(12);
  });

  it("enumerates in the configured order, outermost first", () => {
    const ids = expandMatrix(spec({ projects: spec().projects.slice(0, 1) })).map((c) => c.id);
    expect(ids).toEqual(["A/3.11/nocov", "A/3.11/753", "A/3.12/nocov", "A/3.12/753"]);
  });

  it("honours a different order", () => {
    const ids = expandMatrix(
      spec({
        projects: spec().projects.slice(0, 2),
        interpreters: [python(3, 12)],
        order: ["coverage", "interpreter", "project"],
      }),
    ).map((c) => c.id);
    expect(ids).toEqual(["A/3.12/nocov", "B/3.12/nocov", "A/3.12/753", "B/3.12/753"]);
  });

  it("is deterministic", () => {
    const s = spec();
    expect(expandMatrix(s).map((c) => c.id)).toEqual(expandMatrix(s).map((c) => c.id));
  });

  it("rejects an empty dimension", () => {
    expect(() => expandMatrix(spec({ interpreters: [] }))).toThrow(ConfigurationError);
    expect(() => expandMatrix(spec({ interpreters: [] }))).toThrow(
      "Experiment has nothing to benchmark:\n  no interpreter values configured",
    );
  });
});

describe("planRuns", () => {
  it("interleaves repetitions round by round", () => {
    const s = spec({ projects: spec().projects.slice(0, 1), interpreters: [python(3, 12)] });
    const runs = planRuns(s, expandMatrix(s));
    expect(runs.map((r) => `${r.cell.id}#${r.run} ${r.ordinal}/${r.total}`)).toEqual([
      "A/3.12/nocov#1 1/4",
      "A/3.12/753#1 2/4",
      "A/3.12/nocov#2 3/4",
      "A/3.12/753#2 4/4",
    ]);
  });
});
