import { describe, it, expect } from "vitest";
import { AggregationError } from "../../../cli/lib/errors.js";
import { aggregate, aggregateAll, median, stdev, summarizeRuns } from "../../../cli/lib/stats.js";
import type { CellKey, RunResult } from "../../../cli/lib/types.js";

const cell: CellKey = { project: "attrs", interpreter: "3.12", coverage: "753" };

function passed(run: number, duration: number, percent = 90): RunResult {
  return {
    status: "passed",
    cell,
    run,
    duration,
    coverage: { statements: 100, missing: 100 - percent, percent },
  };
}

function failed(run: number): RunResult {
  return { status: "failed", cell, run, error: new Error("boom") };
}

describe("median", () => {
  it("returns the only value of a single sample", () => {
    expect(median([77.815])).toBe(77.815);
  });

  it("returns the middle value of an odd sample", () => {
    expect(median([90, 70, 80])).toBe(80);
  });

  it("averages the two middle values of an even sample", () => {
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([75.985, 77.815])).toBeCloseTo(76.9, 10);
  });

  it("does not reorder its input", () => {
    const values = [3, 1, 2];
    median(values);
    expect(values).toEqual([3, 1, 2]);
  });

  it("throws on an empty sample", () => {
    expect(() => median([])).toThrow("Cannot calculate median of empty array");
  });
});

describe("stdev", () => {
  it("is zero for a single value", () => {
    expect(stdev([77.815])).toBe(0);
  });

  it("is the population standard deviation", () => {
    expect(stdev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  it("throws on an empty sample", () => {
    expect(() => stdev([])).toThrow("Cannot calculate standard deviation of empty array");
  });
});

describe("aggregate", () => {
  it("reduces passed runs and counts failed ones as attempted", () => {
    const statistic = aggregate(cell, [passed(1, 10), failed(2), passed(3, 20), passed(4, 30)]);
    expect(statistic.median).toBe(20);
    expect(statistic.samples).toBe(3);
    expect(statistic.attempted).toBe(4);
    expect(statistic.cell).toEqual(cell);
  });

  it("keeps the coverage totals of the first passed run", () => {
    const statistic = aggregate(cell, [failed(1), passed(2, 10, 80), passed(3, 12, 85)]);
    expect(statistic.coverage).toEqual({ statements: 100, missing: 20, percent: 80 });
  });

  it("throws AggregationError when no run passed", () => {
    expect(() => aggregate(cell, [failed(1), failed(2)])).toThrow(AggregationError);
    expect(() => aggregate(cell, [failed(1), failed(2)])).toThrow(
      "No successful runs for attrs/3.12/753 (0/2)",
    );
  });
});

describe("aggregateAll", () => {
  it("groups runs by cell and keeps failed cells as errors", () => {
    const other: CellKey = { ...cell, coverage: "nocov" };
    const outcomes = aggregateAll([
      passed(1, 5),
      { status: "failed", cell: other, run: 1, error: new Error("x") },
      passed(2, 7),
    ]);

    expect([...outcomes.keys()]).toEqual(["attrs/3.12/753", "attrs/3.12/nocov"]);

    const ok = outcomes.get("attrs/3.12/753");
    expect(ok?.ok).toBe(true);
    if (ok?.ok) {
      expect(ok.statistic.median).toBe(6);
    }

    const bad = outcomes.get("attrs/3.12/nocov");
    expect(bad?.ok).toBe(false);
    if (bad && !bad.ok) {
      expect(bad.attempted).toBe(1);
      expect(bad.error).toBeInstanceOf(AggregationError);
    }
  });

  it("picks coverage by run index regardless of result order", () => {
    const outcomes = aggregateAll([passed(2, 10, 70), passed(1, 10, 60)]);
    const outcome = outcomes.get("attrs/3.12/753");
    expect(outcome?.ok && outcome.statistic.coverage?.percent).toBe(60);
  });
});

describe("summarizeRuns", () => {
  it("counts passed and attempted runs", () => {
    expect(summarizeRuns([passed(1, 1), failed(2), passed(3, 1)])).toEqual({
      passed: 2,
      attempted: 3,
    });
  });
});
