import { describe, it, expect } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { call, run, type Operation } from "effection";
import {
  defaultResultsPath,
  fromRunRecord,
  readResultsFile,
  toRunRecord,
  writeResultsFile,
} from "../../../cli/lib/results.js";
import { SCHEMA_VERSION, type ResultsFile } from "../../../cli/lib/schema.js";
import { withTempDir } from "../../../cli/lib/temp-dir.js";
import type { RunResult } from "../../../cli/lib/types.js";

const cell = { project: "A", interpreter: "3.12", coverage: "753" };

const sample: ResultsFile = {
  schemaVersion: SCHEMA_VERSION,
  metadata: {
    name: "sample",
    timestamp: "2024-05-01T10:20:30.000Z",
    runner: { os: "linux", arch: "x64" },
    numRuns: 2,
  },
  layout: {
    dimensions: { project: ["A"], interpreter: ["3.12"], coverage: ["753"] },
    rows: ["project"],
    column: "coverage",
    ratios: [],
  },
  runs: [
    { ...cell, status: "passed", run: 1, duration: 1.25, totals: { statements: 10, missing: 1, percent: 90 } },
    { ...cell, status: "failed", run: 2, error: "Tests for A failed (exit code 1)" },
  ],
};

function inTempDir<T>(fn: (dir: string) => Operation<T>): Promise<T> {
  return run(() => withTempDir(fn));
}

describe("run records", () => {
  it("stores coverage totals under their own field", () => {
    const result: RunResult = {
      status: "passed",
      cell,
      run: 1,
      duration: 2.5,
      coverage: { statements: 10, missing: 2, percent: 80 },
    };
    expect(toRunRecord(result)).toEqual({
      project: "A",
      interpreter: "3.12",
      coverage: "753",
      status: "passed",
      run: 1,
      duration: 2.5,
      totals: { statements: 10, missing: 2, percent: 80 },
    });
  });

  it("keeps the message of a failure", () => {
    const record = toRunRecord({ status: "failed", cell, run: 3, error: new Error("timed out") });
    expect(record).toEqual({ ...cell, status: "failed", run: 3, error: "timed out" });

    const restored = fromRunRecord(record);
    expect(restored.status === "failed" && restored.error.message).toBe("timed out");
  });
});

describe("defaultResultsPath", () => {
  it("dates the file by its timestamp", () => {
    expect(defaultResultsPath(sample)).toBe("data/json/2024-05-01-sample.json");
  });
});

describe("results files", () => {
  it("reads back what was written", async () => {
    const loaded = await inTempDir(function* (dir) {
      const path = join(dir, "nested", "results.json");
      yield* writeResultsFile(path, sample);
      return yield* readResultsFile(path);
    });

    expect(loaded.file).toEqual(sample);
    expect(loaded.layout).toEqual(sample.layout);
    expect(loaded.results.map((r) => `${r.status}#${r.run}`)).toEqual(["passed#1", "failed#2"]);
  });

  it("rejects malformed JSON", async () => {
    await expect(
      inTempDir(function* (dir) {
        const path = join(dir, "broken.json");
        yield* call(() => writeFile(path, "{"));
        return yield* readResultsFile(path);
      }),
    ).rejects.toThrow(/^Failed to parse .*broken\.json: /);
  });

  it("rejects files that do not match the schema", async () => {
    await expect(
      inTempDir(function* (dir) {
        const path = join(dir, "invalid.json");
        yield* call(() => writeFile(path, JSON.stringify({ ...sample, runs: "none" })));
        return yield* readResultsFile(path);
      }),
    ).rejects.toThrow(/^Invalid results file .*invalid\.json: /);
  });

  it("rejects files from a newer schema", async () => {
    await expect(
      inTempDir(function* (dir) {
        const path = join(dir, "future.json");
        yield* call(() => writeFile(path, JSON.stringify({ ...sample, schemaVersion: SCHEMA_VERSION + 1 })));
        return yield* readResultsFile(path);
      }),
    ).rejects.toThrow(`has schema version ${SCHEMA_VERSION + 1}; this version reads up to ${SCHEMA_VERSION}`);
  });
});
