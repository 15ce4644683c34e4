import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { run, type Operation } from "effection";
import { coveragePackage, noCoverage, rcFilePath } from "../../../cli/lib/coverage.js";
import { TestRunError } from "../../../cli/lib/errors.js";
import { attempt } from "../../../cli/lib/result.js";
import { withTempDir } from "../../../cli/lib/temp-dir.js";
import { reportCoverage, runPython } from "../../../cli/projects/python.js";
import { FakeCommandRunner, fakeEnvironment } from "../../helpers/fakes.js";

const REPORT = "Name    Stmts   Miss  Cover\nTOTAL      50     10    80%\n";

function inTempDir<T>(fn: (dir: string) => Operation<T>): Promise<T> {
  return run(() => withTempDir(fn));
}

describe("runPython", () => {
  it("runs the bare command for the baseline", async () => {
    await inTempDir(function* (dir) {
      const runner = new FakeCommandRunner();
      const env = fakeEnvironment(dir, runner);

      yield* runPython(env, noCoverage(), ["-m", "pytest", "-q"], {
        project: "A",
        cwd: join(dir, "src"),
        env: { PYTHONHASHSEED: "0" },
      });

      expect(runner.lines()).toEqual([`${env.python} -m pytest -q`]);
      expect(runner.calls[0].opts).toEqual({
        cwd: join(dir, "src"),
        env: { PYTHONHASHSEED: "0" },
      });
    });
  });

  it("runs under coverage with the tool's rc file and variables", async () => {
    await inTempDir(function* (dir) {
      const runner = new FakeCommandRunner();
      const env = fakeEnvironment(dir, runner);
      const tool = coveragePackage("sysmon", "coverage==7.5.3", {
        env: { COVERAGE_CORE: "sysmon" },
        settings: { branch: "true" },
      });

      yield* runPython(env, tool, ["-m", "pytest"], { project: "A", cwd: dir });

      expect(rcFilePath(env, tool)).toBe(join(dir, "coveragerc-sysmon"));
      expect(runner.lines()).toEqual([
        `${env.python} -m coverage run --rcfile=${join(dir, "coveragerc-sysmon")} -m pytest`,
      ]);
      expect(runner.calls[0].opts.env).toEqual({ COVERAGE_CORE: "sysmon" });
    });
  });

  it("throws TestRunError when the tests fail", async () => {
    await inTempDir(function* (dir) {
      const runner = new FakeCommandRunner(() => ({ code: 2, output: "1 failed" }));
      const env = fakeEnvironment(dir, runner);

      const result = yield* attempt(
        "A",
        runPython(env, coveragePackage("753", "coverage==7.5.3"), ["-m", "pytest"], {
          project: "A",
          cwd: dir,
        }),
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(TestRunError);
        expect(result.error.message).toBe("Tests for A failed (exit code 2)");
      }
      expect(runner.calls).toHaveLength(1);
    });
  });
});

describe("reportCoverage", () => {
  it("parses the totals of coverage report", async () => {
    await inTempDir(function* (dir) {
      const runner = new FakeCommandRunner((c) =>
        c.args.includes("report") ? { stdout: REPORT } : undefined,
      );
      const env = fakeEnvironment(dir, runner);
      const tool = coveragePackage("sysmon", "coverage==7.5.3", { env: { COVERAGE_CORE: "sysmon" } });

      const totals = yield* reportCoverage(env, tool, { project: "A", cwd: dir });

      expect(totals).toEqual({ statements: 50, missing: 10, percent: 80 });
      expect(runner.lines()).toEqual([
        `${env.python} -m coverage report --rcfile=${join(dir, "coveragerc-sysmon")}`,
      ]);
      expect(runner.calls[0].opts).toEqual({ cwd: dir, env: { COVERAGE_CORE: "sysmon" } });
    });
  });

  it("runs nothing for the baseline", async () => {
    await inTempDir(function* (dir) {
      const runner = new FakeCommandRunner();
      const env = fakeEnvironment(dir, runner);

      expect(yield* reportCoverage(env, noCoverage(), { project: "A", cwd: dir })).toBeNull();
      expect(runner.calls).toEqual([]);
    });
  });

  it("reports no totals when the report has none", async () => {
    await inTempDir(function* (dir) {
      const env = fakeEnvironment(dir, new FakeCommandRunner());

      const totals = yield* reportCoverage(env, coveragePackage("753", "coverage==7.5.3"), {
        project: "A",
        cwd: dir,
      });

      expect(totals).toBeNull();
    });
  });

  it("throws TestRunError when the report fails", async () => {
    await inTempDir(function* (dir) {
      const env = fakeEnvironment(dir, new FakeCommandRunner(() => ({ code: 1, output: "No data to report." })));

      const result = yield* attempt(
        "A",
        reportCoverage(env, coveragePackage("753", "coverage==7.5.3"), { project: "A", cwd: dir }),
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(TestRunError);
        expect(result.error.message).toBe("Tests for A failed (exit code 1)");
      }
    });
  });
});
