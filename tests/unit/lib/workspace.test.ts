import { describe, it, expect } from "vitest";
import { stat } from "node:fs/promises";
import { join } from "node:path";
import { call, run } from "effection";
import { withTempDir } from "../../../cli/lib/temp-dir.js";
import { computeCacheKey, useWorkDir } from "../../../cli/lib/workspace.js";

describe("computeCacheKey", () => {
  it("is a stable 16-character hex digest", () => {
    const key = computeCacheKey('{"name":"sample"}');
    expect(key).toMatch(/^[0-9a-f]{16}$/);
    expect(computeCacheKey('{"name":"sample"}')).toBe(key);
    expect(computeCacheKey('{"name":"other"}')).not.toBe(key);
  });
});

describe("useWorkDir", () => {
  it("creates an explicit directory and keeps it", async () => {
    const created = await run(() =>
      withTempDir(function* (root) {
        const dir = join(root, "work", "here");
        const resolved = yield* useWorkDir({ workDir: dir, cacheKey: "x" });
        expect(resolved).toBe(dir);
        const info = yield* call(() => stat(dir));
        return info.isDirectory();
      }),
    );
    expect(created).toBe(true);
  });

  it("removes a temporary directory when its scope exits", async () => {
    const dir = await run(() => useWorkDir({ cacheKey: "x" }));
    await expect(stat(dir)).rejects.toThrow(/ENOENT/);
  });
});
