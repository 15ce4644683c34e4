/**
 * Environment provisioning.
 *
 * Creates isolated virtual environments keyed by project and
 * interpreter, installs the project's dependencies into them, and
 * swaps coverage versions in and out.
 *
 * Environments live under a work directory. A directory that was fully
 * provisioned before (it has a ready marker) is reused without
 * reinstalling, unless `wipe` is set.
 *
 * @module
 */

import { access, mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { call, type Operation } from "effection";
import { installKey, measuresCoverage, rcFilePath, renderRcFile } from "./coverage.js";
import { errorOutput, ProvisioningError } from "./errors.js";
import { createLock, type Lock } from "./lock.js";
import type { ProjectLogs } from "./logging.js";
import type { CommandRunner } from "./process.js";
import { toError } from "./result.js";
import { createShell } from "./shell.js";
import type {
  CoverageToolSpec,
  Environment,
  InterpreterSpec,
  Project,
} from "./types.js";

const READY_MARKER = ".covbench-ready";

export type EntryState =
  | { status: "empty" }
  | { status: "ready"; env: Environment }
  | { status: "failed"; error: ProvisioningError };

export interface RegistryEntry {
  readonly key: string;
  readonly lock: Lock;
  state: EntryState;
}

/**
 * Counters for observing provisioning work.
 */
export interface RegistryStats {
  /** Environments created and installed from scratch */
  provisioned: number;
  /** Environments found ready on disk and reused */
  reused: number;
  /** `ensure` calls answered from the registry */
  hits: number;
  /** Environments whose provisioning failed */
  failed: number;
}

/**
 * Cache of environments owned by one experiment run.
 */
export interface EnvironmentRegistry {
  readonly stats: RegistryStats;
  /** The entry for a key, created empty on first use */
  entry(key: string): RegistryEntry;
  /** Ready environments */
  environments(): Environment[];
}

export function createEnvironmentRegistry(): EnvironmentRegistry {
  const entries = new Map<string, RegistryEntry>();
  const stats: RegistryStats = { provisioned: 0, reused: 0, hits: 0, failed: 0 };

  return {
    stats,
    entry(key) {
      let entry = entries.get(key);
      if (!entry) {
        entry = { key, lock: createLock(), state: { status: "empty" } };
        entries.set(key, entry);
      }
      return entry;
    },
    environments() {
      const ready: Environment[] = [];
      for (const { state } of entries.values()) {
        if (state.status === "ready") ready.push(state.env);
      }
      return ready;
    },
  };
}

/**
 * Registry key of an environment. `variant` separates environments of
 * the same project and interpreter, such as a coverage-free baseline.
 */
export function environmentKey(
  project: string,
  interpreter: string,
  variant?: string,
): string {
  return variant ? `${project}@${interpreter}+${variant}` : `${project}@${interpreter}`;
}

export interface ProvisionerOptions {
  /** Directory that holds one subdirectory per environment */
  workDir: string;
  registry: EnvironmentRegistry;
  commands: CommandRunner;
  logs: ProjectLogs;
  /** Remove existing environment directories before provisioning */
  wipe?: boolean;
  clock?: () => number;
}

export interface Provisioner {
  /**
   * Return the ready environment for (project, interpreter[, variant]),
   * provisioning it on first use. Concurrent calls for one key wait for
   * the first; later calls are answered from the registry.
   *
   * @throws ProvisioningError, also on every call after a failure
   */
  ensure(
    project: Project,
    interpreter: InterpreterSpec,
    variant?: string,
  ): Operation<Environment>;

  /**
   * Make `tool` the installed coverage version and write its rc file.
   * Must be called while holding the environment's lock. The baseline
   * installs nothing.
   *
   * @throws ProvisioningError
   */
  installCoverage(env: Environment, tool: CoverageToolSpec): Operation<void>;
}

function* exists(path: string): Operation<boolean> {
  try {
    yield* call(() => access(path));
    return true;
  } catch {
    return false;
  }
}

export function createProvisioner(opts: ProvisionerOptions): Provisioner {
  const { registry, logs } = opts;

  function* provision(
    entry: RegistryEntry,
    project: Project,
    interpreter: InterpreterSpec,
  ): Operation<Environment> {
    const log = logs.forProject(project.slug);
    const dir = join(opts.workDir, entry.key);
    const venv = join(dir, "venv");
    const env: Environment = {
      key: entry.key,
      project: project.slug,
      interpreter,
      dir,
      python: join(venv, "bin", "python"),
      shell: createShell(opts.commands, log, dir, opts.clock),
      lock: entry.lock,
      installedCoverage: null,
    };

    log.info(
      { environment: entry.key, interpreter: interpreter.description, dir },
      "provisioning environment",
    );

    if (opts.wipe) {
      yield* call(() => rm(dir, { recursive: true, force: true }));
    }

    if (yield* exists(join(dir, READY_MARKER))) {
      registry.stats.reused++;
      log.info({ environment: entry.key }, "reusing cached environment");
      return env;
    }

    yield* call(() => mkdir(dir, { recursive: true }));
    yield* env.shell.expect(interpreter.executable, ["-m", "venv", venv]);
    yield* project.prepare(env);
    yield* call(() => writeFile(join(dir, READY_MARKER), `${new Date().toISOString()}\n`));

    registry.stats.provisioned++;
    log.info({ environment: entry.key }, "environment ready");
    return env;
  }

  return {
    *ensure(project, interpreter, variant) {
      const key = environmentKey(project.slug, interpreter.slug, variant);
      const entry = registry.entry(key);

      if (entry.state.status === "ready") {
        registry.stats.hits++;
        return entry.state.env;
      }

      return yield* entry.lock.withLock(function* () {
        const state = entry.state;
        if (state.status === "ready") {
          registry.stats.hits++;
          return state.env;
        }
        if (state.status === "failed") {
          registry.stats.hits++;
          throw state.error;
        }

        try {
          const env = yield* provision(entry, project, interpreter);
          entry.state = { status: "ready", env };
          return env;
        } catch (caught: unknown) {
          const error = toError(caught);
          const failure =
            error instanceof ProvisioningError
              ? error
              : new ProvisioningError(key, error.message, errorOutput(error));
          entry.state = { status: "failed", error: failure };
          registry.stats.failed++;
          logs
            .forProject(project.slug)
            .error({ environment: key, err: failure, output: failure.output }, "provisioning failed");
          throw failure;
        }
      });
    },

    *installCoverage(env, tool) {
      if (!measuresCoverage(tool)) {
        return;
      }
      yield* call(() => writeFile(rcFilePath(env, tool), renderRcFile(tool)));
      const wanted = installKey(tool);
      if (env.installedCoverage === wanted) {
        return;
      }

      const log = logs.forProject(env.project);
      log.info({ environment: env.key, coverage: tool.slug }, "installing coverage");
      try {
        if (env.installedCoverage !== null) {
          yield* env.shell.expect(env.python, ["-m", "pip", "uninstall", "-y", "coverage"]);
          env.installedCoverage = null;
        }
        yield* env.shell.expect(env.python, ["-m", "pip", "install", "-q", ...tool.install]);
      } catch (caught: unknown) {
        const error = toError(caught);
        log.error({ environment: env.key, coverage: tool.slug, err: error }, "coverage install failed");
        throw new ProvisioningError(
          env.key,
          `installing coverage ${tool.slug}: ${error.message}`,
          errorOutput(error),
        );
      }
      env.installedCoverage = wanted;
      log.info({ environment: env.key, coverage: tool.slug }, "coverage installed");
    },
  };
}
