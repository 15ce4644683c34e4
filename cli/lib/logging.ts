/**
 * Loggers.
 *
 * Each project gets its own append-only log file. Records are written
 * synchronously, one line per write, so output from projects that are
 * provisioned concurrently never interleaves mid-line.
 *
 * @module
 */

import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { destination, pino, type DestinationStream, type Logger } from "pino";

export type { Logger } from "pino";

/**
 * Per-project log sink.
 */
export interface ProjectLogs {
  /** Logger for a project, created on first use */
  forProject(slug: string): Logger;
  /** Path of a project's log file, if it has one */
  pathOf(slug: string): string | undefined;
  /** Flush pending writes */
  flush(): void;
}

/**
 * Project logs written to `<dir>/<slug>.log`.
 */
export function createProjectLogs(dir: string, level = "debug"): ProjectLogs {
  mkdirSync(dir, { recursive: true });
  const loggers = new Map<string, Logger>();

  return {
    forProject(slug) {
      let logger = loggers.get(slug);
      if (!logger) {
        const file = destination({
          dest: join(dir, `${slug}.log`),
          append: true,
          sync: true,
        });
        logger = pino({ level, base: { project: slug } }, file);
        loggers.set(slug, logger);
      }
      return logger;
    },
    pathOf(slug) {
      return join(dir, `${slug}.log`);
    },
    flush() {
      for (const logger of loggers.values()) {
        logger.flush();
      }
    },
  };
}

/**
 * Project logs sharing one destination stream. Used for stdout and tests.
 */
export function createStreamProjectLogs(
  stream: DestinationStream,
  level = "debug",
): ProjectLogs {
  const root = pino({ level, base: null }, stream);
  const loggers = new Map<string, Logger>();

  return {
    forProject(slug) {
      let logger = loggers.get(slug);
      if (!logger) {
        logger = root.child({ project: slug });
        loggers.set(slug, logger);
      }
      return logger;
    },
    pathOf() {
      return undefined;
    },
    flush() {
      root.flush();
    },
  };
}

/**
 * Experiment-level logger.
 */
export function createExperimentLogger(level = "info"): Logger {
  return pino({ level, base: null, name: "covbench" });
}

/**
 * A logger that discards everything.
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
