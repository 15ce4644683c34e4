/**
 * Commands bound to a working directory and a project log.
 *
 * @module
 */

import type { Operation } from "effection";
import { CommandError } from "./errors.js";
import type { Logger } from "./logging.js";
import {
  formatCommand,
  type CommandResult,
  type CommandRunner,
  type ExecOptions,
} from "./process.js";
import type { Shell } from "./types.js";

/**
 * Create a shell that runs commands in `cwd` (unless overridden) and
 * logs each command before it starts and after it exits, with its
 * captured output at debug level.
 */
export function createShell(
  commands: CommandRunner,
  log: Logger,
  cwd: string,
  clock: () => number = () => performance.now(),
): Shell {
  function* run(
    command: string,
    args: readonly string[],
    opts: ExecOptions = {},
  ): Operation<CommandResult> {
    const line = formatCommand(command, args);
    const dir = opts.cwd ?? cwd;
    log.info({ cmd: line, cwd: dir }, "running command");
    const start = clock();
    const result = yield* commands.exec(command, args, { ...opts, cwd: dir });
    const seconds = (clock() - start) / 1000;
    log.info({ cmd: line, code: result.code, seconds }, "command finished");
    if (result.output) {
      log.debug({ cmd: line, output: result.output }, "command output");
    }
    return result;
  }

  return {
    run,
    *expect(command, args, opts) {
      const result = yield* run(command, args, opts);
      if (result.code !== 0) {
        throw new CommandError(formatCommand(command, args), result.code, result.output);
      }
      return result;
    },
  };
}
