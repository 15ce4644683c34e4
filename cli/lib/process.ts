/**
 * Subprocess execution.
 *
 * Commands run as scoped operations: if the calling operation is
 * halted (a timeout, Ctrl-C, a failed sibling), the child process is
 * killed before the scope exits.
 *
 * @module
 */

import { call, type Operation } from "effection";
import { execa } from "execa";

/**
 * Options for a single command.
 */
export interface ExecOptions {
  /** Working directory */
  cwd?: string;
  /** Variables added to the inherited environment */
  env?: Record<string, string>;
}

/**
 * Result of a finished command.
 */
export interface CommandResult {
  /** Exit code, -1 when the process could not be started or was killed */
  code: number;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved as the process wrote them */
  output: string;
}

/**
 * Executes external commands. The harness talks to processes only
 * through this interface so tests can substitute an in-process fake.
 */
export interface CommandRunner {
  exec(
    command: string,
    args: readonly string[],
    opts?: ExecOptions,
  ): Operation<CommandResult>;
}

/**
 * Format a command line for logs and error messages.
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}

/**
 * Run a command with execa, capturing output and never rejecting on a
 * non-zero exit.
 */
export function* execProcess(
  command: string,
  args: readonly string[],
  opts: ExecOptions = {},
): Operation<CommandResult> {
  const child = execa(command, [...args], {
    cwd: opts.cwd,
    env: opts.env,
    reject: false,
    all: true,
  });

  try {
    const result = yield* call(async () => await child);
    const output = result.all ?? `${result.stdout}${result.stderr}`;
    return {
      code: typeof result.exitCode === "number" ? result.exitCode : -1,
      stdout: result.stdout,
      stderr: result.stderr,
      output:
        result.failed && output === ""
          ? `${result.command}: process failed to start or was killed`
          : output,
    };
  } finally {
    if (child.exitCode === null && !child.killed) {
      child.kill();
    }
  }
}

/**
 * The CommandRunner backed by real subprocesses.
 */
export const processRunner: CommandRunner = {
  exec: execProcess,
};
