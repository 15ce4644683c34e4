/**
 * Command dispatcher for the benchmark CLI.
 *
 * Each command parses its own options.
 *
 * @module
 */

import type { Operation } from "effection";
import { cleanCommand } from "./clean.js";
import { helpCommand } from "./help.js";
import { reportCommand } from "./report.js";
import { runCommand } from "./run.js";

/**
 * Command handler signature.
 * Takes remaining args after the command name, returns exit code.
 */
export type CommandHandler = (args: string[]) => Operation<number>;

const commands: Record<string, CommandHandler> = {
  run: runCommand,
  report: reportCommand,
  clean: cleanCommand,
  help: helpCommand,
};

/**
 * Dispatch to the appropriate command handler.
 *
 * @param args - CLI arguments (e.g., ["run", "--config", "sample.json"])
 * @returns Exit code
 */
export function* dispatch(args: string[]): Operation<number> {
  const [command, ...rest] = args;

  if (!command || command === "help" || command === "--help" || command === "-h") {
    return yield* helpCommand(rest);
  }

  if (rest.includes("--help") || rest.includes("-h")) {
    return yield* helpCommand([command]);
  }

  const handler = commands[command];
  if (!handler) {
    console.error(`Unknown command: ${command}`);
    console.log();
    yield* helpCommand([]);
    return 1;
  }

  return yield* handler(rest);
}
