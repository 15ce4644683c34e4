#!/usr/bin/env node
/**
 * Coverage benchmark CLI entry point.
 *
 * Uses Effection's main() to run the entire CLI inside one root scope.
 *
 * @module
 */

import { exit, main } from "effection";
import { dispatch } from "./commands/mod.js";

await main(function* () {
  const code = yield* dispatch(process.argv.slice(2));
  yield* exit(code);
});
