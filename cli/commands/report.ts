/**
 * report command implementation.
 *
 * Re-renders the report of a saved results file.
 *
 * @module
 */

import type { Operation } from "effection";
import { z } from "zod";
import { Configliere } from "configliere";
import { buildReport, renderReport } from "../lib/report.js";
import { readResultsFile, type ResultsFileContents } from "../lib/results.js";
import { toError } from "../lib/result.js";
import { aggregateAll, summarizeRuns } from "../lib/stats.js";

const configliere = new Configliere({
  json: {
    schema: z.boolean(),
    default: false,
    description: "Print the report as JSON",
    cli: { switch: true },
  },
  stdev: {
    schema: z.boolean(),
    default: false,
    description: "Show standard deviations in the table",
    cli: { switch: true },
  },
});

/**
 * Render the report of a results file.
 */
export function* reportCommand(args: string[]): Operation<number> {
  // every option is a switch, so any other argument is the results file
  const [path, ...extra] = args.filter((arg) => !arg.startsWith("-"));
  const parseResult = configliere.parse({
    args: args.filter((arg) => arg.startsWith("-")),
  });

  if (!parseResult.ok) {
    console.error("Error parsing arguments:");
    console.error(parseResult.summary);
    return 1;
  }

  if (!path) {
    console.error("Missing results file");
    return 1;
  }
  if (extra.length > 0) {
    console.error(`Unexpected arguments: ${extra.join(" ")}`);
    return 1;
  }

  let loaded: ResultsFileContents;
  try {
    loaded = yield* readResultsFile(path);
  } catch (e) {
    console.error(toError(e).message);
    return 1;
  }

  const report = buildReport(loaded.layout, aggregateAll(loaded.results));
  const { passed, attempted } = summarizeRuns(loaded.results);

  if (parseResult.config.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    const { metadata } = loaded.file;
    console.log(`${metadata.name} (${metadata.timestamp}, ${metadata.runner.os}/${metadata.runner.arch})\n`);
    console.log(renderReport(report, { stdev: parseResult.config.stdev }));
    console.log(`\n${passed}/${attempted} runs succeeded`);
  }

  return 0;
}
