/**
 * Parsing of coverage report totals.
 *
 * @module
 */

import type { CoverageSummary } from "../lib/types.js";

const TOTAL_LINE = /^TOTAL\s+(\d+)\s+(\d+)(?:\s+\d+\s+\d+)?\s+(\d+(?:\.\d+)?)%\s*$/;

/**
 * Parse the TOTAL line of a `coverage report` table.
 *
 * Handles statement-only reports (`TOTAL  stmts  miss  cover`) and
 * branch reports (`TOTAL  stmts  miss  branch  brpart  cover`).
 * Returns null if the text has no TOTAL line.
 */
export function parseCoverageTotal(text: string): CoverageSummary | null {
  const lines = text.split(/\r?\n/).reverse();
  for (const line of lines) {
    const match = line.trim().match(TOTAL_LINE);
    if (match) {
      return {
        statements: parseInt(match[1], 10),
        missing: parseInt(match[2], 10),
        percent: parseFloat(match[3]),
      };
    }
  }
  return null;
}
