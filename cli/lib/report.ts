/**
 * Pivot tables of cell statistics.
 *
 * A report has one row per combination of the row dimensions' values
 * and one column per value of the column dimension, followed by one
 * column per ratio. Ratios are `numerator / denominator` of the two
 * columns' medians, kept at full precision and shown as percentages.
 *
 * @module
 */

import { cellId } from "./matrix.js";
import type { Dimension } from "./schema.js";
import type { CellKey, CellOutcome, ReportLayout } from "./types.js";

/**
 * Marker shown for cells with no successful runs.
 */
export const NO_DATA = "no data";

/**
 * One table cell's numbers.
 */
export interface ReportCell {
  median: number;
  stdev: number;
  samples: number;
  attempted: number;
}

/**
 * A flat statistic record for downstream tooling. `median` and `stdev`
 * are null when the cell had no successful runs.
 */
export interface StatRecord {
  row: Partial<Record<Dimension, string>>;
  column: string;
  median: number | null;
  stdev: number | null;
  samples: number;
  attempted: number;
}

/**
 * A flat ratio record. `value` is a fraction (0.88 means 88%), null
 * when either side has no data.
 */
export interface RatioRecord {
  row: Partial<Record<Dimension, string>>;
  label: string;
  numerator: string;
  denominator: string;
  value: number | null;
}

export interface ReportRow {
  /** Values of the row dimensions, in `rows` order */
  key: string[];
  /** One entry per column value, null for no data */
  cells: (ReportCell | null)[];
  /** One entry per ratio, null when a side has no data */
  ratios: (number | null)[];
}

export interface Report {
  rowDimensions: Dimension[];
  columnDimension: Dimension;
  columns: string[];
  ratioLabels: string[];
  rows: ReportRow[];
  records: StatRecord[];
  ratios: RatioRecord[];
}

function product(lists: string[][]): string[][] {
  return lists.reduce<string[][]>(
    (acc, values) => acc.flatMap((prefix) => values.map((v) => [...prefix, v])),
    [[]],
  );
}

/**
 * Resolve the cell key for a table position. A dimension that is in
 * neither the rows nor the column has exactly one value.
 */
function keyFor(
  layout: ReportLayout,
  rowValues: string[],
  columnValue: string,
): CellKey {
  const pick = (dimension: Dimension): string => {
    if (dimension === layout.column) return columnValue;
    const index = layout.rows.indexOf(dimension);
    return index >= 0 ? rowValues[index] : layout.dimensions[dimension][0];
  };
  return {
    project: pick("project"),
    interpreter: pick("interpreter"),
    coverage: pick("coverage"),
  };
}

function rowRecord(
  layout: ReportLayout,
  rowValues: string[],
): Partial<Record<Dimension, string>> {
  const row: Partial<Record<Dimension, string>> = {};
  layout.rows.forEach((dimension, i) => {
    row[dimension] = rowValues[i];
  });
  return row;
}

/**
 * Pivot per-cell outcomes into a report.
 */
export function buildReport(
  layout: ReportLayout,
  outcomes: ReadonlyMap<string, CellOutcome>,
): Report {
  const columns = layout.dimensions[layout.column];
  const rowKeys = product(layout.rows.map((d) => layout.dimensions[d]));
  const rows: ReportRow[] = [];
  const records: StatRecord[] = [];
  const ratios: RatioRecord[] = [];

  for (const key of rowKeys) {
    const row = rowRecord(layout, key);
    const byColumn = new Map<string, ReportCell | null>();

    for (const column of columns) {
      const outcome = outcomes.get(cellId(keyFor(layout, key, column)));
      let cell: ReportCell | null = null;
      if (outcome?.ok) {
        const { median, stdev, samples, attempted } = outcome.statistic;
        cell = { median, stdev, samples, attempted };
      }
      byColumn.set(column, cell);
      records.push({
        row,
        column,
        median: cell ? cell.median : null,
        stdev: cell ? cell.stdev : null,
        samples: cell ? cell.samples : 0,
        attempted: outcome ? (outcome.ok ? outcome.statistic.attempted : outcome.attempted) : 0,
      });
    }

    const ratioValues = layout.ratios.map((ratio) => {
      const numerator = byColumn.get(ratio.numerator);
      const denominator = byColumn.get(ratio.denominator);
      const value =
        numerator && denominator && denominator.median > 0
          ? numerator.median / denominator.median
          : null;
      ratios.push({
        row,
        label: ratio.label,
        numerator: ratio.numerator,
        denominator: ratio.denominator,
        value,
      });
      return value;
    });

    rows.push({
      key,
      cells: columns.map((c) => byColumn.get(c) ?? null),
      ratios: ratioValues,
    });
  }

  return {
    rowDimensions: [...layout.rows],
    columnDimension: layout.column,
    columns: [...columns],
    ratioLabels: layout.ratios.map((r) => r.label),
    rows,
    records,
    ratios,
  };
}

/**
 * Format a duration cell: "77.815s", with "(n/m)" when some runs failed.
 */
export function formatCell(cell: ReportCell | null, showStdev = false): string {
  if (!cell) return NO_DATA;
  let text = `${cell.median.toFixed(3)}s`;
  if (showStdev) {
    text += ` ±${cell.stdev.toFixed(3)}`;
  }
  if (cell.samples < cell.attempted) {
    text += ` (${cell.samples}/${cell.attempted})`;
  }
  return text;
}

/**
 * Format a ratio as a whole percentage: 0.8774 becomes "88%".
 */
export function formatRatio(value: number | null): string {
  return value === null ? NO_DATA : `${Math.round(value * 100)}%`;
}

export interface RenderOptions {
  /** Show the standard deviation next to each median */
  stdev?: boolean;
}

/**
 * Render a report as an aligned text table: a header, a rule, and one
 * line per row. Text columns are left-aligned, numbers right-aligned.
 */
export function renderReport(report: Report, opts: RenderOptions = {}): string {
  const header = [
    ...report.rowDimensions,
    ...report.columns,
    ...report.ratioLabels,
  ];
  const body = report.rows.map((row) => [
    ...row.key,
    ...row.cells.map((c) => formatCell(c, opts.stdev)),
    ...row.ratios.map(formatRatio),
  ]);

  const widths = header.map((h, i) =>
    Math.max(h.length, ...body.map((line) => line[i].length)),
  );
  const keyCount = report.rowDimensions.length;
  const align = (text: string, i: number) =>
    i < keyCount ? text.padEnd(widths[i]) : text.padStart(widths[i]);

  const lines = [
    header.map(align).join("  "),
    widths.map((w) => "-".repeat(w)).join("  "),
    ...body.map((line) => line.map(align).join("  ")),
  ];
  return lines.map((l) => l.trimEnd()).join("\n");
}
