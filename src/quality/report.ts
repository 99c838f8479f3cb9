/**
 * Quality Report Generator
 *
 * Sub-reports over one flat table:
 * - Missing values per column
 * - Outliers per column of interest, rule-based and IQR side by side
 *   (implausible readings vs statistically unusual ones)
 * - Freshness of the most recent valid date
 *
 * Argument shapes are checked first; a bad argument throws
 * InvalidInputError instead of producing a report.
 */

import { z } from "zod";

import { toUtcInstant, wholeDaysBetween } from "../shared/dates.js";
import { InvalidInputError } from "../shared/errors.js";
import { COLUMN_NOT_FOUND } from "../shared/types.js";
import type { FreshnessResult, OutlierEntry, QualityReport } from "../shared/types.js";
import { DEFAULT_FRESHNESS_DAYS } from "../shared/run_config.js";
import { countIqrOutliers } from "./stats.js";

/** Physically plausible Fahrenheit range; readings outside are rule outliers. */
export const TEMPERATURE_BOUNDS = { min: -50, max: 130 } as const;

/** Demand below this is a rule outlier. */
export const DEMAND_MIN = 0;

const TableArgSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.record(z.unknown())),
});

type TableArg = z.infer<typeof TableArgSchema>;

export interface QualityOptions {
  /** Days a dataset may lag behind `now` and still count as fresh. */
  freshnessThresholdDays?: number;
  now?: Date;
}

function isMissing(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === "number" && Number.isNaN(value));
}

// ── Missing Values ───────────────────────────────────────────────────

export function checkMissingValues(table: TableArg): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const column of table.columns) {
    counts[column] = table.rows.filter((row) => isMissing(row[column])).length;
  }
  return counts;
}

// ── Outliers ─────────────────────────────────────────────────────────

type NumericColumn = { ok: true; values: number[] } | { ok: false; message: string };

/**
 * Non-missing values of a column, provided every one is a finite number.
 */
function numericColumn(table: TableArg, column: string): NumericColumn {
  if (!table.columns.includes(column)) return { ok: false, message: COLUMN_NOT_FOUND };
  const values: number[] = [];
  for (const row of table.rows) {
    const cell = row[column];
    if (isMissing(cell)) continue;
    if (typeof cell !== "number" || !Number.isFinite(cell)) {
      return { ok: false, message: `Column ${column} is not numeric` };
    }
    values.push(cell);
  }
  return { ok: true, values };
}

function outlierEntry(
  table: TableArg,
  column: string,
  isImplausible: (v: number) => boolean
): OutlierEntry {
  const numeric = numericColumn(table, column);
  if (!numeric.ok) return numeric.message;
  return {
    rule_based: numeric.values.filter(isImplausible).length,
    iqr: countIqrOutliers(numeric.values),
  };
}

export function detectOutliers(
  table: TableArg,
  temperatureColumns: readonly string[],
  demandColumn: string
): Record<string, OutlierEntry> {
  const outliers: Record<string, OutlierEntry> = {};
  for (const column of temperatureColumns) {
    outliers[column] = outlierEntry(
      table,
      column,
      (v) => v > TEMPERATURE_BOUNDS.max || v < TEMPERATURE_BOUNDS.min
    );
  }
  outliers[demandColumn] = outlierEntry(table, demandColumn, (v) => v < DEMAND_MIN);
  return outliers;
}

// ── Freshness ────────────────────────────────────────────────────────

export function checkFreshness(
  table: TableArg,
  dateColumn: string,
  thresholdDays: number,
  now: Date
): FreshnessResult {
  const stale = (error: string): FreshnessResult => ({
    latest_date: null,
    days_ago: null,
    is_fresh: false,
    threshold_days: thresholdDays,
    error,
  });

  if (!table.columns.includes(dateColumn)) {
    return stale(`Column ${dateColumn} not found`);
  }

  let latest: number | null = null;
  for (const row of table.rows) {
    const instant = toUtcInstant(row[dateColumn]);
    if (instant !== null && (latest === null || instant > latest)) latest = instant;
  }
  if (latest === null) {
    return stale(`No valid dates in column ${dateColumn}`);
  }

  const daysAgo = wholeDaysBetween(latest, now);
  return {
    latest_date: new Date(latest).toISOString(),
    days_ago: daysAgo,
    is_fresh: daysAgo <= thresholdDays,
    threshold_days: thresholdDays,
  };
}

// ── Full Report ──────────────────────────────────────────────────────

interface CheckedArgs {
  table: TableArg;
  temperatureColumns: string[];
  demandColumn: string;
  dateColumn: string;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((c) => typeof c === "string");
}

function assertContract(
  table: unknown,
  temperatureColumns: unknown,
  demandColumn: unknown,
  dateColumn: unknown,
  options: QualityOptions
): CheckedArgs {
  const parsed = TableArgSchema.safeParse(table);
  if (!parsed.success) {
    throw new InvalidInputError("table must be { columns: string[], rows: object[] }");
  }
  if (!isStringArray(temperatureColumns)) {
    throw new InvalidInputError("temperatureColumns must be a list of column names");
  }
  if (typeof demandColumn !== "string") {
    throw new InvalidInputError("demandColumn must be a string");
  }
  if (typeof dateColumn !== "string") {
    throw new InvalidInputError("dateColumn must be a string");
  }
  const threshold = options.freshnessThresholdDays;
  if (threshold !== undefined && (!Number.isFinite(threshold) || threshold < 0)) {
    throw new InvalidInputError("freshnessThresholdDays must be a non-negative number");
  }
  return { table: parsed.data, temperatureColumns, demandColumn, dateColumn };
}

/**
 * Compile the full report. Only the argument checks throw; every data
 * problem is reported inside the result.
 */
export function generateQualityReport(
  table: unknown,
  temperatureColumns: unknown,
  demandColumn: unknown,
  dateColumn: unknown,
  options: QualityOptions = {}
): QualityReport {
  const args = assertContract(table, temperatureColumns, demandColumn, dateColumn, options);

  return {
    dataset_info: {
      rows: args.table.rows.length,
      columns: args.table.columns.length,
      column_names: [...args.table.columns],
    },
    missing_values: checkMissingValues(args.table),
    outliers: detectOutliers(args.table, args.temperatureColumns, args.demandColumn),
    freshness: checkFreshness(
      args.table,
      args.dateColumn,
      options.freshnessThresholdDays ?? DEFAULT_FRESHNESS_DAYS,
      options.now ?? new Date()
    ),
  };
}
