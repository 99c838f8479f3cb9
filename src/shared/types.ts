/** The two raw data domains the pipeline reconciles. */
export type Kind = "energy" | "weather";

export const KINDS: readonly Kind[] = ["energy", "weather"];

/** A single table cell after coercion. */
export type Cell = string | number | boolean | null;

/** Flat table: ordered column names plus row objects keyed by column. */
export interface Table {
  columns: string[];
  rows: Record<string, Cell>[];
}

// ── Records ──────────────────────────────────────────────────────────

/** One parsed row from a raw file. Frozen once created. */
export interface RawRecord {
  readonly kind: Kind;
  readonly city: string;
  /** Calendar date, YYYY-MM-DD. */
  readonly date: string;
  readonly values: Readonly<Record<string, Cell>>;
}

/** Durable unit of a MasterStore, unique per (city, date) within its kind. */
export interface MasterRow {
  readonly city: string;
  readonly date: string;
  readonly values: Readonly<Record<string, Cell>>;
}

export type JoinMode = "inner" | "left";

export interface JoinedRow {
  readonly date: string;
  readonly city: string;
  readonly energy_demand_MW: number | null;
  readonly temp_max_F: number | null;
  readonly temp_min_F: number | null;
  readonly precipitation: number | null;
  readonly temp_avg: number | null;
  readonly weather_available: boolean;
  readonly lat: number | null;
  readonly lon: number | null;
  readonly timezone: string;
}

// ── Quality Report ───────────────────────────────────────────────────

export const COLUMN_NOT_FOUND = "Column not found";

export interface OutlierCounts {
  rule_based: number;
  iqr: number;
}

/** Counts, or a sentinel message when the column is absent or not numeric. */
export type OutlierEntry = OutlierCounts | string;

export interface FreshnessResult {
  latest_date: string | null;
  days_ago: number | null;
  is_fresh: boolean;
  threshold_days: number;
  error?: string;
}

export interface DatasetInfo {
  rows: number;
  columns: number;
  column_names: string[];
}

export interface QualityReport {
  dataset_info: DatasetInfo;
  missing_values: Record<string, number>;
  outliers: Record<string, OutlierEntry>;
  freshness: FreshnessResult;
}
