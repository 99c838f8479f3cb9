/**
 * Schema Map — Declarative column healing for raw and persisted rows.
 *
 * Each kind has a fixed set of canonical columns. Raw files arrive with
 * typos, legacy names and upstream API field names; the synonym table maps
 * them onto canonical names. A synonym is only used when the canonical
 * column itself is absent, and earlier synonyms take priority.
 */

import type { Cell, Kind } from "../shared/types.js";

export type ColumnType = "number" | "string";

export interface CanonicalColumn {
  name: string;
  type: ColumnType;
}

export const CANONICAL_COLUMNS: Readonly<Record<Kind, readonly CanonicalColumn[]>> = {
  energy: [
    { name: "energy_demand_MW", type: "number" },
    { name: "respondent", type: "string" },
    { name: "respondent_name", type: "string" },
    { name: "timezone", type: "string" },
  ],
  weather: [
    { name: "temp_max_F", type: "number" },
    { name: "temp_min_F", type: "number" },
    { name: "precipitation", type: "number" },
    { name: "timezone", type: "string" },
  ],
};

/** Alternative names by canonical column, in priority order. */
export const COLUMN_SYNONYMS: Readonly<Record<Kind, Readonly<Record<string, readonly string[]>>>> = {
  energy: {
    energy_demand_MW: [
      "demand",
      "demand_mw",
      "load",
      "consumption",
      "value",
    ],
    respondent: ["respondent_id", "region_code"],
    respondent_name: ["respondent-name", "responndent-name", "responndent_name"],
    timezone: ["time_zone"],
  },
  weather: {
    temp_max_F: ["tempp_max_F", "TMAX", "temp_max", "max_temp_f"],
    temp_min_F: ["TMIN", "temp_min", "min_temp_f"],
    precipitation: ["PRCP", "precip", "precipitation_in"],
    timezone: ["time_zone"],
  },
};

/** Columns removed outright, whatever their content. */
export const DROPPED_COLUMNS: Readonly<Record<Kind, readonly string[]>> = {
  energy: ["timezone-description"],
  weather: [],
};

/** Source header → canonical column, computed once per file. */
export type ColumnPlan = ReadonlyMap<string, string>;

/**
 * Decide which source header feeds each canonical column.
 * Matching is case-insensitive; the canonical name itself always wins.
 */
export function planColumnHealing(kind: Kind, headers: readonly string[]): ColumnPlan {
  const dropped = new Set(DROPPED_COLUMNS[kind].map((c) => c.toLowerCase()));
  const byLower = new Map<string, string>();
  for (const header of headers) {
    const lower = header.trim().toLowerCase();
    if (dropped.has(lower) || byLower.has(lower)) continue;
    byLower.set(lower, header);
  }

  const plan = new Map<string, string>();
  for (const column of CANONICAL_COLUMNS[kind]) {
    const candidates = [column.name, ...(COLUMN_SYNONYMS[kind][column.name] ?? [])];
    for (const candidate of candidates) {
      const source = byLower.get(candidate.toLowerCase());
      if (source !== undefined && !plan.has(source)) {
        plan.set(source, column.name);
        break;
      }
    }
  }
  return plan;
}

export type CoercionResult =
  | { ok: true; values: Record<string, Cell> }
  | { ok: false; column: string; value: unknown };

function coerceNumber(value: unknown): number | null | undefined {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string") {
    const v = value.trim();
    if (v === "" || v.toLowerCase() === "nan") return null;
    const n = Number(v);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function coerceString(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") {
    const v = value.trim();
    return v === "" ? null : v;
  }
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

/**
 * Rename a raw row through the plan and coerce every canonical column.
 * Canonical columns the row lacks come out as null. A present value that
 * cannot be read as a number fails the whole row.
 */
export function healAndCoerce(
  kind: Kind,
  raw: Readonly<Record<string, unknown>>,
  plan: ColumnPlan
): CoercionResult {
  const renamed: Record<string, unknown> = {};
  for (const [source, target] of plan) {
    renamed[target] = raw[source];
  }

  const values: Record<string, Cell> = {};
  for (const column of CANONICAL_COLUMNS[kind]) {
    const value = renamed[column.name];
    if (column.type === "number") {
      const n = coerceNumber(value);
      if (n === undefined) return { ok: false, column: column.name, value };
      values[column.name] = n;
    } else {
      values[column.name] = coerceString(value);
    }
  }
  return { ok: true, values };
}

/** Snapshot column order: key columns first, then the kind's canonical columns. */
export function snapshotColumns(kind: Kind): string[] {
  return ["date", "city", ...CANONICAL_COLUMNS[kind].map((c) => c.name)];
}
