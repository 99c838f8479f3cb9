/**
 * Join Engine — energy ↔ weather on (date, city).
 *
 * Modes:
 *   inner  one row per key present in both masters
 *   left   one row per energy row; weather fields null when unmatched
 *
 * Coordinates always come from the city directory, so left-mode rows without
 * weather still carry lat/lon. Timezone prefers the weather row; unmatched
 * rows fall back to the directory, never to the energy-side column.
 */

import { lookupCity } from "../cities/normalizer.js";
import type { Cell, JoinMode, JoinedRow, MasterRow, Table } from "../shared/types.js";

export const MERGED_COLUMNS = [
  "date",
  "city",
  "energy_demand_MW",
  "temp_max_F",
  "temp_min_F",
  "precipitation",
  "temp_avg",
  "weather_available",
  "lat",
  "lon",
  "timezone",
] as const;

export interface JoinStats {
  mode: JoinMode;
  energyRows: number;
  weatherRows: number;
  matched: number;
  emitted: number;
}

function numberOrNull(value: Cell | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

/** Mean of max and min; null unless both are numbers. */
export function temperatureAverage(max: number | null, min: number | null): number | null {
  if (max === null || min === null) return null;
  return (max + min) / 2;
}

function joinKey(date: string, city: string): string {
  return `${date}\u0000${city}`;
}

export function joinMasters(
  energy: readonly MasterRow[],
  weather: readonly MasterRow[],
  mode: JoinMode
): { rows: JoinedRow[]; stats: JoinStats } {
  const weatherByKey = new Map<string, MasterRow>();
  for (const row of weather) {
    weatherByKey.set(joinKey(row.date, row.city), row);
  }

  const rows: JoinedRow[] = [];
  let matched = 0;

  for (const e of energy) {
    const w = weatherByKey.get(joinKey(e.date, e.city));
    if (w) matched++;
    if (!w && mode === "inner") continue;

    const meta = lookupCity(e.city);
    const tempMax = numberOrNull(w?.values.temp_max_F);
    const tempMin = numberOrNull(w?.values.temp_min_F);
    const tempAvg = temperatureAverage(tempMax, tempMin);
    const weatherTimezone = w?.values.timezone;

    rows.push(
      Object.freeze({
        date: e.date,
        city: e.city,
        energy_demand_MW: numberOrNull(e.values.energy_demand_MW),
        temp_max_F: tempMax,
        temp_min_F: tempMin,
        precipitation: numberOrNull(w?.values.precipitation),
        temp_avg: tempAvg,
        weather_available: tempAvg !== null,
        lat: meta.lat,
        lon: meta.lon,
        timezone: typeof weatherTimezone === "string" ? weatherTimezone : meta.timezone,
      })
    );
  }

  return {
    rows,
    stats: {
      mode,
      energyRows: energy.length,
      weatherRows: weather.length,
      matched,
      emitted: rows.length,
    },
  };
}

export function joinedRowsToTable(rows: readonly JoinedRow[]): Table {
  return {
    columns: [...MERGED_COLUMNS],
    rows: rows.map((r) => ({ ...r })),
  };
}
