import { describe, it, expect } from "vitest";
import { joinMasters, joinedRowsToTable, temperatureAverage, MERGED_COLUMNS } from "../src/join/engine.js";
import type { Cell, MasterRow } from "../src/shared/types.js";

function row(city: string, date: string, values: Record<string, Cell>): MasterRow {
  return { city, date, values };
}

const energy: MasterRow[] = [
  row("New York", "2024-05-01", { energy_demand_MW: 100, timezone: "Eastern" }),
  row("New York", "2024-05-02", { energy_demand_MW: 200, timezone: "Eastern" }),
  row("Chicago", "2024-05-01", { energy_demand_MW: 300, timezone: "Central" }),
];

const weather: MasterRow[] = [
  row("New York", "2024-05-01", {
    temp_max_F: 80,
    temp_min_F: 60,
    precipitation: 0,
    timezone: "America/New_York",
  }),
  row("Chicago", "2024-05-02", {
    temp_max_F: 70,
    temp_min_F: 50,
    precipitation: 0.3,
    timezone: "America/Chicago",
  }),
];

describe("temperatureAverage", () => {
  it("averages max and min", () => {
    expect(temperatureAverage(70, 50)).toBe(60);
  });

  it("is null when either side is missing", () => {
    expect(temperatureAverage(null, 50)).toBeNull();
    expect(temperatureAverage(70, null)).toBeNull();
  });
});

describe("joinMasters — inner", () => {
  it("emits only keys present on both sides", () => {
    const { rows, stats } = joinMasters(energy, weather, "inner");
    expect(rows).toEqual([
      {
        date: "2024-05-01",
        city: "New York",
        energy_demand_MW: 100,
        temp_max_F: 80,
        temp_min_F: 60,
        precipitation: 0,
        temp_avg: 70,
        weather_available: true,
        lat: 40.7128,
        lon: -74.006,
        timezone: "America/New_York",
      },
    ]);
    expect(stats).toEqual({ mode: "inner", energyRows: 3, weatherRows: 2, matched: 1, emitted: 1 });
  });
});

describe("joinMasters — left", () => {
  it("keeps every energy row in energy order", () => {
    const { rows, stats } = joinMasters(energy, weather, "left");
    expect(rows.map((r) => `${r.city}|${r.date}`)).toEqual([
      "New York|2024-05-01",
      "New York|2024-05-02",
      "Chicago|2024-05-01",
    ]);
    expect(stats.emitted).toBe(3);
    expect(stats.matched).toBe(1);
  });

  it("null-fills unmatched rows and takes timezone from the directory", () => {
    const { rows } = joinMasters(energy, weather, "left");
    expect(rows[1]).toEqual({
      date: "2024-05-02",
      city: "New York",
      energy_demand_MW: 200,
      temp_max_F: null,
      temp_min_F: null,
      precipitation: null,
      temp_avg: null,
      weather_available: false,
      lat: 40.7128,
      lon: -74.006,
      timezone: "America/New_York",
    });
    expect(rows[2].timezone).toBe("America/Chicago");
  });

  it("gives unknown cities null coordinates", () => {
    const { rows } = joinMasters([row("Atlantis", "2024-05-01", { energy_demand_MW: 5 })], [], "left");
    expect(rows[0]).toMatchObject({ lat: null, lon: null, timezone: "Unknown" });
  });
});

describe("weather_available", () => {
  it("is false when only one temperature is present", () => {
    const partial = [row("New York", "2024-05-01", { temp_max_F: 80, temp_min_F: null, timezone: "America/New_York" })];
    const { rows } = joinMasters(energy.slice(0, 1), partial, "inner");
    expect(rows[0].temp_avg).toBeNull();
    expect(rows[0].weather_available).toBe(false);
  });
});

describe("joinedRowsToTable", () => {
  it("uses the merged column order", () => {
    const table = joinedRowsToTable(joinMasters(energy, weather, "inner").rows);
    expect(table.columns).toEqual([...MERGED_COLUMNS]);
    expect(table.rows[0].temp_avg).toBe(70);
  });
});
