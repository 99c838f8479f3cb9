/**
 * Quality Report Tests
 *
 * Verifies:
 * - Missing-value counts per column
 * - Rule-based and IQR outliers side by side
 * - Freshness against an injected clock
 * - Argument checks throw InvalidInputError
 */

import { describe, it, expect } from "vitest";
import {
  generateQualityReport,
  checkMissingValues,
  detectOutliers,
  checkFreshness,
} from "../src/quality/report.js";
import { daysAgo } from "../src/shared/dates.js";
import { InvalidInputError } from "../src/shared/errors.js";
import type { Table } from "../src/shared/types.js";

const NOW = new Date(Date.UTC(2024, 4, 10, 12));

function weatherTable(): Table {
  return {
    columns: ["date", "city", "temp_max_F", "temp_min_F"],
    rows: [
      { date: "2024-05-01", city: "Chicago", temp_max_F: 70, temp_min_F: 50 },
      { date: "2024-05-02", city: "Chicago", temp_max_F: 135, temp_min_F: null },
      { date: "2024-05-03", city: "Chicago", temp_max_F: 65, temp_min_F: 45 },
    ],
  };
}

describe("checkMissingValues", () => {
  it("counts null, undefined and NaN", () => {
    const table: Table = {
      columns: ["a", "b"],
      rows: [{ a: null, b: 1 }, { a: NaN, b: 2 }, { b: 3 }],
    };
    expect(checkMissingValues(table)).toEqual({ a: 3, b: 0 });
  });
});

describe("detectOutliers", () => {
  it("flags implausible temperatures", () => {
    const outliers = detectOutliers(weatherTable(), ["temp_max_F"], "energy_demand_MW");
    expect(outliers.temp_max_F).toEqual({ rule_based: 1, iqr: 0 });
  });

  it("flags negative demand", () => {
    const table: Table = {
      columns: ["energy_demand_MW"],
      rows: [{ energy_demand_MW: 20000 }, { energy_demand_MW: 25000 }, { energy_demand_MW: -100 }],
    };
    expect(detectOutliers(table, [], "energy_demand_MW")).toEqual({
      energy_demand_MW: { rule_based: 1, iqr: 0 },
    });
  });

  it("counts IQR outliers independently of the rules", () => {
    const table: Table = {
      columns: ["energy_demand_MW"],
      rows: [10, 11, 12, 13, 100].map((v) => ({ energy_demand_MW: v })),
    };
    expect(detectOutliers(table, [], "energy_demand_MW").energy_demand_MW).toEqual({ rule_based: 0, iqr: 1 });
  });

  it("reports absent and non-numeric columns", () => {
    const outliers = detectOutliers(weatherTable(), ["temp_avg"], "city");
    expect(outliers).toEqual({
      temp_avg: "Column not found",
      city: "Column city is not numeric",
    });
  });
});

describe("checkFreshness", () => {
  const table = (dates: string[]): Table => ({
    columns: ["date"],
    rows: dates.map((date) => ({ date })),
  });

  it("is fresh at exactly the threshold", () => {
    const result = checkFreshness(table([daysAgo(NOW, 5), daysAgo(NOW, 2)]), "date", 2, NOW);
    expect(result).toEqual({
      latest_date: "2024-05-08T00:00:00.000Z",
      days_ago: 2,
      is_fresh: true,
      threshold_days: 2,
    });
  });

  it("is stale one day past the threshold", () => {
    const result = checkFreshness(table([daysAgo(NOW, 3)]), "date", 2, NOW);
    expect(result.days_ago).toBe(3);
    expect(result.is_fresh).toBe(false);
  });

  it("reports a missing date column instead of throwing", () => {
    expect(checkFreshness(weatherTable(), "timestamp", 2, NOW)).toEqual({
      latest_date: null,
      days_ago: null,
      is_fresh: false,
      threshold_days: 2,
      error: "Column timestamp not found",
    });
  });

  it("reports a column with no valid dates", () => {
    const result = checkFreshness(table(["soon", ""]), "date", 2, NOW);
    expect(result.error).toBe("No valid dates in column date");
    expect(result.is_fresh).toBe(false);
  });
});

describe("generateQualityReport", () => {
  it("assembles all sub-reports", () => {
    const report = generateQualityReport(
      weatherTable(),
      ["temp_min_F", "temp_max_F"],
      "energy_demand_MW",
      "date",
      { now: NOW }
    );
    expect(report.dataset_info).toEqual({
      rows: 3,
      columns: 4,
      column_names: ["date", "city", "temp_max_F", "temp_min_F"],
    });
    expect(report.missing_values).toEqual({ date: 0, city: 0, temp_max_F: 0, temp_min_F: 1 });
    expect(report.outliers).toEqual({
      temp_min_F: { rule_based: 0, iqr: 0 },
      temp_max_F: { rule_based: 1, iqr: 0 },
      energy_demand_MW: "Column not found",
    });
    expect(report.freshness.days_ago).toBe(7);
    expect(report.freshness.threshold_days).toBe(2);
    expect(report.freshness.is_fresh).toBe(false);
  });

  it("rejects a malformed table", () => {
    expect(() => generateQualityReport("not a table", [], "d", "date")).toThrow(InvalidInputError);
  });

  it("rejects non-list temperature columns", () => {
    expect(() => generateQualityReport(weatherTable(), "temp_max_F", "d", "date")).toThrow(
      "temperatureColumns must be a list of column names"
    );
  });

  it("rejects non-string column names", () => {
    expect(() => generateQualityReport(weatherTable(), [], 5, "date")).toThrow(InvalidInputError);
    expect(() => generateQualityReport(weatherTable(), [], "d", null)).toThrow(InvalidInputError);
  });

  it("rejects a negative threshold", () => {
    expect(() =>
      generateQualityReport(weatherTable(), [], "d", "date", { freshnessThresholdDays: -1 })
    ).toThrow(InvalidInputError);
  });
});
