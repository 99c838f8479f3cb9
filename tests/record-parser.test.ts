import { describe, it, expect } from "vitest";
import { parseRawFile, extractJsonRows } from "../src/ingest/parser.js";
import type { ParseOutcome, ParsedFile } from "../src/ingest/parser.js";

function expectParsed(outcome: ParseOutcome): ParsedFile {
  if (outcome.status !== "parsed") {
    throw new Error(`expected parsed, got ${outcome.reason}: ${outcome.message}`);
  }
  return outcome;
}

describe("parseRawFile — CSV", () => {
  const csv = [
    "date,value,responndent-name,timezone-description,timezone",
    "2024-05-01,20000,NYIS,Eastern Time,Eastern",
    "2024-05-02,,NYIS,Eastern Time,Eastern",
    "2024-05-03,abc,NYIS,Eastern Time,Eastern",
    "bad,1,NYIS,Eastern Time,Eastern",
  ].join("\n");

  it("heals columns and takes city from the file name", () => {
    const parsed = expectParsed(parseRawFile({ path: "raw/energy_new york_2024-05-01.csv", content: csv }));
    expect(parsed.kind).toBe("energy");
    expect(parsed.city).toBe("New York");
    expect(parsed.dateSource).toBe("date");
    expect(parsed.records[0]).toEqual({
      kind: "energy",
      city: "New York",
      date: "2024-05-01",
      values: { energy_demand_MW: 20000, respondent: null, respondent_name: "NYIS", timezone: "Eastern" },
    });
  });

  it("keeps blank values as null and drops bad rows", () => {
    const parsed = expectParsed(parseRawFile({ path: "raw/energy_new york_2024-05-01.csv", content: csv }));
    expect(parsed.records.map((r) => r.date)).toEqual(["2024-05-01", "2024-05-02"]);
    expect(parsed.records[1].values.energy_demand_MW).toBeNull();
    expect(parsed.dropped).toEqual({ invalidDate: 1, invalidValue: 1 });
    expect(parsed.warnings).toEqual([
      "1 row(s) dropped: unparseable date",
      "1 row(s) dropped: non-numeric value",
    ]);
  });

  it("stamps weather rows with the directory timezone", () => {
    const content = "date,tempp_max_F,temp_min_F,precipitation,timezone\n2024-05-01,70,50,0.2,UTC\n";
    const parsed = expectParsed(parseRawFile({ path: "weather_seattle_2024-05-01.csv", content }));
    expect(parsed.records[0].values).toEqual({
      temp_max_F: 70,
      temp_min_F: 50,
      precipitation: 0.2,
      timezone: "America/Los_Angeles",
    });
  });

  it("strips a byte order mark from buffers", () => {
    const content = Buffer.from("\uFEFFdate,value\n2024-05-01,10\n", "utf-8");
    const parsed = expectParsed(parseRawFile({ path: "energy_chicago_2024-05-01.csv", content }));
    expect(parsed.records).toHaveLength(1);
    expect(parsed.records[0].values.energy_demand_MW).toBe(10);
  });

  it("falls back to period when date holds nothing parseable", () => {
    const content = "date,period,value\n,2024-05-01T05,10\n";
    const parsed = expectParsed(parseRawFile({ path: "energy_chicago_2024-05-01.csv", content }));
    expect(parsed.dateSource).toBe("period");
    expect(parsed.records[0].date).toBe("2024-05-01");
  });

  it("rejects files with no usable date column", () => {
    const outcome = parseRawFile({ path: "energy_chicago_2024-05-01.csv", content: "foo,value\n1,2\n" });
    expect(outcome).toMatchObject({ status: "rejected", reason: "no-usable-date" });
  });

  it("rejects unparseable file names before reading content", () => {
    const outcome = parseRawFile({ path: "notes.csv", content: "date,value\n2024-05-01,1\n" });
    expect(outcome).toMatchObject({ status: "rejected", reason: "unparseable-filename" });
  });
});

describe("parseRawFile — JSON", () => {
  it("unwraps response.data and uses period", () => {
    const content = JSON.stringify({
      response: { data: [{ period: "2024-05-01T05", value: 1500, "respondent-name": "ERCO" }] },
    });
    const parsed = expectParsed(parseRawFile({ path: "energy_houston_2024-05-01.json", content }));
    expect(parsed.dateSource).toBe("period");
    expect(parsed.warnings).toEqual(['using "period" as fallback for "date"']);
    expect(parsed.records[0]).toEqual({
      kind: "energy",
      city: "Houston",
      date: "2024-05-01",
      values: { energy_demand_MW: 1500, respondent: null, respondent_name: "ERCO", timezone: null },
    });
  });

  it("rejects unprocessed API responses", () => {
    const content = JSON.stringify({ results: [] });
    const outcome = parseRawFile({ path: "weather_chicago_2024-05-01.json", content });
    expect(outcome).toMatchObject({ status: "rejected", reason: "unrecognized-structure" });
  });

  it("rejects malformed JSON", () => {
    const outcome = parseRawFile({ path: "weather_chicago_2024-05-01.json", content: "{" });
    expect(outcome).toMatchObject({ status: "rejected", reason: "malformed-content" });
  });
});

describe("extractJsonRows", () => {
  it("accepts a plain list of objects", () => {
    const result = extractJsonRows([{ date: "2024-05-01", a: 1 }, { date: "2024-05-02", b: 2 }]);
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.rowSet.headers).toEqual(["date", "a", "b"]);
  });

  it("rejects lists with non-object rows", () => {
    expect(extractJsonRows([1, 2])).toMatchObject({ ok: false, reason: "unrecognized-structure" });
  });

  it("rejects objects without response.data", () => {
    expect(extractJsonRows({ response: {} })).toMatchObject({ ok: false, reason: "unrecognized-structure" });
  });
});
