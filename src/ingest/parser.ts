/**
 * Record Parser — turns one raw file into a batch of normalized records.
 *
 * Kind and city come from the file name, never from the rows. Per-file
 * problems reject the file; per-row problems drop the row and are counted.
 */

import { parse } from "csv-parse/sync";

import { normalizeCityName, lookupCity } from "../cities/normalizer.js";
import { toCalendarDate } from "../shared/dates.js";
import { errorMessage } from "../shared/errors.js";
import type { Cell, Kind, RawRecord } from "../shared/types.js";
import { parseRawFilename } from "./filename.js";
import type { FileFormat, RejectReason } from "./filename.js";
import { planColumnHealing, healAndCoerce } from "./schema_map.js";

export interface RawFileInput {
  path: string;
  content: string | Buffer;
}

export type DateSource = "date" | "period";

export interface ParsedFile {
  status: "parsed";
  path: string;
  kind: Kind;
  city: string;
  startDate: string;
  endDate: string | null;
  dateSource: DateSource;
  records: RawRecord[];
  dropped: { invalidDate: number; invalidValue: number };
  warnings: string[];
}

export interface RejectedFile {
  status: "rejected";
  path: string;
  reason: RejectReason;
  message: string;
}

export type ParseOutcome = ParsedFile | RejectedFile;

interface RowSet {
  headers: string[];
  rows: Record<string, unknown>[];
}

type RowSetResult = { ok: true; rowSet: RowSet } | { ok: false; reason: RejectReason; message: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function collectHeaders(rows: Record<string, unknown>[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return [...seen];
}

// ── Content Readers ──────────────────────────────────────────────────

function readCsvRows(text: string): RowSetResult {
  let headers: string[] = [];
  try {
    const rows = parse(text, {
      bom: true,
      columns: (header: string[]) => {
        headers = header.map((h) => h.trim());
        return headers;
      },
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    }) as Record<string, string>[];
    return { ok: true, rowSet: { headers, rows } };
  } catch (err) {
    return { ok: false, reason: "malformed-content", message: `CSV parse failed: ${errorMessage(err)}` };
  }
}

/**
 * Accepted JSON shapes:
 *   [ {...}, {...} ]                 plain list of row objects
 *   { response: { data: [ ... ] } }  upstream energy API envelope
 */
export function extractJsonRows(data: unknown): RowSetResult {
  let candidate: unknown = undefined;

  if (Array.isArray(data)) {
    candidate = data;
  } else if (isPlainObject(data)) {
    if ("results" in data) {
      return {
        ok: false,
        reason: "unrecognized-structure",
        message: "unprocessed API response (top-level \"results\"); expected a list of rows",
      };
    }
    const response = data.response;
    if (isPlainObject(response) && Array.isArray(response.data)) {
      candidate = response.data;
    }
  }

  if (!Array.isArray(candidate)) {
    return {
      ok: false,
      reason: "unrecognized-structure",
      message: "expected a list of rows or an object with response.data",
    };
  }

  const rows: Record<string, unknown>[] = [];
  for (const entry of candidate) {
    if (!isPlainObject(entry)) {
      return { ok: false, reason: "unrecognized-structure", message: "list contains a non-object row" };
    }
    rows.push(entry);
  }
  return { ok: true, rowSet: { headers: collectHeaders(rows), rows } };
}

function readJsonRows(text: string): RowSetResult {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    return { ok: false, reason: "malformed-content", message: `JSON parse failed: ${errorMessage(err)}` };
  }
  return extractJsonRows(data);
}

function readRows(text: string, format: FileFormat): RowSetResult {
  return format === "csv" ? readCsvRows(text) : readJsonRows(text);
}

// ── Date Source ──────────────────────────────────────────────────────

function findHeader(headers: string[], name: string): string | undefined {
  return headers.find((h) => h.toLowerCase() === name);
}

/**
 * Pick the column that carries each row's date: "date" when at least one of
 * its values parses, otherwise "period" under the same condition.
 */
export function resolveDateColumn(
  rowSet: RowSet
): { source: DateSource; header: string } | null {
  for (const source of ["date", "period"] as const) {
    const header = findHeader(rowSet.headers, source);
    if (header === undefined) continue;
    if (rowSet.rows.some((row) => toCalendarDate(row[header]) !== null)) {
      return { source, header };
    }
  }
  return null;
}

// ── Main Parse ───────────────────────────────────────────────────────

export function parseRawFile(input: RawFileInput): ParseOutcome {
  const reject = (reason: RejectReason, message: string): RejectedFile => ({
    status: "rejected",
    path: input.path,
    reason,
    message,
  });

  const name = parseRawFilename(input.path);
  if (!name.ok) return reject(name.reason, name.message);

  const buffer = typeof input.content === "string" ? Buffer.from(input.content, "utf-8") : input.content;
  const text = buffer.toString("utf-8").replace(/^\uFEFF/, "");

  const read = readRows(text, name.format);
  if (!read.ok) return reject(read.reason, read.message);
  const { rowSet } = read;

  const dateColumn = resolveDateColumn(rowSet);
  if (!dateColumn) {
    return reject("no-usable-date", "neither \"date\" nor \"period\" holds a parseable date");
  }

  const warnings: string[] = [];
  if (dateColumn.source === "period") {
    warnings.push("using \"period\" as fallback for \"date\"");
  }

  const city = normalizeCityName(name.cityToken);
  const meta = lookupCity(city);
  const plan = planColumnHealing(name.kind, rowSet.headers);

  const records: RawRecord[] = [];
  const dropped = { invalidDate: 0, invalidValue: 0 };

  for (const row of rowSet.rows) {
    const date = toCalendarDate(row[dateColumn.header]);
    if (!date) {
      dropped.invalidDate++;
      continue;
    }
    const coerced = healAndCoerce(name.kind, row, plan);
    if (!coerced.ok) {
      dropped.invalidValue++;
      continue;
    }
    const values: Record<string, Cell> = coerced.values;
    if (name.kind === "weather") {
      values.timezone = meta.timezone;
    }
    records.push(
      Object.freeze({
        kind: name.kind,
        city,
        date,
        values: Object.freeze(values),
      })
    );
  }

  if (dropped.invalidDate > 0) warnings.push(`${dropped.invalidDate} row(s) dropped: unparseable date`);
  if (dropped.invalidValue > 0) warnings.push(`${dropped.invalidValue} row(s) dropped: non-numeric value`);

  return {
    status: "parsed",
    path: input.path,
    kind: name.kind,
    city,
    startDate: name.startDate,
    endDate: name.endDate,
    dateSource: dateColumn.source,
    records,
    dropped,
    warnings,
  };
}
