/**
 * Flat CSV tables on disk.
 */

import { readFileSync, writeFileSync, mkdirSync, renameSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";

import type { Cell, Table } from "../shared/types.js";

export function formatCell(value: Cell | undefined): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : "";
  return String(value);
}

function quote(val: string): string {
  if (val.includes(",") || val.includes('"') || val.includes("\n") || val.includes("\r")) {
    return `"${val.replace(/"/g, '""')}"`;
  }
  return val;
}

/** Serialize a table with a header line and a trailing newline. */
export function tableToCsv(table: Table): string {
  const lines = [
    table.columns.map(quote).join(","),
    ...table.rows.map((row) => table.columns.map((c) => quote(formatCell(row[c]))).join(",")),
  ];
  return lines.join("\n") + "\n";
}

/**
 * Write a table so readers never observe a half-written file:
 * the content goes to a sibling temp file which is then renamed over the target.
 */
export function writeCsvAtomic(filePath: string, table: Table): void {
  mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  writeFileSync(tmpPath, tableToCsv(table), "utf-8");
  renameSync(tmpPath, filePath);
}

/** Read a CSV file into its header and string-valued rows. */
export function readCsvFile(filePath: string): { headers: string[]; records: Record<string, string>[] } {
  let headers: string[] = [];
  const records = parse(readFileSync(filePath, "utf-8"), {
    bom: true,
    columns: (header: string[]) => {
      headers = header.map((h) => h.trim());
      return headers;
    },
    skip_empty_lines: true,
    relax_column_count: true,
  }) as Record<string, string>[];
  return { headers, records };
}
