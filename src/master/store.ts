/**
 * MasterStore — the deduplicated, persisted source of truth for one kind.
 *
 * Invariant: at most one row per (city, date). Conflicts resolve by
 * last-write-wins over the concatenation [existing rows, incoming batch];
 * the later row replaces the earlier one whole, and survivors keep the
 * position of their last occurrence.
 */

import { existsSync } from "fs";

import { normalizeCityName } from "../cities/normalizer.js";
import { planColumnHealing, healAndCoerce, snapshotColumns } from "../ingest/schema_map.js";
import { toCalendarDate } from "../shared/dates.js";
import type { Cell, Kind, MasterRow, RawRecord, Table } from "../shared/types.js";
import { readCsvFile, writeCsvAtomic } from "./csv.js";

export interface MergeStats {
  kind: Kind;
  existing: number;
  incoming: number;
  /** Rows excluded because their date did not parse. */
  droppedInvalidDate: number;
  /** Rows superseded by a later row with the same key. */
  replaced: number;
  total: number;
}

function rowKey(city: string, date: string): string {
  return `${city}\u0000${date}`;
}

/**
 * Deduplicate by (city, date), keeping the last occurrence of each key
 * at the position where it occurs.
 */
export function keepLastByKey<T extends { city: string; date: string }>(rows: readonly T[]): T[] {
  const lastIndex = new Map<string, number>();
  rows.forEach((row, i) => lastIndex.set(rowKey(row.city, row.date), i));
  return rows.filter((row, i) => lastIndex.get(rowKey(row.city, row.date)) === i);
}

function toMasterRow(city: string, date: string, values: Readonly<Record<string, Cell>>): MasterRow {
  return Object.freeze({ city, date, values: Object.freeze({ ...values }) });
}

export class MasterStore {
  readonly kind: Kind;
  readonly snapshotPath: string;
  /** Snapshot rows left out by load() for a bad date or value. */
  readonly skippedOnLoad: number;
  private rows: MasterRow[];

  constructor(kind: Kind, snapshotPath: string, rows: readonly MasterRow[] = [], skippedOnLoad = 0) {
    this.kind = kind;
    this.snapshotPath = snapshotPath;
    this.rows = keepLastByKey(rows);
    this.skippedOnLoad = skippedOnLoad;
  }

  /**
   * Load a store from its snapshot. A missing snapshot gives an empty store.
   * Legacy column names are healed; rows with bad dates or values are
   * skipped and counted in `skippedOnLoad`.
   */
  static load(kind: Kind, snapshotPath: string): MasterStore {
    if (!existsSync(snapshotPath)) return new MasterStore(kind, snapshotPath);

    const { headers, records } = readCsvFile(snapshotPath);
    const plan = planColumnHealing(kind, headers);
    const dateHeader = headers.find((h) => h.toLowerCase() === "date");
    const cityHeader = headers.find((h) => h.toLowerCase() === "city");

    const rows: MasterRow[] = [];
    let skipped = 0;
    for (const record of records) {
      const date = dateHeader === undefined ? null : toCalendarDate(record[dateHeader]);
      const coerced = healAndCoerce(kind, record, plan);
      if (!date || !coerced.ok) {
        skipped++;
        continue;
      }
      const city = normalizeCityName(cityHeader === undefined ? undefined : record[cityHeader]);
      rows.push(toMasterRow(city, date, coerced.values));
    }
    return new MasterStore(kind, snapshotPath, rows, skipped);
  }

  get size(): number {
    return this.rows.length;
  }

  getRows(): readonly MasterRow[] {
    return this.rows;
  }

  get(city: string, date: string): MasterRow | undefined {
    return this.rows.find((r) => r.city === city && r.date === date);
  }

  merge(batch: readonly RawRecord[]): MergeStats {
    for (const record of batch) {
      if (record.kind !== this.kind) {
        throw new Error(`MasterStore(${this.kind}): cannot merge a ${record.kind} record`);
      }
    }

    const concatenated: MasterRow[] = [...this.rows];
    let droppedInvalidDate = 0;
    for (const record of batch) {
      const date = toCalendarDate(record.date);
      if (!date) {
        droppedInvalidDate++;
        continue;
      }
      concatenated.push(toMasterRow(record.city, date, record.values));
    }

    const existing = this.rows.length;
    this.rows = keepLastByKey(concatenated);

    return {
      kind: this.kind,
      existing,
      incoming: batch.length,
      droppedInvalidDate,
      replaced: concatenated.length - this.rows.length,
      total: this.rows.length,
    };
  }

  toTable(): Table {
    return {
      columns: snapshotColumns(this.kind),
      rows: this.rows.map((r) => ({ date: r.date, city: r.city, ...r.values })),
    };
  }

  /** Persist the full row set; returns the path written. */
  snapshot(targetPath: string = this.snapshotPath): string {
    writeCsvAtomic(targetPath, this.toTable());
    return targetPath;
  }
}
