/**
 * Raw file name classification.
 *
 * Expected stem: {kind}_{cityToken}_{YYYY-MM-DD}[_{YYYY-MM-DD}]
 * e.g. "energy_new york_2024-05-01_2024-05-31.csv"
 */

import path from "path";
import { toCalendarDate } from "../shared/dates.js";
import type { Kind } from "../shared/types.js";

export type RejectReason =
  | "unparseable-filename"
  | "unsupported-extension"
  | "unrecognized-structure"
  | "malformed-content"
  | "no-usable-date";

export type FileFormat = "csv" | "json";

export type FilenameParse =
  | {
      ok: true;
      kind: Kind;
      cityToken: string;
      startDate: string;
      endDate: string | null;
      format: FileFormat;
    }
  | { ok: false; reason: RejectReason; message: string };

const STEM_RE = /^(energy|weather)_(.+?)_(\d{4}-\d{2}-\d{2})(?:_(\d{4}-\d{2}-\d{2}))?/;

export function parseRawFilename(filePath: string): FilenameParse {
  const base = path.basename(filePath);
  const ext = path.extname(base).toLowerCase();
  const stem = base.slice(0, base.length - ext.length);

  const match = STEM_RE.exec(stem);
  if (!match) {
    return {
      ok: false,
      reason: "unparseable-filename",
      message: `"${base}" does not match {energy|weather}_{city}_{YYYY-MM-DD}`,
    };
  }

  const startDate = toCalendarDate(match[3]);
  if (!startDate) {
    return {
      ok: false,
      reason: "unparseable-filename",
      message: `"${base}" embeds an invalid date ${match[3]}`,
    };
  }

  if (ext !== ".csv" && ext !== ".json") {
    return {
      ok: false,
      reason: "unsupported-extension",
      message: `"${base}" is neither .csv nor .json`,
    };
  }

  return {
    ok: true,
    kind: match[1] === "energy" ? "energy" : "weather",
    cityToken: match[2],
    startDate,
    endDate: match[4] ? toCalendarDate(match[4]) : null,
    format: ext === ".csv" ? "csv" : "json",
  };
}
