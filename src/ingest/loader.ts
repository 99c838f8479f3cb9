/**
 * Raw Loader — Discovers raw files, orders them, and parses each into
 * per-kind record batches.
 *
 * Order matters: batches feed last-write-wins merging, so the file order is
 * an explicit comparator chosen by configuration and applied before parsing.
 */

import { readdirSync, readFileSync, statSync, existsSync } from "fs";
import path from "path";

import type { FileOrder } from "../shared/run_config.js";
import type { Kind, RawRecord } from "../shared/types.js";
import { parseRawFile } from "./parser.js";
import type { ParsedFile, RejectedFile } from "./parser.js";

export interface DiscoveredFile {
  path: string;
  /** Path below the raw directory, always with forward slashes. */
  relativePath: string;
  mtimeMs: number;
}

export type FileComparator = (a: DiscoveredFile, b: DiscoveredFile) => number;

const RAW_EXTENSIONS = new Set([".csv", ".json"]);

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Code-unit order of the relative path; independent of locale. */
export const lexicalOrder: FileComparator = (a, b) =>
  compareStrings(a.relativePath, b.relativePath);

/** Oldest first; equal times fall back to lexical order. */
export const mtimeOrder: FileComparator = (a, b) =>
  a.mtimeMs !== b.mtimeMs ? a.mtimeMs - b.mtimeMs : lexicalOrder(a, b);

export function comparatorFor(order: FileOrder): FileComparator {
  return order === "mtime" ? mtimeOrder : lexicalOrder;
}

/**
 * Recursively list .csv/.json files under a directory.
 * A missing directory yields an empty list.
 */
export function discoverRawFiles(rawDir: string): DiscoveredFile[] {
  if (!existsSync(rawDir)) return [];
  const found: DiscoveredFile[] = [];

  const walk = (dir: string) => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (entry.isFile() && RAW_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) {
        found.push({
          path: full,
          relativePath: path.relative(rawDir, full).split(path.sep).join("/"),
          mtimeMs: statSync(full).mtimeMs,
        });
      }
    }
  };
  walk(rawDir);
  return found;
}

export interface IngestResult {
  files: DiscoveredFile[];
  parsed: ParsedFile[];
  rejected: RejectedFile[];
  batches: Record<Kind, RawRecord[]>;
}

/**
 * Parse every raw file in comparator order and concatenate records by kind.
 * Within a batch, records keep file order, then row order.
 */
export function ingestRawFiles(files: readonly DiscoveredFile[], compare: FileComparator): IngestResult {
  const ordered = [...files].sort(compare);
  const parsed: ParsedFile[] = [];
  const rejected: RejectedFile[] = [];
  const batches: Record<Kind, RawRecord[]> = { energy: [], weather: [] };

  for (const file of ordered) {
    const outcome = parseRawFile({ path: file.path, content: readFileSync(file.path) });
    if (outcome.status === "rejected") {
      rejected.push(outcome);
      continue;
    }
    parsed.push(outcome);
    for (const record of outcome.records) batches[outcome.kind].push(record);
  }

  return { files: ordered, parsed, rejected, batches };
}
