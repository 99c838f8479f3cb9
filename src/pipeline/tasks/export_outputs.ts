/**
 * EXPORT_OUTPUTS Task — Write the merged CSV and per-kind quality reports.
 */

import { mkdirSync, renameSync, writeFileSync } from "fs";
import path from "path";

import { joinedRowsToTable } from "../../join/engine.js";
import { writeCsvAtomic } from "../../master/csv.js";
import { fileDateStamp } from "../../shared/dates.js";
import { KINDS } from "../../shared/types.js";
import type { TaskHandler } from "../types.js";
import { JOINED_ID } from "./join_datasets.js";
import { taskResult } from "./output.js";

function writeJsonAtomic(filePath: string, value: unknown): void {
  mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  writeFileSync(tmpPath, JSON.stringify(value, null, 2) + "\n", "utf-8");
  renameSync(tmpPath, filePath);
}

export const handleExportOutputs: TaskHandler = async (input, store, config) => {
  const t0 = new Date();
  const { settings, logger, now } = config;
  const stamp = fileDateStamp(now);
  const written: string[] = [];

  if (store.has("joined_rows", JOINED_ID)) {
    const { rows } = store.get("joined_rows", JOINED_ID);
    const mergedPath = path.join(settings.processedDir, `processed_merged_data_${stamp}.csv`);
    writeCsvAtomic(mergedPath, joinedRowsToTable(rows));
    written.push(mergedPath);
    logger.info("EXPORT", `${rows.length} merged rows → ${mergedPath}`);
  }

  for (const kind of KINDS) {
    if (!store.has("quality_report", kind)) continue;
    const reportPath = path.join(settings.reportDir, `quality_report_${kind}_${stamp}.json`);
    writeJsonAtomic(reportPath, store.get("quality_report", kind));
    written.push(reportPath);
    logger.info("EXPORT", `${kind} quality report → ${reportPath}`);
  }

  const ref = store.set("written_files", "EXPORT_OUTPUTS", written);
  return taskResult(input, t0, [ref], { status: "success" });
};
