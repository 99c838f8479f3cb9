/**
 * INGEST_RAW Task — Discover, order and parse raw files into per-kind batches.
 */

import { comparatorFor, discoverRawFiles, ingestRawFiles } from "../../ingest/loader.js";
import type { TaskHandler } from "../types.js";
import { taskResult } from "./output.js";

export const INGEST_RESULT_ID = "raw";

export const handleIngestRaw: TaskHandler = async (input, store, config) => {
  const t0 = new Date();
  const { settings, logger } = config;

  const files = discoverRawFiles(settings.rawDir);
  logger.info("INGEST", `${files.length} raw files found in ${settings.rawDir} (${settings.fileOrder} order)`);

  const result = ingestRawFiles(files, comparatorFor(settings.fileOrder));

  for (const file of result.parsed) {
    logger.info("INGEST", `${file.kind} ${file.city}: ${file.records.length} records from ${file.path}`);
    for (const warning of file.warnings) logger.warn("INGEST", `${file.path}: ${warning}`);
  }
  for (const file of result.rejected) {
    logger.warn("INGEST", `skipped ${file.path} [${file.reason}] ${file.message}`);
  }

  const ref = store.set("ingest_result", INGEST_RESULT_ID, result);

  if (result.parsed.length === 0) {
    return taskResult(input, t0, [ref], {
      status: "skipped",
      reason: `no parseable raw files in ${settings.rawDir}`,
    });
  }
  return taskResult(input, t0, [ref], { status: "success" });
};
