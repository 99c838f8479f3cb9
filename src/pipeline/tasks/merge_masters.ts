/**
 * MERGE_MASTERS Task — Fold each kind's batch into its persisted master.
 *
 * Masters load from their snapshots even when no new file of that kind
 * arrived, so a weather-only run still joins against yesterday's energy.
 */

import path from "path";

import { MasterStore } from "../../master/store.js";
import type { MergeStats } from "../../master/store.js";
import { fileDateStamp } from "../../shared/dates.js";
import { KINDS } from "../../shared/types.js";
import type { ProducedRef, TaskHandler } from "../types.js";
import { INGEST_RESULT_ID } from "./ingest_raw.js";
import { taskResult } from "./output.js";

export function masterSnapshotPath(processedDir: string, kind: string): string {
  return path.join(processedDir, `${kind}_master.csv`);
}

export const handleMergeMasters: TaskHandler = async (input, store, config) => {
  const t0 = new Date();
  const { settings, logger, now } = config;
  const ingest = store.get("ingest_result", INGEST_RESULT_ID);
  const stamp = fileDateStamp(now);
  const refs: ProducedRef[] = [];
  const written: string[] = [];

  for (const kind of KINDS) {
    const master = MasterStore.load(kind, masterSnapshotPath(settings.processedDir, kind));
    const batch = ingest.batches[kind];
    if (master.skippedOnLoad > 0) {
      logger.warn(
        "MERGE",
        `${kind}: ${master.skippedOnLoad} rows in ${master.snapshotPath} skipped (bad date or value)`
      );
    }

    let mergeStats: MergeStats | null = null;
    if (batch.length > 0) {
      mergeStats = master.merge(batch);
      written.push(master.snapshot());
      if (settings.writeDatedCopies) {
        written.push(master.snapshot(path.join(settings.processedDir, `processed_${kind}_data_${stamp}.csv`)));
        written.push(master.snapshot(path.join(settings.processedDir, `backup_${kind}.csv`)));
      }
      logger.info(
        "MERGE",
        `${kind}: ${mergeStats.existing} existing + ${mergeStats.incoming} incoming → ` +
          `${mergeStats.total} rows (${mergeStats.replaced} replaced)`
      );
      if (mergeStats.droppedInvalidDate > 0) {
        logger.warn("MERGE", `${kind}: ${mergeStats.droppedInvalidDate} records excluded for invalid dates`);
      }
    } else if (master.size > 0) {
      logger.info("MERGE", `${kind}: no new records; using existing master (${master.size} rows)`);
    } else {
      logger.warn("MERGE", `${kind}: no data available`);
    }

    refs.push(
      store.set("master_snapshot", kind, {
        kind,
        rows: master.getRows(),
        table: master.toTable(),
        mergeStats,
        skippedOnLoad: master.skippedOnLoad,
        snapshotPath: master.snapshotPath,
      })
    );
  }

  refs.push(store.set("written_files", "MERGE_MASTERS", written));
  return taskResult(input, t0, refs, { status: "success" });
};
