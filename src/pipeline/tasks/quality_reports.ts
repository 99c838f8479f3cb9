/**
 * QUALITY_REPORTS Task — One quality report per non-empty master.
 */

import { generateQualityReport } from "../../quality/report.js";
import { KINDS } from "../../shared/types.js";
import type { ProducedRef, TaskHandler } from "../types.js";
import { taskResult } from "./output.js";

const TEMPERATURE_COLUMNS = ["temp_min_F", "temp_max_F"];
const DEMAND_COLUMN = "energy_demand_MW";
const DATE_COLUMN = "date";

export const handleQualityReports: TaskHandler = async (input, store, config) => {
  const t0 = new Date();
  const { settings, logger, now } = config;
  const refs: ProducedRef[] = [];

  for (const kind of KINDS) {
    const master = store.get("master_snapshot", kind);
    if (master.rows.length === 0) continue;

    // Temperature checks run only on columns the table carries.
    const temperatureColumns = TEMPERATURE_COLUMNS.filter((c) => master.table.columns.includes(c));
    const report = generateQualityReport(master.table, temperatureColumns, DEMAND_COLUMN, DATE_COLUMN, {
      freshnessThresholdDays: settings.freshnessDays[kind],
      now,
    });

    const { freshness } = report;
    if (freshness.error) {
      logger.warn("QUALITY", `${kind}: ${freshness.error}`);
    } else if (freshness.is_fresh) {
      logger.info("QUALITY", `${kind}: fresh (latest ${freshness.latest_date}, ${freshness.days_ago}d ago)`);
    } else {
      logger.warn(
        "QUALITY",
        `${kind}: stale (latest ${freshness.latest_date}, ${freshness.days_ago}d ago > ${freshness.threshold_days}d)`
      );
    }

    refs.push(store.set("quality_report", kind, report));
  }

  if (refs.length === 0) {
    return taskResult(input, t0, [], { status: "skipped", reason: "no master data to report on" });
  }
  return taskResult(input, t0, refs, { status: "success" });
};
