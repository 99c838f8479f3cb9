/**
 * JOIN_DATASETS Task — Join the energy and weather masters on (date, city).
 */

import { joinMasters } from "../../join/engine.js";
import type { TaskHandler } from "../types.js";
import { taskResult } from "./output.js";

export const JOINED_ID = "merged";

export const handleJoinDatasets: TaskHandler = async (input, store, config) => {
  const t0 = new Date();
  const { settings, logger } = config;
  const energy = store.get("master_snapshot", "energy");
  const weather = store.get("master_snapshot", "weather");

  // Left mode only needs energy rows; inner needs both sides.
  const missing =
    energy.rows.length === 0 || (settings.joinMode === "inner" && weather.rows.length === 0);
  if (missing) {
    const reason = `cannot join: energy=${energy.rows.length} rows, weather=${weather.rows.length} rows`;
    logger.warn("JOIN", reason);
    return taskResult(input, t0, [], { status: "skipped", reason });
  }

  const joined = joinMasters(energy.rows, weather.rows, settings.joinMode);
  const { stats } = joined;
  logger.info(
    "JOIN",
    `${stats.mode} join: ${stats.matched}/${stats.energyRows} energy rows matched, ${stats.emitted} emitted`
  );

  const ref = store.set("joined_rows", JOINED_ID, joined);
  return taskResult(input, t0, [ref], { status: "success" });
};
