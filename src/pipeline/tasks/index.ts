export { handleIngestRaw } from "./ingest_raw.js";
export { handleMergeMasters } from "./merge_masters.js";
export { handleJoinDatasets } from "./join_datasets.js";
export { handleQualityReports } from "./quality_reports.js";
export { handleExportOutputs } from "./export_outputs.js";
