/**
 * Pipeline Task Types
 *
 * A reconciliation run is a small DAG of ephemeral tasks. Tasks talk to each
 * other only through typed slots in a per-run TaskStore.
 */

import type { IngestResult } from "../ingest/loader.js";
import type { JoinStats } from "../join/engine.js";
import type { MergeStats } from "../master/store.js";
import type { Logger } from "../shared/log.js";
import type { PipelineConfig } from "../shared/run_config.js";
import type { JoinedRow, Kind, MasterRow, QualityReport, Table } from "../shared/types.js";

// ── Task Type Enum ─────────────────────────────────────────────────

export type PipelineTaskType =
  | "INGEST_RAW"
  | "MERGE_MASTERS"
  | "JOIN_DATASETS"
  | "QUALITY_REPORTS"
  | "EXPORT_OUTPUTS";

// ── Store Slots ────────────────────────────────────────────────────

export interface MasterSnapshot {
  kind: Kind;
  rows: readonly MasterRow[];
  table: Table;
  /** Null when no new records of this kind arrived this run. */
  mergeStats: MergeStats | null;
  /** Snapshot rows dropped on load for a bad date or value. */
  skippedOnLoad: number;
  snapshotPath: string;
}

export interface JoinOutput {
  rows: JoinedRow[];
  stats: JoinStats;
}

/** Value type held by each slot kind. */
export interface StoreSlots {
  ingest_result: IngestResult;
  master_snapshot: MasterSnapshot;
  joined_rows: JoinOutput;
  quality_report: QualityReport;
  written_files: string[];
}

export type ProducedRefKind = keyof StoreSlots;

export interface ProducedRef {
  kind: ProducedRefKind;
  id: string;
}

export interface TaskStore {
  set<K extends ProducedRefKind>(kind: K, id: string, value: StoreSlots[K]): ProducedRef;
  get<K extends ProducedRefKind>(kind: K, id: string): StoreSlots[K];
  has(kind: ProducedRefKind, id: string): boolean;
  readonly size: number;
}

// ── Bundles & Results ──────────────────────────────────────────────

export interface TaskInputBundle {
  taskType: PipelineTaskType;
  taskId: string;
  correlationId: string;
}

export interface TaskOutputBundle {
  taskType: PipelineTaskType;
  taskId: string;
  correlationId: string;
  producedRefs: ProducedRef[];
  timing: {
    startedAt: Date;
    completedAt: Date;
    durationMs: number;
  };
  status: "success" | "failed" | "skipped";
  errors?: string[];
}

export type TaskResult =
  | { status: "success"; output: TaskOutputBundle }
  | { status: "failed"; output: TaskOutputBundle; error: string }
  | { status: "skipped"; output: TaskOutputBundle; reason: string };

// ── Handler, Config, Definition ────────────────────────────────────

export interface TaskConfig {
  settings: PipelineConfig;
  /** Reference time for freshness and output file stamps. */
  now: Date;
  logger: Logger;
}

export type TaskHandler = (
  input: TaskInputBundle,
  store: TaskStore,
  config: TaskConfig,
) => Promise<TaskResult>;

export interface TaskDefinition {
  taskType: PipelineTaskType;
  handler: TaskHandler;
  dependsOn: PipelineTaskType[];
  /** A skipped result from this task ends the run as "nothing_to_do". */
  haltOnSkip?: boolean;
}

// ── Run Result ─────────────────────────────────────────────────────

export type RunStatus = "completed" | "nothing_to_do" | "failed";

export interface PipelineRunResult {
  correlationId: string;
  status: RunStatus;
  taskResults: Map<PipelineTaskType, TaskResult>;
  store: TaskStore;
  totalDurationMs: number;
}
