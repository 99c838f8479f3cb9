/**
 * Task Registry — Defines the reconciliation DAG and its topological order.
 */

import type { TaskDefinition, PipelineTaskType } from "./types.js";
import {
  handleIngestRaw,
  handleMergeMasters,
  handleJoinDatasets,
  handleQualityReports,
  handleExportOutputs,
} from "./tasks/index.js";

export const TASK_DEFINITIONS: TaskDefinition[] = [
  {
    taskType: "INGEST_RAW",
    handler: handleIngestRaw,
    dependsOn: [],
    haltOnSkip: true,
  },
  {
    taskType: "MERGE_MASTERS",
    handler: handleMergeMasters,
    dependsOn: ["INGEST_RAW"],
  },
  {
    taskType: "JOIN_DATASETS",
    handler: handleJoinDatasets,
    dependsOn: ["MERGE_MASTERS"],
  },
  {
    taskType: "QUALITY_REPORTS",
    handler: handleQualityReports,
    dependsOn: ["MERGE_MASTERS"],
  },
  {
    taskType: "EXPORT_OUTPUTS",
    handler: handleExportOutputs,
    dependsOn: ["JOIN_DATASETS", "QUALITY_REPORTS"],
  },
];

/**
 * Topological execution order: dependencies before dependents.
 * Throws on an unknown dependency or a cycle.
 */
export function getExecutionOrder(definitions: readonly TaskDefinition[] = TASK_DEFINITIONS): PipelineTaskType[] {
  const defMap = new Map(definitions.map((d) => [d.taskType, d]));
  const visited = new Set<PipelineTaskType>();
  const visiting = new Set<PipelineTaskType>();
  const order: PipelineTaskType[] = [];

  function visit(taskType: PipelineTaskType): void {
    if (visited.has(taskType)) return;
    if (visiting.has(taskType)) throw new Error(`Dependency cycle at task: ${taskType}`);
    const def = defMap.get(taskType);
    if (!def) throw new Error(`Unknown task type: ${taskType}`);
    visiting.add(taskType);
    for (const dep of def.dependsOn) {
      visit(dep);
    }
    visiting.delete(taskType);
    visited.add(taskType);
    order.push(taskType);
  }

  for (const def of definitions) {
    visit(def.taskType);
  }

  return order;
}

export function getTaskDefinition(
  taskType: PipelineTaskType,
  definitions: readonly TaskDefinition[] = TASK_DEFINITIONS
): TaskDefinition {
  const def = definitions.find((d) => d.taskType === taskType);
  if (!def) throw new Error(`Unknown task type: ${taskType}`);
  return def;
}
