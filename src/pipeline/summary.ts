import type { PipelineRunResult } from "./types.js";

/**
 * One line per executed task: status, type, duration and the store refs it
 * produced, e.g. `  success  MERGE_MASTERS (12ms) → master_snapshot:energy, …`.
 */
export function formatTaskSummary(result: PipelineRunResult): string[] {
  const lines: string[] = [];
  for (const [taskType, taskResult] of result.taskResults) {
    const { producedRefs, timing } = taskResult.output;
    const refs = producedRefs.map((r) => `${r.kind}:${r.id}`).join(", ");
    let line = `  ${taskResult.status.padEnd(8)} ${taskType} (${timing.durationMs}ms)`;
    if (refs) line += ` → ${refs}`;
    if (taskResult.status === "skipped") line += ` [${taskResult.reason}]`;
    if (taskResult.status === "failed") line += ` [${taskResult.error}]`;
    lines.push(line);
  }
  return lines;
}
