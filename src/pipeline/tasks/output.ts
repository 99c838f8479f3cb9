import type { ProducedRef, TaskInputBundle, TaskResult } from "../types.js";

/** Wrap a task outcome with its timing and identity. */
export function taskResult(
  input: TaskInputBundle,
  t0: Date,
  producedRefs: ProducedRef[],
  outcome: { status: "success" } | { status: "skipped"; reason: string } | { status: "failed"; error: string }
): TaskResult {
  const t1 = new Date();
  const output = {
    taskType: input.taskType,
    taskId: input.taskId,
    correlationId: input.correlationId,
    producedRefs,
    timing: { startedAt: t0, completedAt: t1, durationMs: t1.getTime() - t0.getTime() },
  };
  switch (outcome.status) {
    case "success":
      return { status: "success", output: { ...output, status: "success" } };
    case "skipped":
      return { status: "skipped", reason: outcome.reason, output: { ...output, status: "skipped" } };
    case "failed":
      return {
        status: "failed",
        error: outcome.error,
        output: { ...output, status: "failed", errors: [outcome.error] },
      };
  }
}
