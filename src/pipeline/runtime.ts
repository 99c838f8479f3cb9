/**
 * PipelineRuntime — Orchestrates one reconciliation run.
 *
 * Creates a fresh InMemoryTaskStore per run, executes tasks in topological
 * order, and halts on failure or on a skip from a haltOnSkip task.
 */

import { v4 as uuidv4 } from "uuid";

import { errorMessage } from "../shared/errors.js";
import { InMemoryTaskStore } from "./store.js";
import { getExecutionOrder, getTaskDefinition, TASK_DEFINITIONS } from "./registry.js";
import { taskResult } from "./tasks/output.js";
import type {
  PipelineRunResult,
  PipelineTaskType,
  RunStatus,
  TaskConfig,
  TaskDefinition,
  TaskInputBundle,
  TaskResult,
} from "./types.js";

export class PipelineRuntime {
  private config: TaskConfig;
  private definitions: readonly TaskDefinition[];

  constructor(config: TaskConfig, definitions: readonly TaskDefinition[] = TASK_DEFINITIONS) {
    this.config = config;
    this.definitions = definitions;
  }

  async execute(): Promise<PipelineRunResult> {
    const correlationId = uuidv4();
    const store = new InMemoryTaskStore();
    const taskResults = new Map<PipelineTaskType, TaskResult>();
    const t0 = Date.now();
    const { logger } = this.config;

    const finish = (status: RunStatus): PipelineRunResult => ({
      correlationId,
      status,
      taskResults,
      store,
      totalDurationMs: Date.now() - t0,
    });

    logger.info("RUN", `run ${correlationId} started`);

    for (const taskType of getExecutionOrder(this.definitions)) {
      const def = getTaskDefinition(taskType, this.definitions);
      const inputBundle: TaskInputBundle = {
        taskType,
        taskId: uuidv4(),
        correlationId,
      };

      let result: TaskResult;
      const started = new Date();
      try {
        result = await def.handler(inputBundle, store, this.config);
      } catch (err) {
        result = taskResult(inputBundle, started, [], { status: "failed", error: errorMessage(err) });
      }
      taskResults.set(taskType, result);

      if (result.status === "failed") {
        logger.error(taskType, result.error);
        return finish("failed");
      }
      if (result.status === "skipped") {
        logger.warn(taskType, `skipped: ${result.reason}`);
        if (def.haltOnSkip) {
          logger.info("RUN", "nothing to do");
          return finish("nothing_to_do");
        }
      }
    }

    return finish("completed");
  }
}
