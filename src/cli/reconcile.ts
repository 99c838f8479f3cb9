#!/usr/bin/env node
/**
 * CLI: reconcile
 *
 * Usage: npm run reconcile -- [--raw-dir <dir>] [--processed-dir <dir>] [--report-dir <dir>]
 *                             [--join-mode inner|left] [--file-order lexical|mtime]
 *
 * Ingests raw energy/weather files, updates the master datasets, writes the
 * joined CSV and per-dataset quality reports.
 * Exit code: 0 on completed or nothing-to-do, 1 on failure.
 */

import "dotenv/config";

import { PipelineRuntime } from "../pipeline/runtime.js";
import { formatTaskSummary } from "../pipeline/summary.js";
import { errorMessage } from "../shared/errors.js";
import { createConsoleLogger } from "../shared/log.js";
import { loadPipelineConfig } from "../shared/run_config.js";
import type { CliOverrides } from "../shared/run_config.js";

const USAGE =
  "Usage: npm run reconcile -- [--raw-dir <dir>] [--processed-dir <dir>] [--report-dir <dir>] " +
  "[--join-mode inner|left] [--file-order lexical|mtime]";

const FLAGS = new Map<string, keyof CliOverrides>([
  ["--raw-dir", "rawDir"],
  ["--processed-dir", "processedDir"],
  ["--report-dir", "reportDir"],
  ["--join-mode", "joinMode"],
  ["--file-order", "fileOrder"],
]);

function parseArgs(args: string[]): CliOverrides {
  const overrides: CliOverrides = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      console.log(USAGE);
      process.exit(0);
    }
    const key = FLAGS.get(arg);
    if (key === undefined || i + 1 >= args.length) {
      console.error(`Unknown or incomplete argument: ${arg}`);
      console.error(USAGE);
      process.exit(1);
    }
    overrides[key] = args[i + 1];
    i++;
  }
  return overrides;
}

async function main() {
  const settings = loadPipelineConfig(parseArgs(process.argv.slice(2)));

  console.log("╔══════════════════════════════════════════════════════════════╗");
  console.log("║  Energy × Weather Reconciler                                 ║");
  console.log("╚══════════════════════════════════════════════════════════════╝");
  console.log();

  const startTime = Date.now();
  const logger = createConsoleLogger(startTime);

  logger.info("CONFIG", `Raw: ${settings.rawDir}`);
  logger.info("CONFIG", `Processed: ${settings.processedDir}  Reports: ${settings.reportDir}`);
  logger.info("CONFIG", `Join: ${settings.joinMode}  File order: ${settings.fileOrder}`);

  const runtime = new PipelineRuntime({ settings, now: new Date(), logger });
  const result = await runtime.execute();

  console.log();
  for (const line of formatTaskSummary(result)) console.log(line);

  const totalTime = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log();
  if (result.status === "failed") {
    console.error(`  ✗ Run ${result.correlationId} failed after ${totalTime}s`);
    process.exit(1);
  }
  if (result.status === "nothing_to_do") {
    console.log(`  ✓ Nothing to do (${totalTime}s)`);
    return;
  }
  console.log(`  ✓ Reconciliation complete in ${totalTime}s`);
}

main().catch((err: unknown) => {
  console.error(`\n  ✗ Reconciliation failed: ${errorMessage(err)}`);
  if (err instanceof Error && err.stack) console.error(err.stack);
  process.exit(1);
});
