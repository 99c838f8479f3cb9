/**
 * Run Configuration Module
 *
 * One PipelineConfig is built at process start and handed to every task.
 * Precedence: CLI argument, then environment variable, then default.
 *
 *   joinMode   inner: rows need both energy and weather
 *              left:  every energy row, weather null-filled
 *   fileOrder  lexical: relative path order
 *              mtime:   modification time, oldest first
 */

import { z } from "zod";
import type { JoinMode } from "./types.js";

export type FileOrder = "lexical" | "mtime";

export const PipelineConfigSchema = z.object({
  rawDir: z.string().min(1),
  processedDir: z.string().min(1),
  reportDir: z.string().min(1),
  joinMode: z.enum(["inner", "left"]),
  fileOrder: z.enum(["lexical", "mtime"]),
  freshnessDays: z.object({
    energy: z.number().int().nonnegative(),
    weather: z.number().int().nonnegative(),
  }),
  writeDatedCopies: z.boolean(),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const DEFAULT_FRESHNESS_DAYS = 2;

/** Values supplied on the command line; every field optional. */
export interface CliOverrides {
  rawDir?: string;
  processedDir?: string;
  reportDir?: string;
  joinMode?: string;
  fileOrder?: string;
}

function normalizeToken(raw: string): string {
  return raw.trim().toLowerCase().replace(/_/g, "-");
}

/**
 * Parse the join mode. "left", "left-on-energy" and "left_on_energy" all
 * mean left; anything else (including nothing) is inner.
 */
export function parseJoinMode(cliArg?: string, envVar?: string): JoinMode {
  const raw = normalizeToken(cliArg ?? envVar ?? "inner");
  if (raw === "left" || raw === "left-on-energy") return "left";
  return "inner";
}

export function parseFileOrder(cliArg?: string, envVar?: string): FileOrder {
  const raw = normalizeToken(cliArg ?? envVar ?? "lexical");
  if (raw === "mtime" || raw === "modified") return "mtime";
  return "lexical";
}

function parseDays(envVar: string | undefined): number {
  if (envVar === undefined || envVar.trim() === "") return DEFAULT_FRESHNESS_DAYS;
  return Number(envVar);
}

function parseFlag(envVar: string | undefined, fallback: boolean): boolean {
  if (envVar === undefined) return fallback;
  const v = envVar.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  return fallback;
}

/**
 * Build and validate the run configuration.
 * Throws with every zod issue listed when a value is out of range.
 */
export function loadPipelineConfig(
  cli: CliOverrides = {},
  env: Record<string, string | undefined> = process.env
): PipelineConfig {
  const candidate = {
    rawDir: cli.rawDir ?? env.RECONCILE_RAW_DIR ?? "data/raw",
    processedDir: cli.processedDir ?? env.RECONCILE_PROCESSED_DIR ?? "data/processed",
    reportDir: cli.reportDir ?? env.RECONCILE_REPORT_DIR ?? "data/reports",
    joinMode: parseJoinMode(cli.joinMode, env.RECONCILE_JOIN_MODE),
    fileOrder: parseFileOrder(cli.fileOrder, env.RECONCILE_FILE_ORDER),
    freshnessDays: {
      energy: parseDays(env.FRESHNESS_DAYS_ENERGY),
      weather: parseDays(env.FRESHNESS_DAYS_WEATHER),
    },
    writeDatedCopies: parseFlag(env.RECONCILE_DATED_COPIES, true),
  };

  const parsed = PipelineConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid pipeline configuration:\n  ${issues.join("\n  ")}`);
  }
  return parsed.data;
}
