/**
 * Step-tagged console logging.
 *
 *   [1.4s] [INGEST] 12 files discovered
 */

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  info(step: string, msg: string): void;
  warn(step: string, msg: string): void;
  error(step: string, msg: string): void;
}

export interface LogEntry {
  level: LogLevel;
  step: string;
  msg: string;
}

export function createConsoleLogger(startTime: number = Date.now()): Logger {
  const line = (step: string, msg: string) => {
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    return `  [${elapsed}s] [${step}] ${msg}`;
  };
  return {
    info: (step, msg) => console.log(line(step, msg)),
    warn: (step, msg) => console.warn(line(step, `⚠ ${msg}`)),
    error: (step, msg) => console.error(line(step, `✗ ${msg}`)),
  };
}

/** Logger that keeps entries in memory; handy in tests and dry runs. */
export function createCollectingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    info: (step, msg) => entries.push({ level: "info", step, msg }),
    warn: (step, msg) => entries.push({ level: "warn", step, msg }),
    error: (step, msg) => entries.push({ level: "error", step, msg }),
  };
}
