import { mkdirSync } from "node:fs";
import { join } from "node:path";
import pino from "pino";
import type { DestinationStream, Level, Logger } from "pino";

export type { Logger } from "pino";

export interface RunLoggerOptions {
  /** Directory that receives postinstall_<stamp>.log. */
  logDir: string;
  startedAt: Date;
  /** Replaces both stdout and the log file (tests). */
  destination?: DestinationStream;
}

export interface RunLog {
  readonly logger: Logger;
  /** Null when a custom destination replaced the log file. */
  readonly logFile: string | null;
}

const LEVELS: readonly Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

function terminalLevel(value: string | undefined): Level {
  return LEVELS.find((level) => level === value) ?? "info";
}

/** YYYYMMDD_HHMMSS in local time. */
export function formatRunStamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function runLogFileName(date: Date): string {
  return `postinstall_${formatRunStamp(date)}.log`;
}

/**
 * One logger per run. The operator's terminal gets info and above; the run
 * log file also keeps debug records, which carry captured package-manager output.
 */
export function createRunLogger(options: RunLoggerOptions): RunLog {
  const base = {
    name: "host-postinstall",
    level: "debug",
    timestamp: pino.stdTimeFunctions.isoTime,
    base: null,
  };

  if (options.destination) {
    return { logger: pino(base, options.destination), logFile: null };
  }

  mkdirSync(options.logDir, { recursive: true });
  const logFile = join(options.logDir, runLogFileName(options.startedAt));
  // sync writes: a fatal guard exits right after logging.
  const file = pino.destination({ dest: logFile, append: true, sync: true });
  const streams = pino.multistream([
    { level: terminalLevel(process.env.LOG_LEVEL), stream: process.stdout },
    { level: "debug", stream: file },
  ]);
  return { logger: pino(base, streams), logFile };
}
