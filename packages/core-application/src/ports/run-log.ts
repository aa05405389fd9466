import type { LogLevel } from "./logger";

/** Append-only, human readable record of backup and restore runs. */
export interface RunLog {
  beginRun(title: string, details?: Record<string, string>): void;
  record(level: LogLevel, message: string): void;
}
