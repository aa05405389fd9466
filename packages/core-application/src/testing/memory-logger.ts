import type { Logger, LogLevel } from "../ports/logger";
import type { RunLog } from "../ports/run-log";

export type LogLine = { level: LogLevel; message: string };

export class MemoryLogger implements Logger {
  readonly lines: LogLine[] = [];

  debug(message: string): void {
    this.lines.push({ level: "debug", message });
  }
  info(message: string): void {
    this.lines.push({ level: "info", message });
  }
  warn(message: string): void {
    this.lines.push({ level: "warn", message });
  }
  error(message: string): void {
    this.lines.push({ level: "error", message });
  }

  messages(level?: LogLevel): string[] {
    return this.lines.filter((l) => !level || l.level === level).map((l) => l.message);
  }
}

export class MemoryRunLog implements RunLog {
  readonly runs: { title: string; details: Record<string, string> }[] = [];
  readonly entries: LogLine[] = [];

  beginRun(title: string, details: Record<string, string> = {}): void {
    this.runs.push({ title, details });
  }

  record(level: LogLevel, message: string): void {
    this.entries.push({ level, message });
  }
}
