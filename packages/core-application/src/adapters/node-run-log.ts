import fs from "node:fs";
import path from "node:path";

import type { LogLevel } from "../ports/logger";
import type { RunLog } from "../ports/run-log";
import type { Clock } from "../ports/clock";
import { formatTimestamp } from "../application/format-timestamp";
import { SystemClock } from "./system-clock";

const SEPARATOR = "--------------------------------";

export function formatRunLogEntry(level: LogLevel, message: string): string | null {
  switch (level) {
    case "debug":
      return null;
    case "info":
      return `- ${message}\n`;
    case "warn":
      return `- *WARN*: ${message}\n`;
    case "error":
      return `- *ERROR*: ${message}\n`;
  }
}

/**
 * Markdown run log appended to a single file. Writes are synchronous so that
 * an interrupted run still leaves every line recorded before the interruption.
 */
export class NodeRunLog implements RunLog {
  constructor(
    private readonly filePath: string,
    private readonly clock: Clock = new SystemClock()
  ) {}

  private append(text: string): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.appendFileSync(this.filePath, text, "utf-8");
  }

  beginRun(title: string, details: Record<string, string> = {}): void {
    const lines = [
      "",
      "",
      SEPARATOR,
      "",
      `**${title}:**`,
      formatTimestamp(this.clock.now()),
      ...Object.entries(details).map(([k, v]) => `${k}: ${v}`),
      "",
    ];
    this.append(lines.join("\n") + "\n");
  }

  record(level: LogLevel, message: string): void {
    const line = formatRunLogEntry(level, message);
    if (line) this.append(line);
  }
}
