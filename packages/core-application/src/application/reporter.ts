import type { Logger, LogLevel } from "../ports/logger";
import type { RunLog } from "../ports/run-log";

/** Logger that writes each message to the console logger and the run log. */
export function createReporter(logger: Logger, runLog: RunLog): Logger {
  const emit = (level: LogLevel, message: string) => {
    logger[level](message);
    runLog.record(level, message);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}
