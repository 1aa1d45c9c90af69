import { createLog, type Log, type LoggerConfig } from "./logger";

type LogInput = Omit<Log, "appName" | "level">;

/** Logger surface the toolkit writes through; each call returns the log id */
export interface ToolkitLogger {
  info: (input: LogInput) => string;
  warn: (input: LogInput) => string;
  error: (input: LogInput) => string;
}

/**
 * Creates a logger instance bound to a specific app name.
 * @param appName - Determines the log file (or directory when chunking)
 * @param config - Optional time-based chunking
 */
export const createLogger = (
  appName: string,
  config?: LoggerConfig
): ToolkitLogger => {
  return {
    info: (input) => createLog({ ...input, appName, level: "info" }, config),
    warn: (input) => createLog({ ...input, appName, level: "warn" }, config),
    error: (input) => createLog({ ...input, appName, level: "error" }, config),
  };
};
