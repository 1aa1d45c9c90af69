import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { nanoid } from "nanoid";
import pino, { type Logger } from "pino";

export type LogLevel = "info" | "warn" | "error";

export interface Log {
  atFunction: string;
  appName: string;
  message: string;
  data?: unknown;
  level?: LogLevel;
  log_id?: string;
}

/** Configuration for log file chunking behavior */
export interface LoggerConfig {
  /** Time-based chunking strategy. Default: 'none' (single file per app) */
  chunking?: "monthly" | "daily" | "weekly" | "none";
}

export type LogMode = "prod" | "agentic" | "dev";

const LOG_MODES: readonly LogMode[] = ["prod", "agentic", "dev"];

/** Reads LOG_MODE lazily so tests and hosts can set it after import */
export function getLogMode(): LogMode {
  const raw = process.env.LOG_MODE ?? "dev";
  const mode = LOG_MODES.find((m) => m === raw);
  if (!mode) {
    throw new Error(
      `Invalid LOG_MODE "${raw}", expected one of ${LOG_MODES.join(", ")}`
    );
  }
  return mode;
}

const logDir = join(process.cwd(), "logs");

function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Resolves the correct log file path based on app name and chunking config.
 * - 'none' (default): logs/{appName}.log
 * - 'monthly': logs/{appName}/YYYY-MM.log
 * - 'daily': logs/{appName}/YYYY-MM-DD.log
 * - 'weekly': logs/{appName}/YYYY-WNN.log (ISO week number)
 */
export function resolveLogPath(appName: string, config?: LoggerConfig): string {
  const chunking = config?.chunking ?? "none";

  if (chunking === "none") {
    ensureDir(logDir);
    return join(logDir, `${appName}.log`);
  }

  const appDir = join(logDir, appName);
  ensureDir(appDir);

  const chunk = formatChunkName(new Date(), chunking);
  return join(appDir, `${chunk}.log`);
}

/** Formats a date into the chunk filename for the given strategy */
export function formatChunkName(
  date: Date,
  chunking: "monthly" | "daily" | "weekly"
): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");

  if (chunking === "monthly") {
    return `${year}-${month}`;
  }

  if (chunking === "daily") {
    const day = String(date.getDate()).padStart(2, "0");
    return `${year}-${month}-${day}`;
  }

  const weekNum = getISOWeekNumber(date);
  return `${year}-W${String(weekNum).padStart(2, "0")}`;
}

/** Returns the ISO 8601 week number for a given date */
function getISOWeekNumber(date: Date): number {
  const target = new Date(date.valueOf());
  // Nearest Thursday, Sunday counted as day 7
  const dayNum = target.getDay() || 7;
  target.setDate(target.getDate() + 4 - dayNum);
  const yearStart = new Date(target.getFullYear(), 0, 1);
  return Math.ceil(
    ((target.getTime() - yearStart.getTime()) / 86_400_000 + 1) / 7
  );
}

interface AppLogger {
  logFile: string;
  logger: Logger;
  transport: ReturnType<typeof pino.transport>;
}

const appLoggers = new Map<string, AppLogger>();

/**
 * Returns a pino logger writing to the resolved log file path.
 * One transport per app and chunking strategy; when the chunk rolls over the
 * previous transport is ended and replaced.
 */
function getLoggerForApp(appName: string, config?: LoggerConfig): Logger {
  const logFile = resolveLogPath(appName, config);
  const key = `${appName}:${config?.chunking ?? "none"}`;
  const cached = appLoggers.get(key);
  if (cached?.logFile === logFile) {
    return cached.logger;
  }
  cached?.transport.end();

  const transport = pino.transport({
    targets: [
      {
        level: "info",
        target: "pino/file",
        options: {
          destination: logFile,
          mkdir: true,
        },
      },
    ],
  });

  const logger = pino(
    {
      base: null,
      timestamp: () => `,"time":"${new Date().toISOString()}"`,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    transport
  );
  appLoggers.set(key, { logFile, logger, transport });
  return logger;
}

/**
 * Creates a new log entry.
 * @returns The generated log ID (or the JSON record in agentic mode)
 * @throws {Error} If appName is missing in the log object
 */
export const createLog = (log: Log, config?: LoggerConfig): string => {
  if (!log.appName) {
    throw new Error(`Missing appName in log: ${JSON.stringify(log)}`);
  }

  const level = log.level ?? "info";
  const log_id = log.log_id ?? nanoid(6);

  const logRecord = {
    log_id,
    appName: log.appName,
    atFunction: log.atFunction,
    message: log.message,
    data: log.data ?? null,
    level,
    time: new Date().toISOString(),
  };

  if (process.env.NODE_ENV === "test") {
    // Synchronous so the file is readable as soon as the call returns
    appendFileSync(
      resolveLogPath(log.appName, config),
      `${JSON.stringify(logRecord)}\n`,
      "utf-8"
    );
    return log_id;
  }

  const mode = getLogMode();

  if (mode === "prod") {
    getLoggerForApp(log.appName, config)[level](logRecord);
    return log_id;
  }

  if (mode === "agentic") {
    return JSON.stringify(logRecord);
  }

  console.log({
    ...logRecord,
    data: JSON.stringify(logRecord.data, null, 2),
  });
  return log_id;
};
