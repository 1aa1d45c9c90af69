// biome-ignore lint/performance/noBarrelFile: Public API entry point for logging module
export { createLogger, type ToolkitLogger } from "./create-log";
export {
  createLog,
  formatChunkName,
  getLogMode,
  type Log,
  type LoggerConfig,
  type LogLevel,
  type LogMode,
  resolveLogPath,
} from "./logger";
