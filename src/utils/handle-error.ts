import { createLogger, type ToolkitLogger } from "@/logging";
import { type Err, err } from "./safe-try";

/**
 * Parameters for the handleError utility.
 *
 * @property message - Human-readable error description, included in the returned Err string
 * @property data - Optional structured data logged alongside the error
 * @property logger - Logger to write through; the default toolkit logger when omitted
 * @property atFunction - Name of the calling function for log attribution; inferred from the stack when omitted
 */
export interface HandleErrorParams {
  message: string;
  data?: unknown;
  logger?: ToolkitLogger;
  atFunction?: string;
}

export const DEFAULT_APP_NAME = "web-toolkit";

const CALLER_LINE_REGEX = /at\s+(\S+)\s+/;

function inferCallerName(): string {
  const stack = new Error("capture stack trace").stack;
  const callerLine = stack?.split("\n")[3] ?? "";
  const match = callerLine.match(CALLER_LINE_REGEX);
  return match?.[1] ?? "unknown";
}

let fallbackLogger: ToolkitLogger | null = null;

function resolveLogger(explicit?: ToolkitLogger): ToolkitLogger {
  if (explicit) {
    return explicit;
  }
  fallbackLogger ??= createLogger(DEFAULT_APP_NAME);
  return fallbackLogger;
}

/**
 * Logs an error and returns it as an Err result.
 * The error string carries the log ID for traceability: `[logId] message`.
 *
 * @example
 * ```typescript
 * if (created.isErr) {
 *   return handleError({
 *     message: "could not create upload directory",
 *     data: { path },
 *     atFunction: "ensureDirectory",
 *   });
 * }
 * ```
 */
export function handleError(params: HandleErrorParams): Err<string> {
  const atFunction = params.atFunction ?? inferCallerName();
  const logger = resolveLogger(params.logger);
  const logId = logger.error({
    atFunction,
    message: params.message,
    data: params.data,
  });
  return err(`[${logId}] ${params.message}`);
}
