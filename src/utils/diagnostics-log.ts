import type { ToolkitLogger } from "@/logging";

interface CreateDiagnosticsLogParams {
  diagnostics?: boolean;
  logger?: ToolkitLogger;
}

/**
 * Creates a diagnostics log function for toolkit internals.
 * Writes through the toolkit logger when one is given, falls back to console.log,
 * and is a no-op unless the diagnostics flag is set.
 *
 * @param prefix - Component identifier e.g. "Uploads", "JSON", "RemotePush"
 * @returns A log function: (message, data?) => void
 */
export function createDiagnosticsLog(
  prefix: string,
  params: CreateDiagnosticsLogParams
): (message: string, data?: unknown) => void {
  if (!params.diagnostics) {
    // biome-ignore lint/suspicious/noEmptyBlockStatements: intentional no-op when diagnostics disabled
    return () => {};
  }

  const { logger } = params;

  return (message: string, data?: unknown) => {
    if (!logger) {
      console.log(`[${prefix}] ${message}`, data ?? "");
      return;
    }

    logger.info({
      atFunction: prefix,
      message: `[${prefix}] ${message}`,
      data,
    });
  };
}
