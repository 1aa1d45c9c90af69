import { mkdir, stat } from "node:fs/promises";
import type { ToolkitLogger } from "@/logging";
import { describeError, handleError, ok, type Result, safeTry } from "@/utils";

export const DIRECTORY_MODE = 0o755;

export interface EnsureDirectoryOptions {
  logger?: ToolkitLogger;
}

const isMissing = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Creates `path` and any missing parents when it does not exist yet.
 * An existing directory is left alone; an existing file at `path` is an error.
 */
export async function ensureDirectory(
  path: string,
  options: EnsureDirectoryOptions = {}
): Promise<Result<string, string>> {
  const existing = await safeTry(() => stat(path));

  if (existing.isOk) {
    if (existing.value.isDirectory()) {
      return ok(path);
    }
    return handleError({
      message: `path exists and is not a directory: ${path}`,
      data: { path },
      logger: options.logger,
      atFunction: "ensureDirectory",
    });
  }

  if (!isMissing(existing.error)) {
    return handleError({
      message: `could not inspect directory ${path}: ${describeError(existing.error)}`,
      data: { path },
      logger: options.logger,
      atFunction: "ensureDirectory",
    });
  }

  const created = await safeTry(() =>
    mkdir(path, { recursive: true, mode: DIRECTORY_MODE })
  );
  if (created.isErr) {
    return handleError({
      message: `could not create directory ${path}: ${describeError(created.error)}`,
      data: { path },
      logger: options.logger,
      atFunction: "ensureDirectory",
    });
  }

  return ok(path);
}
