import z, { prettifyError } from "zod";
import { DEFAULT_MAX_JSON_BYTES } from "@/json";
import { createLogger, type ToolkitLogger } from "@/logging";
import { DEFAULT_MAX_UPLOAD_BYTES } from "@/uploads";
import { DEFAULT_APP_NAME } from "@/utils";
import type { ResolvedToolkitConfig } from "./types";

const LOGGER_METHODS = ["info", "warn", "error"] as const;

function isToolkitLogger(value: unknown): value is ToolkitLogger {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const candidate = value;
  return LOGGER_METHODS.every(
    (method) => typeof Reflect.get(candidate, method) === "function"
  );
}

const byteLimit = z.number().int().nonnegative().optional();

export const toolkitConfigSchema = z.object({
  allowedFileTypes: z.array(z.string().min(1)).default([]),
  /** 0 or unset means 1 GiB */
  maxUploadBytes: byteLimit,
  /** 0 or unset means 1 MiB */
  maxJSONBytes: byteLimit,
  allowUnknownJSONFields: z.boolean().default(false),
  logger: z
    .custom<ToolkitLogger>(
      isToolkitLogger,
      "logger must provide info, warn and error functions"
    )
    .optional(),
  diagnostics: z.boolean().default(false),
});

export type ToolkitConfig = z.input<typeof toolkitConfigSchema>;

/**
 * Validates user configuration and fills in every default.
 * @throws {Error} With a readable summary when the configuration is invalid
 */
export function resolveToolkitConfig(
  input: ToolkitConfig = {}
): ResolvedToolkitConfig {
  const parsed = toolkitConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid toolkit config:\n${prettifyError(parsed.error)}`);
  }

  const config = parsed.data;
  return Object.freeze({
    allowedFileTypes: Object.freeze([...config.allowedFileTypes]),
    maxUploadBytes: config.maxUploadBytes || DEFAULT_MAX_UPLOAD_BYTES,
    maxJSONBytes: config.maxJSONBytes || DEFAULT_MAX_JSON_BYTES,
    allowUnknownJSONFields: config.allowUnknownJSONFields,
    logger: config.logger ?? createLogger(DEFAULT_APP_NAME),
    diagnostics: config.diagnostics,
  });
}
