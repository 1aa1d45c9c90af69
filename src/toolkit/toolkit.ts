import { downloadStaticFile } from "@/download";
import { ensureDirectory } from "@/files";
import { errorJSON, readJSON, successJSON, writeJSON } from "@/json";
import { randomString } from "@/random";
import { pushJSONToRemote } from "@/remote";
import { slugify } from "@/slug";
import { uploadFiles, uploadOneFile } from "@/uploads";
import { createDiagnosticsLog } from "@/utils";
import { resolveToolkitConfig, type ToolkitConfig } from "./config";
import type { Toolkit, ToolkitUploadOptions } from "./types";

/**
 * Creates a toolkit bound to one configuration snapshot.
 *
 * Limits, the upload type allowlist, the logger and the diagnostics flag are
 * resolved once here and passed to every operation. Each operation is also
 * exported on its own for callers that prefer explicit options.
 *
 * @example
 * ```typescript
 * const toolkit = createToolkit({
 *   allowedFileTypes: ["image/png", "image/jpeg"],
 *   maxUploadBytes: 10 * 1024 * 1024,
 * });
 *
 * app.post("/avatars", async (c) => {
 *   const upload = await toolkit.uploadOneFile(c, {
 *     directory: "./storage/avatars",
 *     rename: "randomName",
 *   });
 *   if (!upload.status) {
 *     return toolkit.errorJSON(c, upload.error).value ?? c.text("error", 500);
 *   }
 *   return toolkit.successJSON(c, "stored", upload.data).value ?? c.text("error", 500);
 * });
 * ```
 */
export function createToolkit(input: ToolkitConfig = {}): Toolkit {
  const config = resolveToolkitConfig(input);
  const { logger, diagnostics } = config;

  const log = createDiagnosticsLog("Toolkit", { diagnostics, logger });
  log("Created", {
    allowedFileTypes: config.allowedFileTypes,
    maxUploadBytes: config.maxUploadBytes,
    maxJSONBytes: config.maxJSONBytes,
    allowUnknownJSONFields: config.allowUnknownJSONFields,
  });

  const uploadOptions = (options: ToolkitUploadOptions) => ({
    ...options,
    allowedFileTypes: config.allowedFileTypes,
    maxUploadBytes: config.maxUploadBytes,
    logger,
    diagnostics,
  });

  return {
    config,
    randomString: (length) => randomString(length, { logger }),
    uploadFiles: (c, options) => uploadFiles(c, uploadOptions(options)),
    uploadOneFile: (c, options) => uploadOneFile(c, uploadOptions(options)),
    ensureDirectory: (path) => ensureDirectory(path, { logger }),
    slugify,
    downloadStaticFile,
    readJSON: (c, schema) =>
      readJSON(c, schema, {
        maxBytes: config.maxJSONBytes,
        allowUnknownFields: config.allowUnknownJSONFields,
        logger,
        diagnostics,
      }),
    writeJSON: (c, status, data, headers) =>
      writeJSON(c, status, data, { headers, logger }),
    errorJSON: (c, error, status) => errorJSON(c, error, status, { logger }),
    successJSON: (c, message, data, status) =>
      successJSON(c, message, data, status, { logger }),
    pushJSONToRemote: (uri, data, options = {}) =>
      pushJSONToRemote(uri, data, { ...options, logger, diagnostics }),
  };
}
