import { open } from "node:fs/promises";
import { join } from "node:path";
import { ensureDirectory } from "@/files/ensure-directory";
import { randomString } from "@/random/random-string";
import {
  createDiagnosticsLog,
  describeError,
  handleError,
  type Result,
  safeTry,
  safeTrySync,
} from "@/utils";
import { collectFileParts, parseMultipartBody } from "./parse-formdata";
import { resolveRenamePolicy, type RenamePolicy, storedNameFor } from "./rename";
import {
  detectContentType,
  isContentTypeAllowed,
  SNIFF_LENGTH,
} from "./sniff-content-type";
import type {
  FilePart,
  RequestSource,
  UploadError,
  UploadedFile,
  UploadOptions,
  UploadResult,
} from "./types";

/** 1 GiB */
export const DEFAULT_MAX_UPLOAD_BYTES = 1024 * 1024 * 1024;

interface PartContext {
  directory: string;
  policy: RenamePolicy;
  allowedFileTypes: readonly string[];
  options: UploadOptions;
}

/** Writes all bytes of a part to a new file, closing the handle on every path */
async function writePart(
  destination: string,
  file: File,
  options: UploadOptions
): Promise<Result<number, string>> {
  const opened = await safeTry(() => open(destination, "w"));
  if (opened.isErr) {
    return handleError({
      message: `could not create file ${destination}: ${describeError(opened.error)}`,
      data: { destination },
      logger: options.logger,
      atFunction: "uploadFiles",
    });
  }

  const handle = opened.value;
  const written = await safeTry(async () => {
    const bytes = new Uint8Array(await file.arrayBuffer());
    await handle.writeFile(bytes);
    return bytes.byteLength;
  }).finally(() => handle.close());

  if (written.isErr) {
    return handleError({
      message: `could not write file ${destination}: ${describeError(written.error)}`,
      data: { destination },
      logger: options.logger,
      atFunction: "uploadFiles",
    });
  }
  return written;
}

type PartResult =
  | { status: true; data: UploadedFile }
  | { status: false; error: UploadError };

/** Sniff, check, name and persist a single part */
async function processPart(
  part: FilePart,
  context: PartContext
): Promise<PartResult> {
  const { file } = part;
  const head = new Uint8Array(await file.slice(0, SNIFF_LENGTH).arrayBuffer());
  const contentType = detectContentType(head);

  if (!isContentTypeAllowed(contentType, context.allowedFileTypes)) {
    return {
      status: false,
      error: {
        kind: "type-not-permitted",
        message: "the uploaded file type is not permitted",
        detected: contentType,
      },
    };
  }

  const named = safeTrySync(() =>
    storedNameFor(file.name, context.policy, (length) =>
      randomString(length, { logger: context.options.logger })
    )
  );
  if (named.isErr) {
    const failure = handleError({
      message: `could not name stored file: ${describeError(named.error)}`,
      data: { originalName: file.name },
      logger: context.options.logger,
      atFunction: "uploadFiles",
    });
    return { status: false, error: { kind: "io", message: failure.error } };
  }
  const storedName = named.value;
  const written = await writePart(
    join(context.directory, storedName),
    file,
    context.options
  );
  if (written.isErr) {
    return { status: false, error: { kind: "io", message: written.error } };
  }

  return {
    status: true,
    data: {
      storedName,
      originalName: file.name,
      sizeBytes: written.value,
      contentType,
    },
  };
}

/**
 * Persists every file part of a multipart request into `options.directory`.
 *
 * Parts are checked against the sniffed content type and written one by one.
 * Processing stops at the first failing part; files written before it are
 * kept and returned alongside the error.
 *
 * @example
 * ```typescript
 * app.post("/upload", async (c) => {
 *   const result = await uploadFiles(c, {
 *     directory: "./uploads",
 *     rename: "normalizeLowercase",
 *     allowedFileTypes: ["image/png", "image/jpeg"],
 *   });
 *   if (!result.status) {
 *     return errorJSON(c, result.error);
 *   }
 *   return successJSON(c, "uploaded", result.data);
 * });
 * ```
 */
export async function uploadFiles(
  c: RequestSource,
  options: UploadOptions
): Promise<UploadResult<UploadedFile[]>> {
  const log = createDiagnosticsLog("Uploads", {
    diagnostics: options.diagnostics,
    logger: options.logger,
  });
  const maxBytes = options.maxUploadBytes || DEFAULT_MAX_UPLOAD_BYTES;

  const directory = await ensureDirectory(options.directory, {
    logger: options.logger,
  });
  if (directory.isErr) {
    return {
      status: false,
      error: { kind: "io", message: directory.error },
      data: [],
    };
  }

  const parsed = await parseMultipartBody(c, maxBytes);
  if (!parsed.status) {
    log(parsed.error.message);
    return { status: false, error: parsed.error, data: [] };
  }

  const parts = collectFileParts(parsed.data);
  log(`Received ${parts.length} file part(s)`);

  const context: PartContext = {
    directory: options.directory,
    policy: resolveRenamePolicy(options.rename),
    allowedFileTypes: options.allowedFileTypes ?? [],
    options,
  };

  const uploaded: UploadedFile[] = [];
  for (const part of parts) {
    const result = await processPart(part, context);
    if (!result.status) {
      log(`Stopped at ${part.field}/${part.file.name}`, result.error);
      return { status: false, error: result.error, data: uploaded };
    }
    log(`Stored ${result.data.storedName}`, result.data);
    uploaded.push(result.data);
  }

  return { status: true, data: uploaded };
}

/**
 * Same as uploadFiles, returning only the first persisted file.
 * Fails with no-files when the request carries no file part.
 */
export async function uploadOneFile(
  c: RequestSource,
  options: UploadOptions
): Promise<UploadResult<UploadedFile>> {
  const result = await uploadFiles(c, options);
  if (!result.status) {
    return result;
  }

  const [first] = result.data;
  if (!first) {
    return {
      status: false,
      error: { kind: "no-files", message: "no file was uploaded" },
      data: [],
    };
  }

  return { status: true, data: first };
}
