import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { ZodType } from "zod";
import type { DownloadOptions } from "@/download";
import type { DecodeResult, ErrorLike } from "@/json";
import type { ToolkitLogger } from "@/logging";
import type { PushJSONOptions, PushJSONResponse } from "@/remote";
import type { UploadedFile, UploadOptions, UploadResult } from "@/uploads";
import type { RequestSource, Result } from "@/utils";

/** Configuration snapshot every toolkit operation reads; frozen at creation */
export interface ResolvedToolkitConfig {
  readonly allowedFileTypes: readonly string[];
  readonly maxUploadBytes: number;
  readonly maxJSONBytes: number;
  readonly allowUnknownJSONFields: boolean;
  readonly logger: ToolkitLogger;
  readonly diagnostics: boolean;
}

/** Per-call upload settings; limits and the type allowlist come from the config */
export type ToolkitUploadOptions = Pick<UploadOptions, "directory" | "rename">;

/** Per-call push settings; logging comes from the config */
export type ToolkitPushOptions = Omit<PushJSONOptions, "logger" | "diagnostics">;

export interface Toolkit {
  readonly config: ResolvedToolkitConfig;
  randomString: (length: number) => string;
  uploadFiles: (
    c: RequestSource,
    options: ToolkitUploadOptions
  ) => Promise<UploadResult<UploadedFile[]>>;
  uploadOneFile: (
    c: RequestSource,
    options: ToolkitUploadOptions
  ) => Promise<UploadResult<UploadedFile>>;
  ensureDirectory: (path: string) => Promise<Result<string, string>>;
  slugify: (text: string) => Result<string, string>;
  downloadStaticFile: (
    c: Context,
    options: DownloadOptions
  ) => Promise<Response>;
  readJSON: <T>(c: RequestSource, schema: ZodType<T>) => Promise<DecodeResult<T>>;
  writeJSON: (
    c: Context,
    status: ContentfulStatusCode,
    data: unknown,
    headers?: HeadersInit
  ) => Result<Response, string>;
  errorJSON: (
    c: Context,
    error: ErrorLike,
    status?: ContentfulStatusCode
  ) => Result<Response, string>;
  successJSON: <T>(
    c: Context,
    message: string,
    data?: T,
    status?: ContentfulStatusCode
  ) => Result<Response, string>;
  pushJSONToRemote: (
    uri: string,
    data: unknown,
    options?: ToolkitPushOptions
  ) => Promise<Result<PushJSONResponse, string>>;
}
