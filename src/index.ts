// Toolkit facade: one configuration snapshot bound to every operation
export {
  createToolkit,
  type ResolvedToolkitConfig,
  resolveToolkitConfig,
  type Toolkit,
  type ToolkitConfig,
  toolkitConfigSchema,
  type ToolkitPushOptions,
  type ToolkitUploadOptions,
} from "./toolkit";

// Uploads: multipart persistence with content sniffing and rename policies
export {
  DEFAULT_MAX_UPLOAD_BYTES,
  detectContentType,
  isContentTypeAllowed,
  RENAME_POLICIES,
  type RenamePolicy,
  type UploadedFile,
  type UploadError,
  type UploadOptions,
  type UploadResult,
  uploadFiles,
  uploadOneFile,
} from "./uploads";

// JSON: strict request decoding and envelope responses
export {
  DEFAULT_MAX_JSON_BYTES,
  type DecodeResult,
  type ErrorLike,
  errorJSON,
  type JSONDecodeError,
  type JSONEnvelope,
  type ReadJSONOptions,
  readJSON,
  successJSON,
  type WriteJSONOptions,
  writeJSON,
} from "./json";

// Standalone helpers
export { type DownloadOptions, downloadStaticFile } from "./download";
export { DIRECTORY_MODE, ensureDirectory } from "./files";
export { RANDOM_STRING_ALPHABET, randomString } from "./random";
export {
  type FetchLike,
  type PushJSONOptions,
  type PushJSONResponse,
  pushJSONToRemote,
} from "./remote";
export { slugify } from "./slug";

// Logging: structured log persistence with chunking support
export {
  createLog,
  createLogger,
  type Log,
  type LoggerConfig,
  type LogMode,
  type ToolkitLogger,
} from "./logging";

// Utilities: results and error handling
export {
  err,
  handleError,
  ok,
  type RequestSource,
  type Result,
  safeTry,
} from "./utils";
