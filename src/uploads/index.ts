export { collectFileParts, parseMultipartBody } from "./parse-formdata";
export {
  baseFileName,
  RANDOM_NAME_LENGTH,
  RENAME_POLICIES,
  type RenamePolicy,
  resolveRenamePolicy,
  storedNameFor,
} from "./rename";
export {
  detectContentType,
  isContentTypeAllowed,
  OCTET_STREAM,
  SNIFF_LENGTH,
  TEXT_PLAIN,
} from "./sniff-content-type";
export type {
  FilePart,
  RequestSource,
  UploadedFile,
  UploadError,
  UploadOptions,
  UploadResult,
} from "./types";
export {
  DEFAULT_MAX_UPLOAD_BYTES,
  uploadFiles,
  uploadOneFile,
} from "./upload-files";
