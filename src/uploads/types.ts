import type { ToolkitLogger } from "@/logging";
import type { RenamePolicy } from "./rename";

export type { RequestSource } from "@/utils";

/** One persisted upload, owned by the caller once returned */
export interface UploadedFile {
  storedName: string;
  originalName: string;
  sizeBytes: number;
  /** Sniffed from the leading bytes, not taken from the client */
  contentType: string;
}

/** A file entry in a multipart body together with the field it arrived under */
export interface FilePart {
  field: string;
  file: File;
}

export type UploadError =
  | { kind: "too-large"; message: string; limit: number }
  | { kind: "malformed"; message: string }
  | { kind: "type-not-permitted"; message: string; detected: string }
  | { kind: "io"; message: string }
  | { kind: "no-files"; message: string };

/**
 * Outcome of an upload call.
 * On failure, `data` still lists the files persisted before the failing part;
 * they stay on disk.
 */
export type UploadResult<T> =
  | { status: true; data: T }
  | { status: false; error: UploadError; data: UploadedFile[] };

export interface UploadOptions {
  /** Destination directory, created when missing */
  directory: string;
  /** How stored names are derived. Default: keepOriginal */
  rename?: RenamePolicy;
  /** Sniffed MIME types to accept; empty or omitted accepts everything */
  allowedFileTypes?: readonly string[];
  /** Ceiling on the whole multipart body in bytes */
  maxUploadBytes?: number;
  logger?: ToolkitLogger;
  diagnostics?: boolean;
}
