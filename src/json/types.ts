import type { ToolkitLogger } from "@/logging";

/** Wire shape of every envelope response */
export interface JSONEnvelope<T = unknown> {
  error: boolean;
  message: string;
  data?: T;
}

/** Every way decoding a request body can fail */
export type JSONDecodeError =
  | { kind: "too-large"; message: string; limit: number }
  | { kind: "empty-body"; message: string }
  | { kind: "syntax"; message: string; offset: number }
  | { kind: "truncated"; message: string }
  | { kind: "unknown-field"; message: string; field: string }
  | {
      kind: "type-mismatch";
      message: string;
      field: string | null;
      offset: number | null;
    }
  | { kind: "multiple-values"; message: string }
  | { kind: "invalid"; message: string };

export type DecodeResult<T> =
  | { status: true; data: T }
  | { status: false; error: JSONDecodeError };

export interface ReadJSONOptions {
  /** Body ceiling in bytes. Default: 1 MiB */
  maxBytes?: number;
  /** Accept keys the schema does not describe. Default: false */
  allowUnknownFields?: boolean;
  logger?: ToolkitLogger;
  diagnostics?: boolean;
}

export interface WriteJSONOptions {
  /** Extra response headers, applied before Content-Type */
  headers?: HeadersInit;
  logger?: ToolkitLogger;
}
