export { DEFAULT_MAX_JSON_BYTES, readJSON } from "./read-json";
export { MAX_NESTING_DEPTH, type ScanResult, scanJSONValue } from "./scan-json";
export type {
  DecodeResult,
  JSONDecodeError,
  JSONEnvelope,
  ReadJSONOptions,
  WriteJSONOptions,
} from "./types";
export { collectUnknownFields, findUnknownField } from "./unknown-fields";
export {
  type ErrorLike,
  errorJSON,
  successJSON,
  writeJSON,
} from "./write-json";
