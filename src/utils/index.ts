export { createDiagnosticsLog } from "./diagnostics-log";
export {
  DEFAULT_APP_NAME,
  type HandleErrorParams,
  handleError,
} from "./handle-error";
export {
  describeError,
  type Err,
  err,
  ok,
  type Result,
  safeTry,
  safeTrySync,
} from "./safe-try";
export {
  type BodyReadError,
  type RequestSource,
  readBodyWithLimit,
} from "./read-body";
