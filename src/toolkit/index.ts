export {
  resolveToolkitConfig,
  type ToolkitConfig,
  toolkitConfigSchema,
} from "./config";
export { createToolkit } from "./toolkit";
export type {
  ResolvedToolkitConfig,
  Toolkit,
  ToolkitPushOptions,
  ToolkitUploadOptions,
} from "./types";
