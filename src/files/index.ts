export {
  DIRECTORY_MODE,
  type EnsureDirectoryOptions,
  ensureDirectory,
} from "./ensure-directory";
