export {
  contentDisposition,
  type DownloadOptions,
  downloadStaticFile,
} from "./download-static-file";
