export {
  CollectorServiceTag,
  CollectorServiceLive,
  ScanPathNotFound,
  ScanPermissionDenied,
  ScanNotADirectory,
  ScanFailed,
  FileStatFailed,
  FileTooLarge,
  UnsupportedEntry
} from "./CollectorService";
export type { CollectorService, CollectorError, CollectOptions } from "./CollectorService";
