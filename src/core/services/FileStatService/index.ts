export {
  FileStatServiceTag,
  FileStatServiceLive,
  FileNotFound,
  FilePermissionDenied,
  FileStatUnknownError
} from "./FileStatService";
export type { FileStatService, FileStatError, EntryInfo, EntryKind } from "./FileStatService";
