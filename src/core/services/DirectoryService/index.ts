export {
  DirectoryServiceTag,
  DirectoryServiceLive,
  DirectoryNotFound,
  DirectoryPermissionDenied,
  DirectoryReadFailed
} from "./DirectoryService";
export type { DirectoryService, DirectoryError } from "./DirectoryService";
