export {
  LinkServiceTag,
  LinkServiceLive,
  LinkNotADirectory,
  MakeDirectoryFailed,
  LinkFailed,
  DiskIdOutOfRange,
  directoryPrefixes
} from "./LinkService";
export type { LinkService, LinkError, LinkedFile, LinkDiskOptions } from "./LinkService";
