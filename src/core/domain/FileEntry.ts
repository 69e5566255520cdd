import { joinPath } from "@lib/normalizePath";

export interface FileEntry {
  readonly path: string;
  readonly sizeBytes: number;
}

export const makeFileEntry = (path: string, sizeBytes: number): FileEntry => ({ path, sizeBytes });

/** Where a file lands inside a disk directory; its own path is kept below it. */
export const destinationPath = (file: FileEntry, diskDir: string): string =>
  joinPath(diskDir, file.path);
