import { formatSize } from "@lib/parseSize";
import type { Disk } from "./Disk";
import { freePercent } from "./Disk";
import type { FileEntry } from "./FileEntry";

export const diskHeader = (disk: Disk): string =>
  `Disk #${disk.id}, ${freePercent(disk)}% (${formatSize(disk.freeBytes)}) free:`;

export const fileLine = (file: FileEntry): string =>
  `${formatSize(file.sizeBytes).padStart(10)} ${file.path}`;

export const renderDisk = (disk: Disk): string[] => {
  const header = diskHeader(disk);
  const rule = "-".repeat(header.length);
  return [rule, header, rule, ...disk.files.map(fileLine), ""];
};

export const linkedLine = (file: FileEntry, diskDir: string): string =>
  `${file.path} -> ${diskDir}`;

export const diskCountLine = (count: number): string =>
  `${count} disk${count > 1 ? "s" : ""}.`;
