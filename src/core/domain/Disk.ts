import type { FileEntry } from "./FileEntry";

/** Highest disk id the four digit directory names can represent. */
export const MAX_DISK_ID = 9999;

export interface Disk {
  readonly id: number;
  readonly capacityBytes: number;
  readonly freeBytes: number;
  readonly files: readonly FileEntry[];
}

export const usedBytes = (disk: Disk): number => disk.capacityBytes - disk.freeBytes;

export const freePercent = (disk: Disk): number =>
  Math.trunc((disk.freeBytes * 100) / disk.capacityBytes);

export const canFit = (disk: Pick<Disk, "freeBytes">, bytes: number): boolean => disk.freeBytes >= bytes;

export const diskDirectoryName = (id: number): string => String(id).padStart(4, "0");
