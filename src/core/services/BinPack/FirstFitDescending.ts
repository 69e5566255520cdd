/**
 * First-fit descending packing of files onto equally sized disks.
 *
 * Files are seated largest first; each goes to the first disk (in creation
 * order) with room for it, and a new disk is opened only when none has.
 * This is a heuristic: it does not search for the minimal number of disks.
 */

import { Data, Effect } from "effect";
import type { FileEntry } from "@domain/FileEntry";
import { MAX_DISK_ID, canFit, usedBytes, type Disk } from "@domain/Disk";

export class TooManyDisks extends Data.TaggedError("TooManyDisks")<{
  readonly count: number;
  readonly limit: number;
}> {}

export interface PackSummary {
  readonly diskCount: number;
  readonly fileCount: number;
  readonly totalBytes: number;
  /** Free space left over on all disks together */
  readonly wastedBytes: number;
}

interface DiskState {
  readonly id: number;
  readonly files: FileEntry[];
  freeBytes: number;
}

const bySizeDescending = (a: FileEntry, b: FileEntry): number => b.sizeBytes - a.sizeBytes;

/**
 * Pack files onto disks of `capacityBytes` each.
 *
 * Every file must already be no larger than the capacity. Ids are numbered
 * from 1 within this call, so separate calls never share a counter.
 */
export const packFiles = (files: readonly FileEntry[], capacityBytes: number): Disk[] => {
  const disks: DiskState[] = [];

  // Array.prototype.sort is stable: equal sizes keep their discovery order.
  for (const file of [...files].sort(bySizeDescending)) {
    const target = disks.find((disk) => canFit(disk, file.sizeBytes));

    if (target) {
      target.files.push(file);
      target.freeBytes -= file.sizeBytes;
    } else {
      disks.push({
        id: disks.length + 1,
        files: [file],
        freeBytes: capacityBytes - file.sizeBytes
      });
    }
  }

  return disks.map((disk) => ({
    id: disk.id,
    capacityBytes,
    freeBytes: disk.freeBytes,
    files: disk.files
  }));
};

/** Pack, failing when the result needs more disks than can be named. */
export const packWithinLimit = (
  files: readonly FileEntry[],
  capacityBytes: number
): Effect.Effect<Disk[], TooManyDisks> =>
  Effect.suspend(() => {
    const disks = packFiles(files, capacityBytes);
    return disks.length > MAX_DISK_ID
      ? Effect.fail(new TooManyDisks({ count: disks.length, limit: MAX_DISK_ID }))
      : Effect.succeed(disks);
  });

export const summarize = (disks: readonly Disk[]): PackSummary => ({
  diskCount: disks.length,
  fileCount: disks.reduce((sum, disk) => sum + disk.files.length, 0),
  totalBytes: disks.reduce((sum, disk) => sum + usedBytes(disk), 0),
  wastedBytes: disks.reduce((sum, disk) => sum + disk.freeBytes, 0)
});
