import { Data, Effect, Layer, pipe } from "effect";
import { NodeContext } from "@effect/platform-node";

export type { FileEntry } from "./domain/FileEntry";
export type { Disk } from "./domain/Disk";
export type { PackSummary } from "./services/BinPack";

export type { SizeError } from "./lib/parseSize";
export { InvalidSize, UnknownSizeUnit, DiskSizeTooSmall, DiskSizeTooLarge } from "./lib/parseSize";

export type {
  CollectorError,
  ScanPathNotFound,
  ScanPermissionDenied,
  ScanNotADirectory,
  ScanFailed,
  FileStatFailed,
  FileTooLarge,
  UnsupportedEntry
} from "./services/CollectorService";

export type {
  LinkError,
  LinkNotADirectory,
  MakeDirectoryFailed,
  LinkFailed,
  DiskIdOutOfRange
} from "./services/LinkService";

export type { TooManyDisks } from "./services/BinPack";

import { CollectorServiceTag, CollectorServiceLive } from "./services/CollectorService";
import { DirectoryServiceLive } from "./services/DirectoryService";
import { FileStatServiceLive } from "./services/FileStatService";
import { LinkServiceTag, LinkServiceLive } from "./services/LinkService";
import { LoggerServiceTag, LoggerServiceLive } from "./services/LoggerService";
import { packWithinLimit, summarize, type PackSummary } from "./services/BinPack";
import type { Disk } from "./domain/Disk";
import { formatSize } from "./lib/parseSize";

/** What to do with the packed disks. Counting wins over linking. */
export type FitMode =
  | { readonly _tag: "Report" }
  | { readonly _tag: "Count" }
  | { readonly _tag: "Link"; readonly destDir: string };

export interface FitConfig {
  readonly roots: readonly string[];
  readonly capacityBytes: number;
  readonly recursive: boolean;
  readonly mode: FitMode;
}

export interface Layout {
  readonly disks: readonly Disk[];
  readonly summary: PackSummary;
}

export class NoFilesFound extends Data.TaggedError("NoFilesFound")<{
  readonly roots: readonly string[];
}> {}

export const createLayout = (config: FitConfig) =>
  Effect.gen(function* () {
    const collector = yield* CollectorServiceTag;

    const files = yield* collector.collectAll(config.roots, {
      recursive: config.recursive,
      capacityBytes: config.capacityBytes
    });
    yield* Effect.logDebug(`Collected ${files.length} files from ${config.roots.join(", ")}`);

    if (files.length === 0) {
      return yield* Effect.fail(new NoFilesFound({ roots: config.roots }));
    }

    const disks = yield* packWithinLimit(files, config.capacityBytes);
    const summary = summarize(disks);
    yield* Effect.logDebug(
      `Packed ${summary.fileCount} files (${formatSize(summary.totalBytes)}) onto ${summary.diskCount} disks of ${formatSize(config.capacityBytes)}, ${formatSize(summary.wastedBytes)} left free`
    );

    return { disks, summary } satisfies Layout;
  });

export const materialize = (disks: readonly Disk[], mode: FitMode) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag;
    const linker = yield* LinkServiceTag;

    switch (mode._tag) {
      case "Count":
        return yield* logger.count.total(disks.length);
      case "Report":
        return yield* Effect.forEach(disks, logger.report.disk, { discard: true });
      case "Link":
        return yield* Effect.forEach(
          disks,
          (disk) =>
            linker.linkDisk(disk, mode.destDir, {
              onLinked: ({ file, diskDir }) => logger.link.linked(file, diskDir)
            }),
          { discard: true }
        );
    }
  });

export const runFit = (config: FitConfig) =>
  pipe(
    createLayout(config),
    Effect.flatMap((layout) => materialize(layout.disks, config.mode))
  );

export const createAppLayer = () =>
  pipe(
    Layer.mergeAll(
      LoggerServiceLive,
      pipe(
        CollectorServiceLive,
        Layer.provide(Layer.mergeAll(DirectoryServiceLive, FileStatServiceLive))
      ),
      LinkServiceLive
    ),
    Layer.provide(NodeContext.layer)
  );

export const AppLive = createAppLayer();
