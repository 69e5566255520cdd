import { Context, Data, Effect, Layer, Match, pipe } from "effect";
import { DirectoryServiceTag, type DirectoryError } from "../DirectoryService";
import { FileStatServiceTag, type EntryInfo, type FileStatError } from "../FileStatService";
import type { FileEntry } from "@domain/FileEntry";
import { makeFileEntry } from "@domain/FileEntry";
import { joinPath } from "@lib/normalizePath";

export class ScanPathNotFound extends Data.TaggedError("ScanPathNotFound")<{
  readonly path: string;
}> {}

export class ScanPermissionDenied extends Data.TaggedError("ScanPermissionDenied")<{
  readonly path: string;
}> {}

export class ScanNotADirectory extends Data.TaggedError("ScanNotADirectory")<{
  readonly path: string;
}> {}

export class ScanFailed extends Data.TaggedError("ScanFailed")<{
  readonly path: string;
  readonly reason: string;
}> {}

export class FileStatFailed extends Data.TaggedError("FileStatFailed")<{
  readonly path: string;
  readonly reason: string;
}> {}

/** A file no disk of the configured size could ever hold. */
export class FileTooLarge extends Data.TaggedError("FileTooLarge")<{
  readonly path: string;
  readonly sizeBytes: number;
  readonly capacityBytes: number;
}> {}

/** Neither a regular file nor a directory: a FIFO, socket or device. */
export class UnsupportedEntry extends Data.TaggedError("UnsupportedEntry")<{
  readonly path: string;
  readonly type: string;
}> {}

export type CollectorError =
  | ScanPathNotFound
  | ScanPermissionDenied
  | ScanNotADirectory
  | ScanFailed
  | FileStatFailed
  | FileTooLarge
  | UnsupportedEntry;

const fromDirectoryError = Match.typeTags<DirectoryError>()({
  DirectoryNotFound: (e) => new ScanPathNotFound({ path: e.path }),
  DirectoryPermissionDenied: (e) => new ScanPermissionDenied({ path: e.path }),
  DirectoryReadFailed: (e) => new ScanFailed({ path: e.path, reason: e.cause })
});

const fromFileStatError = (path: string) =>
  Match.typeTags<FileStatError>()({
    FileNotFound: () => new ScanPathNotFound({ path }),
    FilePermissionDenied: () => new ScanPermissionDenied({ path }),
    FileStatUnknownError: (e) => new FileStatFailed({ path, reason: e.cause })
  });

export interface CollectOptions {
  /** Descend into directories below the root */
  readonly recursive: boolean;
  /** Size of one disk; any larger file stops the collection */
  readonly capacityBytes: number;
}

export interface CollectorService {
  readonly collect: (
    root: string,
    options: CollectOptions
  ) => Effect.Effect<FileEntry[], CollectorError>;

  /** Collect each root in turn into one collection, in root order. */
  readonly collectAll: (
    roots: readonly string[],
    options: CollectOptions
  ) => Effect.Effect<FileEntry[], CollectorError>;
}

export class CollectorServiceTag extends Context.Tag("CollectorService")<
  CollectorServiceTag,
  CollectorService
>() {}

export const CollectorServiceLive = Layer.effect(
  CollectorServiceTag,
  Effect.gen(function* () {
    const directory = yield* DirectoryServiceTag;
    const fileStat = yield* FileStatServiceTag;

    const statEntry = (path: string): Effect.Effect<EntryInfo, CollectorError> =>
      pipe(fileStat.stat(path), Effect.mapError(fromFileStatError(path)));

    const listDirectory = (path: string): Effect.Effect<string[], CollectorError> =>
      pipe(directory.list(path), Effect.mapError(fromDirectoryError));

    const visitEntry = (
      path: string,
      options: CollectOptions
    ): Effect.Effect<FileEntry[], CollectorError> =>
      Effect.flatMap(statEntry(path), (info): Effect.Effect<FileEntry[], CollectorError> => {
        switch (info.kind) {
          case "file":
            return info.sizeBytes > options.capacityBytes
              ? Effect.fail(
                  new FileTooLarge({
                    path,
                    sizeBytes: info.sizeBytes,
                    capacityBytes: options.capacityBytes
                  })
                )
              : Effect.succeed([makeFileEntry(path, info.sizeBytes)]);
          case "directory":
            return options.recursive ? walkDirectory(path, options) : Effect.succeed([]);
          case "other":
            return Effect.fail(new UnsupportedEntry({ path, type: info.type }));
        }
      });

    const walkDirectory = (
      path: string,
      options: CollectOptions
    ): Effect.Effect<FileEntry[], CollectorError> =>
      pipe(
        listDirectory(path),
        Effect.flatMap((names) =>
          Effect.forEach(names, (name) => visitEntry(joinPath(path, name), options))
        ),
        Effect.map((nested) => nested.flat()),
        Effect.tap((files) => Effect.logDebug(`Collected ${files.length} files under ${path}`))
      );

    const collect: CollectorService["collect"] = (root, options) =>
      pipe(
        statEntry(root),
        Effect.filterOrFail(
          (info) => info.kind === "directory",
          () => new ScanNotADirectory({ path: root })
        ),
        Effect.flatMap(() => walkDirectory(root, options))
      );

    const collectAll: CollectorService["collectAll"] = (roots, options) =>
      pipe(
        Effect.forEach(roots, (root) => collect(root, options)),
        Effect.map((nested) => nested.flat())
      );

    return { collect, collectAll };
  })
);
