/**
 * LinkService - lays a packed disk out as a tree of hardlinks.
 *
 * Each disk becomes `<destRoot>/<0001..9999>`, and each of its files is
 * linked below that directory under its own path. No file contents are
 * copied, nothing is renamed or removed.
 */

import { Context, Data, Effect, Layer, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import type { Disk } from "@domain/Disk";
import { MAX_DISK_ID, diskDirectoryName } from "@domain/Disk";
import type { FileEntry } from "@domain/FileEntry";
import { destinationPath } from "@domain/FileEntry";
import { joinPath } from "@lib/normalizePath";

// =============================================================================
// Service errors
// =============================================================================

export class LinkNotADirectory extends Data.TaggedError("LinkNotADirectory")<{
  readonly path: string;
}> {}

export class MakeDirectoryFailed extends Data.TaggedError("MakeDirectoryFailed")<{
  readonly path: string;
  readonly reason: string;
}> {}

export class LinkFailed extends Data.TaggedError("LinkFailed")<{
  readonly source: string;
  readonly destination: string;
  readonly reason: string;
}> {}

export class DiskIdOutOfRange extends Data.TaggedError("DiskIdOutOfRange")<{
  readonly id: number;
  readonly limit: number;
}> {}

export type LinkError = LinkNotADirectory | MakeDirectoryFailed | LinkFailed | DiskIdOutOfRange;

// =============================================================================
// Types
// =============================================================================

export interface LinkedFile {
  readonly file: FileEntry;
  readonly diskDir: string;
  readonly destination: string;
}

export interface LinkDiskOptions {
  /** Runs after each file is linked, before the next one */
  readonly onLinked?: (linked: LinkedFile) => Effect.Effect<void>;
}

export interface LinkService {
  /** Create every missing directory along `path` (mode 0700). */
  readonly makeDirectories: (path: string) => Effect.Effect<void, LinkError>;
  readonly linkFile: (source: string, destination: string) => Effect.Effect<void, LinkError>;
  readonly linkDisk: (
    disk: Disk,
    destRoot: string,
    options?: LinkDiskOptions
  ) => Effect.Effect<LinkedFile[], LinkError>;
}

export class LinkServiceTag extends Context.Tag("LinkService")<LinkServiceTag, LinkService>() {}

// =============================================================================
// Helpers
// =============================================================================

const DIRECTORY_MODE = 0o700;

/** "a/b/c" -> ["a", "a/b", "a/b/c"]; a leading "/" is not a directory of its own. */
export const directoryPrefixes = (path: string): string[] => {
  const parts = path.split("/");
  return parts.map((_, i) => parts.slice(0, i + 1).join("/")).filter((p) => p !== "");
};

const parentDirectory = (path: string): string => {
  const slash = path.lastIndexOf("/");
  if (slash < 0) return ".";
  return slash === 0 ? "/" : path.slice(0, slash);
};

const isNotFound = (error: PlatformError): boolean =>
  error._tag === "SystemError" && error.reason === "NotFound";

// =============================================================================
// Live implementation
// =============================================================================

export const LinkServiceLive = Layer.effect(
  LinkServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const ensureDirectory = (path: string): Effect.Effect<void, LinkError> =>
      pipe(
        fs.stat(path),
        Effect.matchEffect({
          onSuccess: (info) =>
            info.type === "Directory" ? Effect.void : Effect.fail(new LinkNotADirectory({ path })),
          onFailure: (error) =>
            isNotFound(error)
              ? pipe(
                  fs.makeDirectory(path, { mode: DIRECTORY_MODE }),
                  Effect.mapError((e) => new MakeDirectoryFailed({ path, reason: e.message })),
                  Effect.tap(() => Effect.logDebug(`Created directory ${path}`))
                )
              : Effect.fail(new MakeDirectoryFailed({ path, reason: error.message }))
        })
      );

    const makeDirectories: LinkService["makeDirectories"] = (path) =>
      Effect.forEach(directoryPrefixes(path), ensureDirectory, { discard: true });

    const linkFile: LinkService["linkFile"] = (source, destination) =>
      pipe(
        fs.link(source, destination),
        Effect.mapError((e) => new LinkFailed({ source, destination, reason: e.message }))
      );

    const linkDisk: LinkService["linkDisk"] = (disk, destRoot, options = {}) => {
      if (disk.id > MAX_DISK_ID) {
        return Effect.fail(new DiskIdOutOfRange({ id: disk.id, limit: MAX_DISK_ID }));
      }

      const diskDir = joinPath(destRoot, diskDirectoryName(disk.id));

      return Effect.forEach(disk.files, (file) => {
        const destination = destinationPath(file, diskDir);
        const linked: LinkedFile = { file, diskDir, destination };

        return pipe(
          makeDirectories(parentDirectory(destination)),
          Effect.zipRight(linkFile(file.path, destination)),
          Effect.zipRight(options.onLinked ? options.onLinked(linked) : Effect.void),
          Effect.as(linked)
        );
      });
    };

    return { makeDirectories, linkFile, linkDisk };
  })
);
