import { Context, Data, Effect, Layer, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";

export class FileNotFound extends Data.TaggedError("FileNotFound")<{
  readonly path: string;
}> {}

export class FilePermissionDenied extends Data.TaggedError("FilePermissionDenied")<{
  readonly path: string;
}> {}

export class FileStatUnknownError extends Data.TaggedError("FileStatUnknownError")<{
  readonly path: string;
  readonly cause: string;
}> {}

export type FileStatError = FileNotFound | FilePermissionDenied | FileStatUnknownError;

export type EntryKind = "file" | "directory" | "other";

export interface EntryInfo {
  readonly kind: EntryKind;
  /** Type name as the platform reports it, e.g. "FIFO" or "Socket" */
  readonly type: string;
  readonly sizeBytes: number;
}

export interface FileStatService {
  /** Stat a path, following symbolic links to what they point at. */
  readonly stat: (path: string) => Effect.Effect<EntryInfo, FileStatError>;
}

export class FileStatServiceTag extends Context.Tag("FileStatService")<
  FileStatServiceTag,
  FileStatService
>() {}

const toEntryKind = (type: string): EntryKind =>
  type === "File" ? "file" : type === "Directory" ? "directory" : "other";

export const toFileStatError = (path: string, error: PlatformError): FileStatError => {
  if (error._tag === "SystemError") {
    if (error.reason === "NotFound") {
      return new FileNotFound({ path });
    }
    if (error.reason === "PermissionDenied") {
      return new FilePermissionDenied({ path });
    }
  }

  return new FileStatUnknownError({ path, cause: error.message });
};

export const FileStatServiceLive = Layer.effect(
  FileStatServiceTag,
  pipe(
    FileSystem.FileSystem,
    Effect.map((fs) => ({
      stat: (path: string) =>
        pipe(
          fs.stat(path),
          Effect.map(
            (info): EntryInfo => ({
              kind: toEntryKind(info.type),
              type: info.type,
              sizeBytes: Number(info.size)
            })
          ),
          Effect.mapError((e) => toFileStatError(path, e))
        )
    }))
  )
);
