import { Context, Data, Effect, Layer, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";

export class DirectoryNotFound extends Data.TaggedError("DirectoryNotFound")<{
  readonly path: string;
}> {}

export class DirectoryPermissionDenied extends Data.TaggedError("DirectoryPermissionDenied")<{
  readonly path: string;
}> {}

export class DirectoryReadFailed extends Data.TaggedError("DirectoryReadFailed")<{
  readonly path: string;
  readonly cause: string;
}> {}

export type DirectoryError = DirectoryNotFound | DirectoryPermissionDenied | DirectoryReadFailed;

export interface DirectoryService {
  /**
   * Names of the entries directly inside `path`, sorted, without "." and "..".
   * The directory is read completely before the names are returned.
   */
  readonly list: (path: string) => Effect.Effect<string[], DirectoryError>;
}

export class DirectoryServiceTag extends Context.Tag("DirectoryService")<
  DirectoryServiceTag,
  DirectoryService
>() {}

const toDirectoryError = (path: string, error: PlatformError): DirectoryError => {
  if (error._tag === "SystemError") {
    if (error.reason === "NotFound") {
      return new DirectoryNotFound({ path });
    }
    if (error.reason === "PermissionDenied") {
      return new DirectoryPermissionDenied({ path });
    }
  }

  return new DirectoryReadFailed({ path, cause: error.message });
};

export const DirectoryServiceLive = Layer.effect(
  DirectoryServiceTag,
  Effect.map(FileSystem.FileSystem, (fs) => ({
    list: (path: string) =>
      pipe(
        fs.readDirectory(path),
        Effect.map((names) => names.filter((name) => name !== "." && name !== "..").sort()),
        Effect.mapError((e) => toDirectoryError(path, e))
      )
  }))
);
