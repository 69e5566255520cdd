import { Match } from "effect";

import type {
  InvalidSize,
  UnknownSizeUnit,
  DiskSizeTooSmall,
  DiskSizeTooLarge,
  ScanPathNotFound,
  ScanPermissionDenied,
  ScanNotADirectory,
  ScanFailed,
  FileStatFailed,
  FileTooLarge,
  UnsupportedEntry,
  NoFilesFound,
  TooManyDisks,
  LinkNotADirectory,
  MakeDirectoryFailed,
  LinkFailed,
  DiskIdOutOfRange
} from "@core";
import { formatSize } from "@lib/parseSize";

type ConfigError = InvalidSize | UnknownSizeUnit | DiskSizeTooSmall | DiskSizeTooLarge;

type CollectError =
  | ScanPathNotFound
  | ScanPermissionDenied
  | ScanNotADirectory
  | ScanFailed
  | FileStatFailed
  | FileTooLarge
  | UnsupportedEntry;

type PackError = NoFilesFound | TooManyDisks;

type LinkError = LinkNotADirectory | MakeDirectoryFailed | LinkFailed | DiskIdOutOfRange;

export type DomainError = ConfigError | CollectError | PackError | LinkError;

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const errors = {
  invalidSize: (input: string) =>
    new AppError(
      "Invalid size",
      `"${input}" is not a size.`,
      `Give a whole number of bytes, optionally followed by k, m, g or t (e.g. 700m, 4g).`
    ),

  unknownSizeUnit: (input: string, unit: string) =>
    new AppError(
      "Unknown size unit",
      `unknown unit: '${unit}' in "${input}".`,
      `Use a single letter unit: b, k, m, g or t. Units are powers of 1000.`
    ),

  diskSizeTooSmall: (input: string) =>
    new AppError(
      "Disk size too small",
      `disk size is too small: "${input}".`,
      `The disk size must be a positive whole number, e.g. 4g or 700m.`
    ),

  diskSizeTooLarge: (input: string) =>
    new AppError(
      "Disk size too large",
      `disk size is too large: "${input}".`,
      `The disk size must stay below ${Number.MAX_SAFE_INTEGER} bytes.`
    ),

  pathNotFound: (path: string) =>
    new AppError(
      "Path not found",
      `can't access '${path}': it does not exist.`,
      `Check the path for typos. Links are followed, so a link to a missing file fails too.`
    ),

  scanPermissionDenied: (path: string) =>
    new AppError(
      "Permission denied during scan",
      `Cannot read '${path}': permission denied.`,
      `Check file permissions or run with elevated privileges.`
    ),

  notADirectory: (path: string) =>
    new AppError(
      "Not a directory",
      `can't open directory '${path}': not a directory.`,
      `Pass the directories that hold the files, not the files themselves.`
    ),

  scanFailed: (path: string, reason: string) =>
    new AppError(
      "Scan failed",
      `Could not scan '${path}': ${reason}`,
      `Check that the path exists and you have read permission.`
    ),

  fileTooLarge: (path: string, sizeBytes: number, capacityBytes: number) =>
    new AppError(
      "File too large",
      `can never fit '${path}' (${formatSize(sizeBytes)}).`,
      `A disk holds ${formatSize(capacityBytes)}. Use a larger --size or leave this file out.`
    ),

  unsupportedEntry: (path: string, type: string) =>
    new AppError(
      "Not a regular file",
      `'${path}': not a regular file (${type}).`,
      `Only regular files and directories can be fitted. Move the entry out of the tree.`
    ),

  noFilesFound: (roots: readonly string[]) =>
    new AppError(
      "No files found",
      `no files found in ${roots.map((r) => `'${r}'`).join(", ")}.`,
      `Check the paths, or pass --recursive to look inside subdirectories.`
    ),

  tooManyDisks: (count: number, limit: number) =>
    new AppError(
      "Too many disks",
      `fitting takes too many disks: ${count} (> ${limit}).`,
      `Disk directories are numbered with four digits. Use a larger --size.`
    ),

  linkNotADirectory: (path: string) =>
    new AppError(
      "Not a directory",
      `'${path}' is not a directory.`,
      `Something other than a directory is in the way of the link tree. Pick an empty --link directory.`
    ),

  makeDirectoryFailed: (path: string, reason: string) =>
    new AppError(
      "Cannot make directory",
      `can't make directory '${path}': ${reason}`,
      `Check that you have write permission in the --link directory.`
    ),

  linkFailed: (source: string, destination: string, reason: string) =>
    new AppError(
      "Link failed",
      `can't link '${source}' to '${destination}': ${reason}`,
      `Hardlinks only work within one filesystem, and the destination must not exist yet.`
    ),

  diskIdOutOfRange: (id: number, limit: number) =>
    new AppError(
      "Disk number out of range",
      `disk #${id} does not fit the directory format (> ${limit}).`,
      `Use a larger --size so fewer disks are needed.`
    )
};

type DomainErrorHandlers = {
  readonly [Tag in DomainError["_tag"]]: (e: Extract<DomainError, { readonly _tag: Tag }>) => AppError;
};

const handlers: DomainErrorHandlers = {
  InvalidSize: (e) => errors.invalidSize(e.input),
  UnknownSizeUnit: (e) => errors.unknownSizeUnit(e.input, e.unit),
  DiskSizeTooSmall: (e) => errors.diskSizeTooSmall(e.input),
  DiskSizeTooLarge: (e) => errors.diskSizeTooLarge(e.input),

  ScanPathNotFound: (e) => errors.pathNotFound(e.path),
  ScanPermissionDenied: (e) => errors.scanPermissionDenied(e.path),
  ScanNotADirectory: (e) => errors.notADirectory(e.path),
  ScanFailed: (e) => errors.scanFailed(e.path, e.reason),
  FileStatFailed: (e) => errors.scanFailed(e.path, e.reason),
  FileTooLarge: (e) => errors.fileTooLarge(e.path, e.sizeBytes, e.capacityBytes),
  UnsupportedEntry: (e) => errors.unsupportedEntry(e.path, e.type),

  NoFilesFound: (e) => errors.noFilesFound(e.roots),
  TooManyDisks: (e) => errors.tooManyDisks(e.count, e.limit),

  LinkNotADirectory: (e) => errors.linkNotADirectory(e.path),
  MakeDirectoryFailed: (e) => errors.makeDirectoryFailed(e.path, e.reason),
  LinkFailed: (e) => errors.linkFailed(e.source, e.destination, e.reason),
  DiskIdOutOfRange: (e) => errors.diskIdOutOfRange(e.id, e.limit)
};

/** The message shown for a failed run. */
export const fromDomainError: (error: DomainError) => AppError = Match.typeTags<DomainError>()(handlers);
