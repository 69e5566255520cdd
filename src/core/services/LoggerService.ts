/**
 * LoggerService - formatted console output for the report, link and count modes
 */

import { Console, Context, Effect, Layer } from "effect";
import type { Disk } from "@domain/Disk";
import type { FileEntry } from "@domain/FileEntry";
import { diskCountLine, linkedLine, renderDisk } from "@domain/DiskReport";

// =============================================================================
// Service interface
// =============================================================================

export interface LoggerService {
  readonly report: {
    readonly disk: (disk: Disk) => Effect.Effect<void>;
  };
  readonly link: {
    readonly linked: (file: FileEntry, diskDir: string) => Effect.Effect<void>;
  };
  readonly count: {
    readonly total: (diskCount: number) => Effect.Effect<void>;
  };
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Implementation
// =============================================================================

export const LoggerServiceLive = Layer.succeed(LoggerServiceTag, {
  report: {
    disk: (disk) => Effect.forEach(renderDisk(disk), (line) => Console.log(line), { discard: true })
  },
  link: {
    linked: (file, diskDir) => Console.log(linkedLine(file, diskDir))
  },
  count: {
    total: (diskCount) => Console.log(diskCountLine(diskCount))
  }
});
