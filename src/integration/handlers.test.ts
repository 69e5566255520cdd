/**
 * Integration tests for the CLI handler using TestContext.
 *
 * Uses a virtual filesystem to verify orchestration logic
 * by checking what the console and the edge services receive.
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { Effect, Layer, pipe } from "effect";

import { runFitCommand, withErrorHandling } from "../cli/handler";
import type { FitOptions } from "../cli/options";
import { createTestContext, type TestContext } from "../test/TestContext";
import { CollectorServiceLive } from "../core/services/CollectorService";
import { LoggerServiceLive } from "../core/services/LoggerService";
import { LinkServiceTag, type LinkedFile } from "../core/services/LinkService";
import { diskDirectoryName, type Disk } from "../core/domain/Disk";
import { destinationPath } from "../core/domain/FileEntry";

interface LinkCall {
  readonly diskId: number;
  readonly destRoot: string;
  readonly files: readonly string[];
}

/** LinkService that records what it would link and reports each file as linked. */
function recordingLinkService(calls: LinkCall[]) {
  return Layer.succeed(LinkServiceTag, {
    makeDirectories: () => Effect.void,
    linkFile: () => Effect.void,
    linkDisk: (disk: Disk, destRoot: string, options = {}) => {
      calls.push({ diskId: disk.id, destRoot, files: disk.files.map((f) => f.path) });
      const diskDir = `${destRoot}/${diskDirectoryName(disk.id)}`;
      return Effect.forEach(disk.files, (file) => {
        const linked: LinkedFile = { file, diskDir, destination: destinationPath(file, diskDir) };
        return pipe(
          options.onLinked ? options.onLinked(linked) : Effect.void,
          Effect.as(linked)
        );
      });
    }
  });
}

function buildTestLayer(ctx: TestContext, linkCalls: LinkCall[]) {
  return Layer.mergeAll(
    LoggerServiceLive,
    pipe(CollectorServiceLive, Layer.provide(ctx.layer)),
    recordingLinkService(linkCalls)
  );
}

const options = (overrides: Partial<FitOptions>): FitOptions => ({
  size: "10",
  link: undefined,
  count: false,
  recursive: false,
  paths: ["/data"],
  ...overrides
});

/** capacity 10, files a:4 b:4 c:4 d:2 */
const addExample = (ctx: TestContext) => {
  ctx.addFile("/data/a", 4);
  ctx.addFile("/data/b", 4);
  ctx.addFile("/data/c", 4);
  ctx.addFile("/data/d", 2);
};

let stdout: string[];
let stderr: string[];

beforeEach(() => {
  stdout = [];
  stderr = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    stdout.push(args.map(String).join(" "));
  });
  vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    stderr.push(args.map(String).join(" "));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

// =============================================================================
// Tests: runFitCommand
// =============================================================================

describe("runFitCommand", () => {
  test("reports each disk with its free space and files", async () => {
    const ctx = createTestContext();
    addExample(ctx);

    await pipe(
      runFitCommand(options({})),
      Effect.provide(buildTestLayer(ctx, [])),
      Effect.runPromise
    );

    const header1 = "Disk #1, 0% (0B) free:";
    const header2 = "Disk #2, 60% (6B) free:";
    expect(stdout).toEqual([
      "-".repeat(header1.length),
      header1,
      "-".repeat(header1.length),
      "        4B /data/a",
      "        4B /data/b",
      "        2B /data/d",
      "",
      "-".repeat(header2.length),
      header2,
      "-".repeat(header2.length),
      "        4B /data/c",
      ""
    ]);
  });

  test("count mode prints only the number of disks", async () => {
    const ctx = createTestContext();
    addExample(ctx);

    await pipe(
      runFitCommand(options({ count: true, link: "/out" })),
      Effect.provide(buildTestLayer(ctx, [])),
      Effect.runPromise
    );

    expect(stdout).toEqual(["2 disks."]);
  });

  test("a single disk is counted in the singular", async () => {
    const ctx = createTestContext();
    ctx.addFile("/data/only", 10);

    await pipe(
      runFitCommand(options({ count: true })),
      Effect.provide(buildTestLayer(ctx, [])),
      Effect.runPromise
    );

    expect(stdout).toEqual(["1 disk."]);
  });

  test("link mode links every disk under the normalized destination", async () => {
    const ctx = createTestContext();
    addExample(ctx);
    const linkCalls: LinkCall[] = [];

    await pipe(
      runFitCommand(options({ link: "/out//" })),
      Effect.provide(buildTestLayer(ctx, linkCalls)),
      Effect.runPromise
    );

    expect(linkCalls).toEqual([
      { diskId: 1, destRoot: "/out", files: ["/data/a", "/data/b", "/data/d"] },
      { diskId: 2, destRoot: "/out", files: ["/data/c"] }
    ]);
    expect(stdout).toEqual([
      "/data/a -> /out/0001",
      "/data/b -> /out/0001",
      "/data/d -> /out/0001",
      "/data/c -> /out/0002"
    ]);
  });

  test("collects several roots in order and descends only when recursive", async () => {
    const ctx = createTestContext();
    ctx.addFile("/one/x", 3);
    ctx.addFile("/one/sub/deep", 3);
    ctx.addFile("/two/y", 3);
    const layer = buildTestLayer(ctx, []);

    await pipe(
      runFitCommand(options({ paths: ["/one", "/two/"], count: true })),
      Effect.provide(layer),
      Effect.runPromise
    );
    expect(ctx.calls.list).toEqual(["/one", "/two"]);

    ctx.calls.list.length = 0;
    await pipe(
      runFitCommand(options({ paths: ["/one", "/two"], recursive: true })),
      Effect.provide(layer),
      Effect.runPromise
    );
    expect(ctx.calls.list).toEqual(["/one", "/one/sub", "/two"]);
    expect(stdout.filter((line) => line.startsWith(" "))).toEqual([
      "        3B /one/sub/deep",
      "        3B /one/x",
      "        3B /two/y"
    ]);
  });

  test("fails on a file larger than a disk before anything is printed", async () => {
    const ctx = createTestContext();
    ctx.addFile("/data/small", 5);
    ctx.addFile("/data/huge", 11);

    const error = await pipe(
      runFitCommand(options({})),
      Effect.flip,
      Effect.provide(buildTestLayer(ctx, [])),
      Effect.runPromise
    );

    expect(error._tag).toBe("FileTooLarge");
    expect(error).toHaveProperty("path", "/data/huge");
    expect(stdout).toEqual([]);
  });

  test("fails with NoFilesFound on empty roots", async () => {
    const ctx = createTestContext();
    ctx.addDirectory("/empty");

    const error = await pipe(
      runFitCommand(options({ paths: ["/empty"] })),
      Effect.flip,
      Effect.provide(buildTestLayer(ctx, [])),
      Effect.runPromise
    );

    expect(error._tag).toBe("NoFilesFound");
  });

  test("rejects a bad size before touching the filesystem", async () => {
    const ctx = createTestContext();
    addExample(ctx);

    const error = await pipe(
      runFitCommand(options({ size: "0" })),
      Effect.flip,
      Effect.provide(buildTestLayer(ctx, [])),
      Effect.runPromise
    );

    expect(error._tag).toBe("DiskSizeTooSmall");
    expect(ctx.calls.stat).toEqual([]);
  });

  test("rejects a size that overflows exact integers", async () => {
    const ctx = createTestContext();
    addExample(ctx);

    const error = await pipe(
      runFitCommand(options({ size: "9".repeat(400) })),
      Effect.flip,
      Effect.provide(buildTestLayer(ctx, [])),
      Effect.runPromise
    );

    expect(error._tag).toBe("DiskSizeTooLarge");
    expect(stdout).toEqual([]);
  });
});

// =============================================================================
// Tests: withErrorHandling
// =============================================================================

describe("withErrorHandling", () => {
  test("prints the formatted error and sets a failing exit code", async () => {
    const ctx = createTestContext();
    ctx.addFile("/data/huge", 11);

    await pipe(
      withErrorHandling(runFitCommand(options({}))),
      Effect.provide(buildTestLayer(ctx, [])),
      Effect.runPromise
    );

    expect(stderr).toEqual([
      "ERROR: File too large\n\n   can never fit '/data/huge' (11B).\n\n   Hint: A disk holds 10B. Use a larger --size or leave this file out."
    ]);
    expect(process.exitCode).toBe(1);
  });

  test("leaves the exit code alone on success", async () => {
    const ctx = createTestContext();
    addExample(ctx);

    await pipe(
      withErrorHandling(runFitCommand(options({ count: true }))),
      Effect.provide(buildTestLayer(ctx, [])),
      Effect.runPromise
    );

    expect(process.exitCode).toBeUndefined();
  });
});
