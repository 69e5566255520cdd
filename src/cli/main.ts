import { Command } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect, Option, Logger, LogLevel } from "effect";

import * as Opts from "@cli/options";
import { runFitCommand, withErrorHandling, AppLive } from "@cli/handler";

const fitCommand = Command.make(
  "diskfit",
  {
    size: Opts.size,
    link: Opts.link,
    count: Opts.count,
    recursive: Opts.recursive,
    debug: Opts.debug,
    paths: Opts.paths
  },
  (opts) =>
    withErrorHandling(
      runFitCommand({
        size: opts.size,
        link: Option.getOrUndefined(opts.link),
        count: opts.count,
        recursive: opts.recursive,
        debug: opts.debug,
        paths: opts.paths
      })
    ).pipe(
      Effect.provide(Logger.minimumLogLevel(opts.debug ? LogLevel.Debug : LogLevel.Info)),
      Effect.provide(AppLive)
    )
).pipe(Command.withDescription("Fit files onto as few fixed-size disks as possible"));

const cli = Command.run(fitCommand, {
  name: "diskfit",
  version: "0.1.0"
});

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
