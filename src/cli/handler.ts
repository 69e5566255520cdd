import { Console, Effect, pipe } from "effect";

import type { FitOptions } from "./options";
import { parseFitOptions } from "./optionParsing";
import { fromDomainError, type DomainError } from "./errors";

import { runFit, AppLive } from "@core";

/**
 * Error handling wrapper for CLI commands: the error is printed on stderr
 * and the process exits non-zero once the run is over.
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, DomainError, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) =>
      pipe(
        Console.error(fromDomainError(error).format()),
        Effect.zipRight(
          Effect.sync(() => {
            process.exitCode = 1;
          })
        )
      )
    ),
    Effect.asVoid
  );

/**
 * Run the fit command
 */
export const runFitCommand = (options: FitOptions) =>
  Effect.gen(function* () {
    const config = yield* parseFitOptions(options);

    yield* Effect.logDebug(
      `Fitting ${config.roots.join(", ")} onto disks of ${config.capacityBytes} bytes (${config.mode._tag}${config.recursive ? ", recursive" : ""})`
    );

    yield* runFit(config);
  });

export { AppLive };
