import { Effect } from "effect";
import type { FitConfig, FitMode } from "@core";
import { parseDiskSize } from "@lib/parseSize";
import { normalizePath } from "@lib/normalizePath";
import type { FitOptions } from "./options";

export const selectMode = (options: Pick<FitOptions, "count" | "link">): FitMode => {
  if (options.count) return { _tag: "Count" };
  if (options.link !== undefined) return { _tag: "Link", destDir: normalizePath(options.link) };
  return { _tag: "Report" };
};

/** Turn raw command-line values into the configuration the core runs with. */
export const parseFitOptions = (options: FitOptions) =>
  Effect.gen(function* () {
    const capacityBytes = yield* parseDiskSize(options.size);

    return {
      roots: options.paths.map(normalizePath),
      capacityBytes,
      recursive: options.recursive,
      mode: selectMode(options)
    } satisfies FitConfig;
  });
