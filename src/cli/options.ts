import { Args, Options } from "@effect/cli";

export const size = Options.text("size").pipe(
  Options.withAlias("s"),
  Options.withDescription("Disk size in bytes, or with a k, m, g or t suffix (e.g. 700m, 4g)")
);

export const link = Options.text("link").pipe(
  Options.withAlias("l"),
  Options.withDescription("Directory to link the files of each disk into. Prints the disks if not set."),
  Options.optional
);

export const count = Options.boolean("count").pipe(
  Options.withAlias("n"),
  Options.withDescription("Only show the number of disks it takes"),
  Options.withDefault(false)
);

export const recursive = Options.boolean("recursive").pipe(
  Options.withAlias("r"),
  Options.withDescription("Search the paths recursively"),
  Options.withDefault(false)
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export const paths = Args.text({ name: "path" }).pipe(
  Args.withDescription("Directories holding the files to fit"),
  Args.atLeast(1)
);

export interface FitOptions {
  readonly size: string;
  readonly link: string | undefined;
  readonly count: boolean;
  readonly recursive: boolean;
  readonly debug?: boolean;
  readonly paths: readonly string[];
}
