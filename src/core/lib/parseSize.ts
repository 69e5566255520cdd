import { Data, Effect, pipe } from "effect";

export const KB = 1000;
export const MB = KB * 1000;
export const GB = MB * 1000;
export const TB = GB * 1000;

const UNITS: Record<string, number> = {
  b: 1,
  k: KB,
  m: MB,
  g: GB,
  t: TB
};

export class InvalidSize extends Data.TaggedError("InvalidSize")<{
  readonly input: string;
}> {}

export class UnknownSizeUnit extends Data.TaggedError("UnknownSizeUnit")<{
  readonly input: string;
  readonly unit: string;
}> {}

export class DiskSizeTooSmall extends Data.TaggedError("DiskSizeTooSmall")<{
  readonly input: string;
}> {}

export class DiskSizeTooLarge extends Data.TaggedError("DiskSizeTooLarge")<{
  readonly input: string;
}> {}

export type SizeError = InvalidSize | UnknownSizeUnit;

const MAGNITUDE = /^(\d+(?:\.\d+)?)(.*)$/;

/**
 * Parse a size such as "700m", "4g" or "1.50K" into bytes.
 *
 * The unit is a single case-insensitive letter (b, k, m, g, t) using
 * decimal multiples; no unit means bytes. Fractions are floored to whole bytes.
 */
export const parseSize = (input: string): Effect.Effect<number, SizeError> => {
  const match = input.match(MAGNITUDE);
  if (!match) {
    return Effect.fail(new InvalidSize({ input }));
  }

  const numStr = match[1];
  const unit = match[2] ?? "";

  if (!numStr) {
    return Effect.fail(new InvalidSize({ input }));
  }

  const num = parseFloat(numStr);

  if (unit === "") {
    return Effect.succeed(Math.floor(num));
  }

  const multiplier = unit.length === 1 ? UNITS[unit.toLowerCase()] : undefined;
  if (multiplier === undefined) {
    return Effect.fail(new UnknownSizeUnit({ input, unit }));
  }

  return Effect.succeed(Math.floor(num * multiplier));
};

/**
 * Parse the capacity of a disk. A negative, fractional or zero magnitude
 * is too small to hold anything; beyond `Number.MAX_SAFE_INTEGER` bytes the
 * free space arithmetic is no longer exact.
 */
export const parseDiskSize = (
  input: string
): Effect.Effect<number, SizeError | DiskSizeTooSmall | DiskSizeTooLarge> =>
  /^-\d/.test(input) || /^\d+\.\d/.test(input)
    ? Effect.fail(new DiskSizeTooSmall({ input }))
    : pipe(
        parseSize(input),
        Effect.filterOrFail(
          (bytes) => bytes > 0,
          () => new DiskSizeTooSmall({ input })
        ),
        Effect.filterOrFail(
          (bytes) => Number.isSafeInteger(bytes),
          () => new DiskSizeTooLarge({ input })
        )
      );

/** Two decimals, with an exact tie rounded to the even digit. */
const toFixed2 = (value: number): string => {
  // only multiples of 1/8 with an odd numerator sit exactly on a tie
  const eighths = value * 8;
  if (Number.isInteger(eighths) && eighths % 2 === 1) {
    const down = Math.floor(value * 100);
    return ((down % 2 === 0 ? down : down + 1) / 100).toFixed(2);
  }
  return value.toFixed(2);
};

export const formatSize = (bytes: number): string => {
  if (bytes >= TB) return `${toFixed2(bytes / TB)}T`;
  if (bytes >= GB) return `${toFixed2(bytes / GB)}G`;
  if (bytes >= MB) return `${toFixed2(bytes / MB)}M`;
  if (bytes >= KB) return `${toFixed2(bytes / KB)}K`;
  return `${bytes.toFixed(0)}B`;
};
