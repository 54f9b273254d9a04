import { ValueRangeError, ValueSyntaxError } from "./errors.js";

export const NANOSECOND = 1n;
export const MICROSECOND = 1_000n * NANOSECOND;
export const MILLISECOND = 1_000n * MICROSECOND;
export const SECOND = 1_000n * MILLISECOND;
export const MINUTE = 60n * SECOND;
export const HOUR = 60n * MINUTE;

const MAX_DURATION = 2n ** 63n - 1n;

const UNITS: Record<string, bigint> = {
  ns: NANOSECOND,
  us: MICROSECOND,
  "µs": MICROSECOND,
  "μs": MICROSECOND,
  ms: MILLISECOND,
  s: SECOND,
  m: MINUTE,
  h: HOUR
};

const SEGMENT_PATTERN = /^(\d*)(?:\.(\d*))?([^\d.]*)/;

/**
 * Parses a duration such as `300ms`, `-1.5h` or `2h45m` into nanoseconds.
 */
export function parseDuration(text: string): bigint {
  let rest = text;
  let negative = false;
  if (rest.startsWith("-") || rest.startsWith("+")) {
    negative = rest.startsWith("-");
    rest = rest.slice(1);
  }
  if (rest === "0") {
    return 0n;
  }
  if (rest.length === 0) {
    throw new ValueSyntaxError();
  }

  let total = 0n;
  while (rest.length > 0) {
    const match = SEGMENT_PATTERN.exec(rest);
    const whole = match?.[1] ?? "";
    const fraction = match?.[2] ?? "";
    const unitName = match?.[3] ?? "";
    if (!match || (whole.length === 0 && fraction.length === 0)) {
      throw new ValueSyntaxError();
    }
    const unit = UNITS[unitName];
    if (unit === undefined) {
      throw new ValueSyntaxError();
    }
    let segment = BigInt(whole.length > 0 ? whole : "0") * unit;
    if (fraction.length > 0) {
      segment += (BigInt(fraction) * unit) / 10n ** BigInt(fraction.length);
    }
    total += segment;
    if (total > MAX_DURATION + (negative ? 1n : 0n)) {
      throw new ValueRangeError();
    }
    rest = rest.slice(match[0].length);
  }
  return negative ? -total : total;
}

function formatFraction(value: bigint, precision: number): string {
  const scale = 10n ** BigInt(precision);
  const digits = (value % scale).toString().padStart(precision, "0").replace(/0+$/, "");
  const whole = (value / scale).toString();
  return digits.length > 0 ? `${whole}.${digits}` : whole;
}

/**
 * Renders nanoseconds in the compact form `parseDuration` reads back:
 * `1h2m3.5s`, `1.5ms`, `0s`.
 */
export function formatDuration(nanoseconds: bigint): string {
  if (nanoseconds === 0n) {
    return "0s";
  }
  const sign = nanoseconds < 0n ? "-" : "";
  const magnitude = nanoseconds < 0n ? -nanoseconds : nanoseconds;

  if (magnitude < MICROSECOND) {
    return `${sign}${magnitude}ns`;
  }
  if (magnitude < MILLISECOND) {
    return `${sign}${formatFraction(magnitude, 3)}µs`;
  }
  if (magnitude < SECOND) {
    return `${sign}${formatFraction(magnitude, 6)}ms`;
  }

  let out = `${formatFraction(magnitude % MINUTE, 9)}s`;
  const minutes = magnitude / MINUTE;
  if (minutes > 0n) {
    out = `${minutes % 60n}m${out}`;
    const hours = minutes / 60n;
    if (hours > 0n) {
      out = `${hours}h${out}`;
    }
  }
  return `${sign}${out}`;
}

/** Throws `ValueRangeError` unless `ms` is finite and fits in signed 64-bit nanoseconds. */
export function millisecondsToNanoseconds(ms: number): bigint {
  if (!Number.isFinite(ms)) {
    throw new ValueRangeError();
  }
  const ns = BigInt(Math.round(ms * 1_000_000));
  if (ns > MAX_DURATION || ns < -MAX_DURATION - 1n) {
    throw new ValueRangeError();
  }
  return ns;
}

export function nanosecondsToMilliseconds(ns: bigint): number {
  return Number(ns) / 1_000_000;
}
