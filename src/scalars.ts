import { ValueRangeError, ValueSyntaxError } from "./errors.js";

const TRUE_LITERALS = new Set(["1", "t", "T", "true", "TRUE", "True"]);
const FALSE_LITERALS = new Set(["0", "f", "F", "false", "FALSE", "False"]);

export function parseBool(text: string): boolean {
  if (TRUE_LITERALS.has(text)) return true;
  if (FALSE_LITERALS.has(text)) return false;
  throw new ValueSyntaxError();
}

export type IntegerBounds = {
  min: bigint;
  max: bigint;
  signed: boolean;
};

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;
export const UINT64_MAX = 2n ** 64n - 1n;

export const INT_BOUNDS: IntegerBounds = {
  min: BigInt(Number.MIN_SAFE_INTEGER),
  max: BigInt(Number.MAX_SAFE_INTEGER),
  signed: true
};
export const INT64_BOUNDS: IntegerBounds = { min: INT64_MIN, max: INT64_MAX, signed: true };
export const UINT_BOUNDS: IntegerBounds = { min: 0n, max: BigInt(Number.MAX_SAFE_INTEGER), signed: false };
export const UINT64_BOUNDS: IntegerBounds = { min: 0n, max: UINT64_MAX, signed: false };

const DIGIT_PATTERNS: Record<number, RegExp> = {
  2: /^[01]+(_[01]+)*$/,
  8: /^[0-7]+(_[0-7]+)*$/,
  10: /^[0-9]+(_[0-9]+)*$/,
  16: /^[0-9a-fA-F]+(_[0-9a-fA-F]+)*$/
};

/**
 * Parses an integer literal with its base taken from the prefix: `0x`, `0o`,
 * `0b`, a bare leading `0` for octal, decimal otherwise. A single underscore
 * may separate two digits.
 */
export function parseInteger(text: string, bounds: IntegerBounds): bigint {
  let rest = text;
  let negative = false;
  if (bounds.signed && (rest.startsWith("+") || rest.startsWith("-"))) {
    negative = rest.startsWith("-");
    rest = rest.slice(1);
  }
  if (rest.length === 0) {
    throw new ValueSyntaxError();
  }

  let base = 10;
  const prefix = rest.slice(0, 2).toLowerCase();
  if (prefix === "0x") {
    base = 16;
    rest = rest.slice(2);
  } else if (prefix === "0o") {
    base = 8;
    rest = rest.slice(2);
  } else if (prefix === "0b") {
    base = 2;
    rest = rest.slice(2);
  } else if (rest.length > 1 && rest.startsWith("0")) {
    base = 8;
    rest = rest.slice(1);
    if (rest.startsWith("_")) {
      rest = rest.slice(1);
    }
  }

  const pattern = DIGIT_PATTERNS[base];
  if (!pattern || !pattern.test(rest)) {
    throw new ValueSyntaxError();
  }

  let magnitude = 0n;
  const radix = BigInt(base);
  for (const char of rest) {
    if (char === "_") continue;
    magnitude = magnitude * radix + BigInt(Number.parseInt(char, base));
  }

  const value = negative ? -magnitude : magnitude;
  if (value < bounds.min || value > bounds.max) {
    throw new ValueRangeError();
  }
  return value;
}

const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

export function parseFloatText(text: string): number {
  const special = SPECIAL_FLOAT_PATTERN.exec(text);
  if (special) {
    const [, sign, word] = special;
    if (word?.toLowerCase() === "nan") {
      return Number.NaN;
    }
    return sign === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  if (!FLOAT_PATTERN.test(text)) {
    throw new ValueSyntaxError();
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new ValueRangeError();
  }
  return value;
}

export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Number.POSITIVE_INFINITY) return "+Inf";
  if (value === Number.NEGATIVE_INFINITY) return "-Inf";
  if (Object.is(value, -0)) return "-0";
  return String(value);
}
