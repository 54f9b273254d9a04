import {
  formatDuration,
  millisecondsToNanoseconds,
  nanosecondsToMilliseconds,
  parseDuration
} from "./duration.js";
import { ValueRangeError, ValueSyntaxError } from "./errors.js";
import {
  INT64_BOUNDS,
  INT_BOUNDS,
  UINT64_BOUNDS,
  UINT_BOUNDS,
  formatFloat,
  parseBool,
  parseFloatText,
  parseInteger,
  type IntegerBounds
} from "./scalars.js";

export type BoolBox = { kind: "bool"; value: boolean };
export type IntBox = { kind: "int"; value: number };
export type Int64Box = { kind: "int64"; value: bigint };
export type UintBox = { kind: "uint"; value: number };
export type Uint64Box = { kind: "uint64"; value: bigint };
export type StringBox = { kind: "string"; value: string };
export type FloatBox = { kind: "float"; value: number };
/** Holds nanoseconds. */
export type DurationBox = { kind: "duration"; value: bigint };
export type FuncBox = { kind: "func"; fn: (text: string) => void };

/**
 * The typed container behind a flag. Every kind knows how to read its value
 * from command-line text and render it back.
 */
export type ValueBox =
  | BoolBox
  | IntBox
  | Int64Box
  | UintBox
  | Uint64Box
  | StringBox
  | FloatBox
  | DurationBox
  | FuncBox;

export type ValueKind = ValueBox["kind"];

export type NativeValue = boolean | number | bigint | string;

export function boolValue(value = false): BoolBox {
  return { kind: "bool", value };
}

export function intValue(value = 0): IntBox {
  return { kind: "int", value };
}

export function int64Value(value: bigint = 0n): Int64Box {
  return { kind: "int64", value };
}

export function uintValue(value = 0): UintBox {
  return { kind: "uint", value };
}

export function uint64Value(value: bigint = 0n): Uint64Box {
  return { kind: "uint64", value };
}

export function stringValue(value = ""): StringBox {
  return { kind: "string", value };
}

export function floatValue(value = 0): FloatBox {
  return { kind: "float", value };
}

/** `milliseconds` may be fractional; it is stored to the nanosecond. */
export function durationValue(milliseconds = 0): DurationBox {
  return { kind: "duration", value: millisecondsToNanoseconds(milliseconds) };
}

export function funcValue(fn: (text: string) => void): FuncBox {
  return { kind: "func", fn };
}

export function zeroValue(kind: Exclude<ValueKind, "func">): ValueBox {
  switch (kind) {
    case "bool":
      return boolValue();
    case "int":
      return intValue();
    case "int64":
      return int64Value();
    case "uint":
      return uintValue();
    case "uint64":
      return uint64Value();
    case "string":
      return stringValue();
    case "float":
      return floatValue();
    case "duration":
      return durationValue();
  }
}

function checkBounds(value: bigint, bounds: IntegerBounds): void {
  if (value < bounds.min || value > bounds.max) {
    throw new ValueRangeError();
  }
}

/**
 * Throws `ValueSyntaxError` or `ValueRangeError` when the box holds a value
 * that `setValue` could not read back from its rendered text.
 */
export function checkValue(box: ValueBox): void {
  switch (box.kind) {
    case "int":
    case "uint":
      if (!Number.isInteger(box.value)) {
        throw new ValueSyntaxError("not an integer");
      }
      if (!Number.isSafeInteger(box.value)) {
        throw new ValueRangeError();
      }
      checkBounds(BigInt(box.value), box.kind === "int" ? INT_BOUNDS : UINT_BOUNDS);
      return;
    case "int64":
      checkBounds(box.value, INT64_BOUNDS);
      return;
    case "uint64":
      checkBounds(box.value, UINT64_BOUNDS);
      return;
    case "duration":
      checkBounds(box.value, INT64_BOUNDS);
      return;
    default:
      return;
  }
}

/**
 * Parses `text` into the box. Throws `ValueSyntaxError` or `ValueRangeError`
 * without touching the current value.
 */
export function setValue(box: ValueBox, text: string): void {
  switch (box.kind) {
    case "bool":
      box.value = parseBool(text);
      return;
    case "int":
      box.value = Number(parseInteger(text, INT_BOUNDS));
      return;
    case "int64":
      box.value = parseInteger(text, INT64_BOUNDS);
      return;
    case "uint":
      box.value = Number(parseInteger(text, UINT_BOUNDS));
      return;
    case "uint64":
      box.value = parseInteger(text, UINT64_BOUNDS);
      return;
    case "string":
      box.value = text;
      return;
    case "float":
      box.value = parseFloatText(text);
      return;
    case "duration":
      box.value = parseDuration(text);
      return;
    case "func":
      box.fn(text);
      return;
  }
}

export function renderValue(box: ValueBox): string {
  switch (box.kind) {
    case "bool":
      return box.value ? "true" : "false";
    case "int":
    case "uint":
      return String(box.value);
    case "int64":
    case "uint64":
      return box.value.toString();
    case "string":
      return box.value;
    case "float":
      return formatFloat(box.value);
    case "duration":
      return formatDuration(box.value);
    case "func":
      return "";
  }
}

export function isBooleanValue(box: ValueBox): box is BoolBox {
  return box.kind === "bool";
}

/** The native value; durations come back as milliseconds. */
export function getValue(box: ValueBox): NativeValue | undefined {
  switch (box.kind) {
    case "duration":
      return nanosecondsToMilliseconds(box.value);
    case "func":
      return undefined;
    default:
      return box.value;
  }
}

/** Whether `text` is what the zero value of this box's kind renders as. */
export function isZeroValue(box: ValueBox, text: string): boolean {
  if (box.kind === "func") {
    return text === "";
  }
  return renderValue(zeroValue(box.kind)) === text;
}
