import { describe, expect, it, vi } from "vitest";
import { ValueRangeError, ValueSyntaxError } from "../src/errors.js";
import { createFlag, flagEquals } from "../src/flag.js";
import {
  boolValue,
  durationValue,
  floatValue,
  funcValue,
  getValue,
  int64Value,
  intValue,
  isBooleanValue,
  isZeroValue,
  renderValue,
  setValue,
  stringValue,
  uint64Value,
  uintValue,
  zeroValue,
  type FuncBox,
  type ValueBox
} from "../src/values.js";
import { INT64_MAX, INT64_MIN, UINT64_MAX } from "../src/scalars.js";

describe("setValue", () => {
  it("parses text into each kind", () => {
    const count = intValue();
    setValue(count, "0x10");
    expect(count.value).toBe(16);

    const big = int64Value();
    setValue(big, "-9000000000000000000");
    expect(big.value).toBe(-9_000_000_000_000_000_000n);

    const size = uintValue();
    setValue(size, "42");
    expect(size.value).toBe(42);

    const huge = uint64Value();
    setValue(huge, "18446744073709551615");
    expect(huge.value).toBe(18_446_744_073_709_551_615n);

    const ratio = floatValue();
    setValue(ratio, "0.25");
    expect(ratio.value).toBe(0.25);

    const name = stringValue();
    setValue(name, "-not-a-flag");
    expect(name.value).toBe("-not-a-flag");

    const wait = durationValue();
    setValue(wait, "1m30s");
    expect(getValue(wait)).toBe(90_000);
  });

  it("leaves the value alone when parsing fails", () => {
    const verbose = boolValue(true);
    expect(() => setValue(verbose, "yes")).toThrow(ValueSyntaxError);
    expect(verbose.value).toBe(true);

    const count = intValue(3);
    expect(() => setValue(count, "9007199254740992")).toThrow(ValueRangeError);
    expect(count.value).toBe(3);

    const size = uintValue(1);
    expect(() => setValue(size, "-1")).toThrow(ValueSyntaxError);
    expect(size.value).toBe(1);
  });

  it("hands the text to a func box", () => {
    const seen = vi.fn();
    setValue(funcValue(seen), "a,b");
    expect(seen).toHaveBeenCalledWith("a,b");
  });
});

describe("renderValue", () => {
  it("renders each kind", () => {
    expect(renderValue(boolValue(true))).toBe("true");
    expect(renderValue(intValue(-3))).toBe("-3");
    expect(renderValue(uint64Value(7n))).toBe("7");
    expect(renderValue(floatValue(Number.NEGATIVE_INFINITY))).toBe("-Inf");
    expect(renderValue(stringValue("x y"))).toBe("x y");
    expect(renderValue(durationValue(1500))).toBe("1.5s");
    expect(renderValue(funcValue(() => undefined))).toBe("");
  });

  it("refuses a duration default with no nanosecond form", () => {
    expect(() => durationValue(Number.NaN)).toThrow(ValueRangeError);
    expect(() => durationValue(Number.NEGATIVE_INFINITY)).toThrow(ValueRangeError);
    expect(() => durationValue(9_300_000_000_000)).toThrow(ValueRangeError);
    expect(durationValue(0.0005).value).toBe(500n);
  });

  it("reads back the rendered text of every kind at its edges", () => {
    const boxes: Array<Exclude<ValueBox, FuncBox>> = [
      { kind: "bool", value: true },
      { kind: "bool", value: false },
      { kind: "string", value: "" },
      { kind: "string", value: "a b=c" },
      { kind: "int", value: Number.MAX_SAFE_INTEGER },
      { kind: "int", value: -Number.MAX_SAFE_INTEGER },
      { kind: "uint", value: Number.MAX_SAFE_INTEGER },
      { kind: "int64", value: INT64_MIN },
      { kind: "int64", value: INT64_MAX },
      { kind: "uint64", value: UINT64_MAX },
      { kind: "float", value: 0.1 },
      { kind: "float", value: -0 },
      { kind: "float", value: 1e21 },
      { kind: "float", value: Number.POSITIVE_INFINITY },
      { kind: "float", value: Number.NEGATIVE_INFINITY },
      { kind: "float", value: Number.NaN },
      { kind: "duration", value: 1n },
      { kind: "duration", value: 999n },
      { kind: "duration", value: -1_500_000_000n },
      { kind: "duration", value: INT64_MIN },
      { kind: "duration", value: INT64_MAX }
    ];
    for (const box of boxes) {
      const text = renderValue(box);
      const again = zeroValue(box.kind);
      setValue(again, text);
      expect(again.kind).toBe(box.kind);
      expect(getValue(again), `${box.kind} ${text}`).toBe(getValue(box));
      if (again.kind === "duration" && box.kind === "duration") {
        expect(again.value).toBe(box.value);
      }
    }
  });

  it("renders text setValue reads back", () => {
    const box = durationValue();
    setValue(box, "2h45m");
    const again = durationValue();
    setValue(again, renderValue(box));
    expect(again.value).toBe(box.value);
  });
});

describe("value helpers", () => {
  it("only the bool kind is boolean", () => {
    expect(isBooleanValue(boolValue())).toBe(true);
    expect(isBooleanValue(intValue())).toBe(false);
    expect(isBooleanValue(funcValue(() => undefined))).toBe(false);
  });

  it("compares text against the zero value of the kind", () => {
    expect(isZeroValue(intValue(5), "0")).toBe(true);
    expect(isZeroValue(intValue(5), "5")).toBe(false);
    expect(isZeroValue(boolValue(true), "false")).toBe(true);
    expect(isZeroValue(durationValue(), "0s")).toBe(true);
    expect(isZeroValue(stringValue("a"), "")).toBe(true);
  });

  it("builds zero boxes by kind", () => {
    expect(zeroValue("int64")).toEqual({ kind: "int64", value: 0n });
    expect(zeroValue("duration")).toEqual({ kind: "duration", value: 0n });
  });

  it("compares a flag against a native value", () => {
    expect(flagEquals(createFlag("count", "", intValue(5), false), 5)).toBe(true);
    expect(flagEquals(createFlag("big", "", int64Value(5n), false), 5)).toBe(false);
    expect(flagEquals(createFlag("big", "", int64Value(5n), false), 5n)).toBe(true);
    expect(flagEquals(createFlag("each", "", funcValue(() => undefined), false), undefined)).toBe(false);
  });

  it("records the default text when the flag is made", () => {
    const flag = createFlag("wait", "how long", durationValue(250), true);
    setValue(flag.box, "1s");
    expect(flag.defValue).toBe("250ms");
  });
});
