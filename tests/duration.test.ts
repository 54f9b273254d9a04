import { describe, expect, it } from "vitest";
import { HOUR, SECOND, formatDuration, parseDuration } from "../src/duration.js";
import { ValueRangeError, ValueSyntaxError } from "../src/errors.js";

describe("parseDuration", () => {
  it("reads unit sequences into nanoseconds", () => {
    expect(parseDuration("300ms")).toBe(300_000_000n);
    expect(parseDuration("2h45m")).toBe(9_900_000_000_000n);
    expect(parseDuration("1.5h")).toBe(HOUR + HOUR / 2n);
    expect(parseDuration(".5s")).toBe(SECOND / 2n);
    expect(parseDuration("1us")).toBe(1000n);
    expect(parseDuration("1µs")).toBe(1000n);
    expect(parseDuration("7ns")).toBe(7n);
  });

  it("takes a sign", () => {
    expect(parseDuration("-1.5s")).toBe(-1_500_000_000n);
    expect(parseDuration("+2s")).toBe(2_000_000_000n);
  });

  it("accepts a bare zero only", () => {
    expect(parseDuration("0")).toBe(0n);
    expect(() => parseDuration("10")).toThrow(ValueSyntaxError);
  });

  it("rejects malformed text", () => {
    for (const text of ["", "-", "h", "1x", "1h-2m", "1..5s"]) {
      expect(() => parseDuration(text)).toThrow(ValueSyntaxError);
    }
  });

  it("reports overflow as a range error", () => {
    expect(() => parseDuration("3000000h")).toThrow(ValueRangeError);
  });
});

describe("formatDuration", () => {
  it("picks the largest fitting form", () => {
    expect(formatDuration(0n)).toBe("0s");
    expect(formatDuration(5n)).toBe("5ns");
    expect(formatDuration(1_500n)).toBe("1.5µs");
    expect(formatDuration(1_500_000n)).toBe("1.5ms");
    expect(formatDuration(300_000_000n)).toBe("300ms");
    expect(formatDuration(3_500_000_000n)).toBe("3.5s");
    expect(formatDuration(90n * SECOND)).toBe("1m30s");
    expect(formatDuration(HOUR)).toBe("1h0m0s");
    expect(formatDuration(-1_500_000_000n)).toBe("-1.5s");
  });

  it("renders text parseDuration reads back", () => {
    for (const text of ["2h45m0s", "1.5ms", "-3.5s", "42ns"]) {
      expect(formatDuration(parseDuration(text))).toBe(text);
    }
  });
});
