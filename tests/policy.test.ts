import { describe, expect, it, vi } from "vitest";
import { unknownFlag } from "../src/errors.js";
import { createLogger } from "../src/output.js";
import { ErrorPolicy, applyPolicy, isErrorPolicy } from "../src/policy.js";

function logger() {
  const lines: string[] = [];
  return { lines, log: createLogger("quiet", (line) => lines.push(line)) };
}

describe("applyPolicy", () => {
  it("reports and returns under ContinueOnError", () => {
    const { lines, log } = logger();
    const error = unknownFlag("x");
    expect(applyPolicy(ErrorPolicy.ContinueOnError, error, log)).toEqual({ action: "return", error });
    expect(lines).toEqual(["unknown flag: x\n"]);
  });

  it("reports and resumes under LogOnError", () => {
    const { lines, log } = logger();
    expect(applyPolicy(ErrorPolicy.LogOnError, unknownFlag("x"), log)).toEqual({ action: "resume" });
    expect(lines).toEqual(["unknown flag: x\n"]);
  });

  it("throws under PanicOnError without reporting", () => {
    const { lines, log } = logger();
    const error = unknownFlag("x");
    expect(() => applyPolicy(ErrorPolicy.PanicOnError, error, log)).toThrow(error);
    expect(lines).toEqual([]);
  });

  it("exits with the usage status under ExitOnError", () => {
    const { lines, log } = logger();
    const exit = vi.fn((code: number): never => {
      throw new Error(`exit:${code}`);
    });
    expect(() => applyPolicy(ErrorPolicy.ExitOnError, unknownFlag("x"), log, exit)).toThrow("exit:2");
    expect(exit).toHaveBeenCalledWith(2);
    expect(lines).toEqual(["unknown flag: x\n"]);
  });
});

describe("isErrorPolicy", () => {
  it("accepts the four policy names", () => {
    expect(["continue", "exit", "panic", "log"].every(isErrorPolicy)).toBe(true);
    expect(isErrorPolicy("ignore")).toBe(false);
  });
});
