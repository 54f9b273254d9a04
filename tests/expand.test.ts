import { describe, expect, it } from "vitest";
import { expandArgs, expandToken, isShortRegion, type ExpansionTable } from "../src/expand.js";

const shorts = new Map([
  ["v", "verbose"],
  ["c", "count"]
]);

describe("isShortRegion", () => {
  it("matches single-dash tokens only", () => {
    expect(isShortRegion("-v")).toBe(true);
    expect(isShortRegion("-")).toBe(false);
    expect(isShortRegion("--v")).toBe(false);
    expect(isShortRegion("v")).toBe(false);
  });
});

describe("expandArgs", () => {
  const table: ExpansionTable = { shorts };

  it("spells out each character of a cluster", () => {
    expect(expandArgs(table, "-vc")).toEqual(["--verbose", "--count"]);
    expect(expandArgs(table, "-v", "file")).toEqual(["--verbose", "file"]);
  });

  it("binds the next argument to the last flag of a cluster", () => {
    expect(expandArgs(table, "-vc", "3", "file")).toEqual(["--verbose", "--count=3", "file"]);
  });

  it("rewrites the equals form", () => {
    expect(expandArgs(table, "-c=5")).toEqual(["--count=5"]);
    expect(expandArgs(table, "-x=5")).toEqual(["-x=5"]);
  });

  it("keeps unknown characters as single-dash tokens", () => {
    expect(expandArgs(table, "-vx")).toEqual(["--verbose", "-x"]);
  });

  it("passes long flags, positionals and a lone dash through", () => {
    expect(expandArgs(table, "--count", "7", "-", "plain")).toEqual(["--count", "7", "-", "plain"]);
  });

  it("stops at the terminator", () => {
    expect(expandArgs(table, "-v", "--", "-vc", "3")).toEqual(["--verbose", "--", "-vc", "3"]);
  });
});

describe("expandToken", () => {
  it("leaves the next argument alone after a boolean-only cluster", () => {
    const table: ExpansionTable = { shorts, booleans: new Set(["verbose"]) };
    expect(expandToken(table, "-cv", "3")).toEqual({ tokens: ["--count", "--verbose"], consumedNext: false });
    expect(expandToken(table, "-vc", "3")).toEqual({ tokens: ["--verbose", "--count=3"], consumedNext: true });
  });

  it("reads a whole long name after a single dash", () => {
    const table: ExpansionTable = { shorts, longs: new Set(["verbose", "count"]) };
    expect(expandToken(table, "-verbose")).toEqual({ tokens: ["--verbose"], consumedNext: false });
    expect(expandToken(table, "-count=2")).toEqual({ tokens: ["--count=2"], consumedNext: false });
  });
});
