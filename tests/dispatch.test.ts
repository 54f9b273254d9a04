import { describe, expect, it } from "vitest";
import { Dispatcher, TokenStream, type Decision } from "../src/dispatch.js";
import { ParseFailure } from "../src/errors.js";
import { createLogger } from "../src/output.js";
import { FlagRegistry } from "../src/registry.js";
import { boolValue, intValue, stringValue } from "../src/values.js";

function setup(tokens: string[]) {
  const registry = new FlagRegistry();
  const flags = {
    all: registry.register("all", "", boolValue(), true),
    verbose: registry.register("verbose", "", boolValue(), true),
    num: registry.register("num", "", intValue(), true),
    name: registry.register("name", "", stringValue(), false)
  };
  const stream = new TokenStream(tokens);
  const logged: string[] = [];
  const logger = createLogger("debug", (line) => logged.push(line));
  return { registry, flags, stream, logged, dispatcher: new Dispatcher(registry, stream, logger) };
}

function drive(dispatcher: Dispatcher): Decision[] {
  const decisions: Decision[] = [];
  for (;;) {
    const decision = dispatcher.step();
    decisions.push(decision);
    if (decision.kind === "end" || decision.kind === "terminator") {
      return decisions;
    }
  }
}

function failureOf(dispatcher: Dispatcher): ParseFailure {
  try {
    drive(dispatcher);
  } catch (error) {
    if (error instanceof ParseFailure) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a parse failure");
}

describe("TokenStream", () => {
  it("hands out tokens in order and drains the rest", () => {
    const stream = new TokenStream(["a", "b", "c"]);
    expect(stream.next()).toBe("a");
    expect(stream.peek()).toBe("b");
    expect(stream.remaining).toBe(2);
    expect(stream.drain()).toEqual(["b", "c"]);
    expect(stream.next()).toBeUndefined();
    expect(stream.remaining).toBe(0);
  });
});

describe("Dispatcher", () => {
  it("sets every boolean in a cluster", () => {
    const { dispatcher, flags, registry } = setup(["-av"]);
    expect(drive(dispatcher)).toEqual([{ kind: "flag" }, { kind: "end" }]);
    expect(flags.all.box.value).toBe(true);
    expect(flags.verbose.box.value).toBe(true);
    expect(registry.setCount).toBe(2);
  });

  it("binds the token after a cluster to its last flag", () => {
    const { dispatcher, flags, logged } = setup(["-an", "5"]);
    expect(drive(dispatcher)).toEqual([{ kind: "flag" }, { kind: "end" }]);
    expect(flags.all.box.value).toBe(true);
    expect(flags.num.box.value).toBe(5);
    expect(logged).toEqual(["expanded -an into --all --num=5\n"]);
  });

  it("reads the value of a long flag from the next token", () => {
    const { dispatcher, flags } = setup(["--num", "7", "--name=x=y", "rest"]);
    expect(drive(dispatcher)).toEqual([
      { kind: "flag" },
      { kind: "flag" },
      { kind: "positional", token: "rest" },
      { kind: "end" }
    ]);
    expect(flags.num.box.value).toBe(7);
    expect(flags.name.box.value).toBe("x=y");
  });

  it("assigns a bare name=value token to the named flag", () => {
    const { dispatcher, flags, registry } = setup(["num=10", "name=a=b", "file"]);
    expect(drive(dispatcher)).toEqual([
      { kind: "flag" },
      { kind: "flag" },
      { kind: "positional", token: "file" },
      { kind: "end" }
    ]);
    expect(flags.num.box.value).toBe(10);
    expect(flags.name.box.value).toBe("a=b");
    expect(registry.isSet("num")).toBe(true);
  });

  it("reports an unknown name in a bare name=value token", () => {
    const failure = failureOf(setup(["colour=red"]).dispatcher);
    expect(failure.message).toBe("unknown flag: colour");
    expect(failure.code).toBe("E_UNKNOWN_FLAG");
  });

  it("leaves name=value tokens after the terminator alone", () => {
    const { dispatcher, stream, flags } = setup(["--", "num=10"]);
    expect(drive(dispatcher)).toEqual([{ kind: "terminator" }]);
    expect(stream.drain()).toEqual(["num=10"]);
    expect(flags.num.box.value).toBe(0);
  });

  it("treats a lone dash as positional and stops at the terminator", () => {
    const { dispatcher, stream } = setup(["-", "--", "-v"]);
    expect(drive(dispatcher)).toEqual([{ kind: "positional", token: "-" }, { kind: "terminator" }]);
    expect(stream.drain()).toEqual(["-v"]);
  });

  it("does not bind the next token after a boolean cluster", () => {
    const { dispatcher, flags } = setup(["-av", "file"]);
    expect(drive(dispatcher)).toEqual([{ kind: "flag" }, { kind: "positional", token: "file" }, { kind: "end" }]);
    expect(flags.verbose.box.value).toBe(true);
  });

  it("reports unknown flags", () => {
    const failure = failureOf(setup(["--nope"]).dispatcher);
    expect(failure.message).toBe("unknown flag: nope");
    expect(failure.code).toBe("E_UNKNOWN_FLAG");
    expect(failureOf(setup(["-az"]).dispatcher).message).toBe("unknown flag: z");
  });

  it("reports a missing value", () => {
    expect(failureOf(setup(["--num"]).dispatcher).message).toBe("missing value for flag: num");
    expect(failureOf(setup(["-n"]).dispatcher).message).toBe("missing value for flag: num");
  });

  it("refuses an assigned value for a boolean", () => {
    const failure = failureOf(setup(["--verbose=true"]).dispatcher);
    expect(failure.message).toBe("unexpected value for boolean flag: verbose");
    expect(failure.code).toBe("E_UNEXPECTED_VALUE");
    expect(failure.literal).toBe("true");
  });

  it("refuses a value flag before the end of a cluster", () => {
    const failure = failureOf(setup(["-nv", "3"]).dispatcher);
    expect(failure.message).toBe("flag num must be the last in its cluster to take a value");
    expect(failure.code).toBe("E_UNEXPECTED_VALUE");
  });

  it("wraps value errors with the flag and literal", () => {
    const failure = failureOf(setup(["--num", "abc"]).dispatcher);
    expect(failure.message).toBe('invalid value "abc" for flag num: parse error');
    expect(failure.code).toBe("E_VALUE_PARSE");
    expect(failure.flag).toBe("num");

    const range = failureOf(setup(["--num=99999999999999999999"]).dispatcher);
    expect(range.message).toBe('invalid value "99999999999999999999" for flag num: value out of range');
    expect(range.code).toBe("E_VALUE_RANGE");
  });

  it("marks a flag set only when its value was stored", () => {
    const { dispatcher, registry, flags } = setup(["--num", "abc"]);
    failureOf(dispatcher);
    expect(registry.isSet("num")).toBe(false);
    expect(flags.num.box.value).toBe(0);
  });
});
