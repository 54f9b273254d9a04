import { invalidValue, missingValue, notLastInCluster, unexpectedValue, unknownFlag } from "./errors.js";
import { expandToken, isShortRegion, type ExpansionTable } from "./expand.js";
import type { Flag } from "./flag.js";
import type { Logger } from "./output.js";
import type { FlagRegistry } from "./registry.js";
import { isBooleanValue, setValue } from "./values.js";

export const TERMINATOR = "--";

export type Decision =
  | { kind: "flag" }
  | { kind: "positional"; token: string }
  | { kind: "terminator" }
  | { kind: "end" };

export class TokenStream {
  private readonly tokens: readonly string[];
  private index = 0;

  constructor(tokens: readonly string[]) {
    this.tokens = tokens;
  }

  get remaining(): number {
    return this.tokens.length - this.index;
  }

  next(): string | undefined {
    const token = this.tokens[this.index];
    if (token !== undefined) {
      this.index += 1;
    }
    return token;
  }

  peek(): string | undefined {
    return this.tokens[this.index];
  }

  /** Takes every token not yet consumed. */
  drain(): string[] {
    const rest = this.tokens.slice(this.index);
    this.index = this.tokens.length;
    return rest;
  }
}

function stripDashes(token: string): string {
  if (token.startsWith("--")) return token.slice(2);
  if (token.startsWith("-")) return token.slice(1);
  return token;
}

/**
 * Consumes a token stream one decision at a time against a registry,
 * setting flag values as it goes. Failures are thrown as `ParseFailure`.
 */
export class Dispatcher {
  private readonly registry: FlagRegistry;
  private readonly stream: TokenStream;
  private readonly logger: Logger | undefined;

  constructor(registry: FlagRegistry, stream: TokenStream, logger?: Logger) {
    this.registry = registry;
    this.stream = stream;
    this.logger = logger;
  }

  table(): ExpansionTable {
    return {
      shorts: this.registry.shorts(),
      longs: this.registry.names(),
      booleans: this.registry.booleans()
    };
  }

  step(): Decision {
    const token = this.stream.next();
    if (token === undefined) {
      return { kind: "end" };
    }
    if (token === TERMINATOR) {
      return { kind: "terminator" };
    }
    if (token === "-") {
      return { kind: "positional", token };
    }
    if (!token.startsWith("-")) {
      if (!token.includes("=")) {
        return { kind: "positional", token };
      }
      this.apply(token, false);
      return { kind: "flag" };
    }

    if (!isShortRegion(token)) {
      this.apply(token, false);
      return { kind: "flag" };
    }

    const { tokens, consumedNext } = expandToken(this.table(), token, this.stream.peek());
    if (consumedNext) {
      this.stream.next();
    }
    if (tokens.length !== 1 || tokens[0] !== token) {
      this.logger?.debug(`expanded ${token} into ${tokens.join(" ")}`);
    }
    tokens.forEach((expanded, index) => {
      this.apply(expanded, index < tokens.length - 1);
    });
    return { kind: "flag" };
  }

  private resolve(name: string): Flag {
    const resolved = this.registry.accepts(name);
    const flag = resolved === undefined ? undefined : this.registry.lookup(resolved);
    if (!flag) {
      throw unknownFlag(name);
    }
    return flag;
  }

  private assign(flag: Flag, text: string): void {
    try {
      setValue(flag.box, text);
    } catch (error) {
      throw invalidValue(flag.name, text, error);
    }
    this.registry.markSet(flag.name);
  }

  private enable(flag: Flag): void {
    if (isBooleanValue(flag.box)) {
      flag.box.value = true;
      this.registry.markSet(flag.name);
    }
  }

  /**
   * `beforeClusterEnd` is set for every token of an expanded cluster except
   * the last; a flag that takes a value may not appear there.
   */
  private apply(token: string, beforeClusterEnd: boolean): void {
    const eq = token.indexOf("=");
    if (eq >= 0) {
      const name = stripDashes(token.slice(0, eq));
      const value = token.slice(eq + 1);
      const flag = this.resolve(name);
      if (isBooleanValue(flag.box)) {
        throw unexpectedValue(name, value);
      }
      this.assign(flag, value);
      return;
    }

    if (token.startsWith("--")) {
      const name = token.slice(2);
      const flag = this.resolve(name);
      if (isBooleanValue(flag.box)) {
        this.enable(flag);
        return;
      }
      if (beforeClusterEnd) {
        throw notLastInCluster(name);
      }
      const value = this.stream.next();
      if (value === undefined) {
        throw missingValue(name);
      }
      this.assign(flag, value);
      return;
    }

    const chars = [...token.slice(1)];
    for (const [index, char] of chars.entries()) {
      const flag = this.resolve(char);
      if (isBooleanValue(flag.box)) {
        this.enable(flag);
        continue;
      }
      if (index !== chars.length - 1 || beforeClusterEnd) {
        throw notLastInCluster(char);
      }
      const value = this.stream.next();
      if (value === undefined) {
        throw missingValue(char);
      }
      this.assign(flag, value);
    }
  }
}
