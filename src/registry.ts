import { ConfigurationError, errorDetail } from "./errors.js";
import { compareFlags, createFlag, shortChar, type Flag } from "./flag.js";
import { checkValue, isBooleanValue, renderValue, type ValueBox } from "./values.js";

export const DEFAULT_HELP_NAME = "help";

/**
 * The formal flags of one command and the subset set by the current parse.
 *
 * The designated help flag yields its short form whenever another flag
 * claims the same first character.
 */
export class FlagRegistry {
  helpName: string;
  private readonly owner: string;
  private readonly formal = new Map<string, Flag>();
  private readonly actual = new Map<string, Flag>();

  constructor(owner = "", helpName = DEFAULT_HELP_NAME) {
    this.owner = owner;
    this.helpName = helpName;
  }

  get size(): number {
    return this.formal.size;
  }

  get setCount(): number {
    return this.actual.size;
  }

  register<B extends ValueBox>(name: string, description: string, box: B, short: boolean): Flag<B> {
    if (name.length === 0) {
      throw new ConfigurationError(this.describe("flag name must not be empty"), "E_INVALID_FLAG_NAME");
    }
    if (name.startsWith("-")) {
      throw new ConfigurationError(this.describe(`flag "${name}" begins with -`), "E_INVALID_FLAG_NAME");
    }
    if (name.includes("=")) {
      throw new ConfigurationError(this.describe(`flag "${name}" contains =`), "E_INVALID_FLAG_NAME");
    }
    if (this.formal.has(name)) {
      throw new ConfigurationError(this.describe(`flag redefined: ${name}`), "E_DUPLICATE_FLAG");
    }

    try {
      checkValue(box);
    } catch (error) {
      throw this.invalidDefault(name, renderValue(box), error);
    }

    const flag = createFlag(name, description, box, short);
    if (flag.short) {
      const rival = this.shortOwner(shortChar(name));
      if (rival) {
        if (rival.name === this.helpName) {
          rival.short = false;
        } else if (name === this.helpName) {
          flag.short = false;
        } else {
          throw new ConfigurationError(
            this.describe(`short name collision between "${name}" and "${rival.name}" flags`),
            "E_SHORT_COLLISION"
          );
        }
      }
    }
    this.formal.set(name, flag);
    return flag;
  }

  remove(name: string): boolean {
    this.actual.delete(name);
    return this.formal.delete(name);
  }

  lookup(name: string): Flag | undefined {
    return this.formal.get(name);
  }

  /**
   * Resolves a token to a formal flag name: an exact name, or a single
   * character standing for a short-eligible flag.
   */
  accepts(token: string): string | undefined {
    if (this.formal.has(token)) {
      return token;
    }
    if ([...token].length === 1) {
      return this.shortOwner(token)?.name;
    }
    return undefined;
  }

  markSet(name: string): void {
    const flag = this.formal.get(name);
    if (flag) {
      this.actual.set(name, flag);
    }
  }

  isSet(name: string): boolean {
    return this.actual.has(name);
  }

  resetActual(): void {
    this.actual.clear();
  }

  visitAll(fn: (flag: Flag) => void): void {
    for (const flag of [...this.formal.values()].sort(compareFlags)) {
      fn(flag);
    }
  }

  visitSet(fn: (flag: Flag) => void): void {
    for (const flag of [...this.actual.values()].sort(compareFlags)) {
      fn(flag);
    }
  }

  /** Short character to long name, for every short-eligible flag. */
  shorts(): Map<string, string> {
    const out = new Map<string, string>();
    for (const flag of this.formal.values()) {
      if (flag.short) {
        out.set(shortChar(flag.name), flag.name);
      }
    }
    return out;
  }

  names(): Set<string> {
    return new Set(this.formal.keys());
  }

  booleans(): Set<string> {
    const out = new Set<string>();
    for (const flag of this.formal.values()) {
      if (isBooleanValue(flag.box)) {
        out.add(flag.name);
      }
    }
    return out;
  }

  private shortOwner(char: string): Flag | undefined {
    for (const flag of this.formal.values()) {
      if (flag.short && shortChar(flag.name) === char) {
        return flag;
      }
    }
    return undefined;
  }

  invalidDefault(name: string, literal: string, cause: unknown): ConfigurationError {
    return new ConfigurationError(
      this.describe(`invalid default "${literal}" for flag ${name}: ${errorDetail(cause)}`),
      "E_INVALID_DEFAULT"
    );
  }

  private describe(message: string): string {
    return this.owner ? `${this.owner}: ${message}` : message;
  }
}
