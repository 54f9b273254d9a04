import { getValue, renderValue, type ValueBox } from "./values.js";

/**
 * One entry in a command's flag registry.
 */
export interface Flag<B extends ValueBox = ValueBox> {
  /** Name as it appears on the command line, without dashes. */
  readonly name: string;
  readonly description: string;
  /** The default value as text, for usage messages. */
  readonly defValue: string;
  /** Whether the first character of the name may stand for the flag. */
  short: boolean;
  readonly box: B;
}

export function createFlag<B extends ValueBox>(name: string, description: string, box: B, short: boolean): Flag<B> {
  return {
    name,
    description,
    defValue: renderValue(box),
    short,
    box
  };
}

/** The first code point of the name, which a short-eligible flag answers to. */
export function shortChar(name: string): string {
  return [...name][0] ?? "";
}

export function flagEquals(flag: Flag, value: unknown): boolean {
  const current = getValue(flag.box);
  if (current === undefined) {
    return false;
  }
  return Object.is(current, value);
}

export function compareFlags(a: Flag, b: Flag): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}
