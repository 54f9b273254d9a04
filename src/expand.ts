/**
 * What the expander needs to know about a command's flags.
 *
 * Only `shorts` is required. `longs` lets a single-dash token spell out a
 * whole flag name (`-verbose`), and `booleans` keeps a cluster of boolean
 * flags from swallowing the argument after it.
 */
export interface ExpansionTable {
  shorts: ReadonlyMap<string, string>;
  longs?: ReadonlySet<string>;
  booleans?: ReadonlySet<string>;
}

export type Expansion = {
  tokens: string[];
  consumedNext: boolean;
};

export function isShortRegion(token: string): boolean {
  return token.length > 1 && token.startsWith("-") && token.charAt(1) !== "-";
}

/**
 * Rewrites one raw token into canonical long-form tokens. `next` is the raw
 * token after it, which a cluster of two or more flags takes as the value of
 * its last flag.
 */
export function expandToken(table: ExpansionTable, token: string, next?: string): Expansion {
  if (!isShortRegion(token)) {
    return { tokens: [token], consumedNext: false };
  }

  const body = token.slice(1);
  const eq = body.indexOf("=");
  if (eq >= 0) {
    const name = body.slice(0, eq);
    const value = body.slice(eq + 1);
    const long = table.shorts.get(name) ?? (table.longs?.has(name) ? name : undefined);
    return { tokens: [long === undefined ? token : `--${long}=${value}`], consumedNext: false };
  }

  if (table.longs?.has(body)) {
    return { tokens: [`--${body}`], consumedNext: false };
  }

  const tokens: string[] = [];
  const chars = [...body];
  let last: string | undefined;
  for (const char of chars) {
    last = table.shorts.get(char);
    tokens.push(last === undefined ? `-${char}` : `--${last}`);
  }

  const takesValue = last !== undefined && !(table.booleans?.has(last) ?? false);
  if (next !== undefined && chars.length > 1 && (table.booleans === undefined || takesValue)) {
    const lastIndex = tokens.length - 1;
    tokens[lastIndex] = `${tokens[lastIndex] ?? ""}=${next}`;
    return { tokens, consumedNext: true };
  }
  return { tokens, consumedNext: false };
}

/**
 * The whole-list form of `expandToken`. Everything from a `--` terminator on
 * passes through untouched.
 */
export function expandArgs(table: ExpansionTable, ...args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg === "--") {
      out.push(...args.slice(i));
      break;
    }
    const { tokens, consumedNext } = expandToken(table, arg, args[i + 1]);
    out.push(...tokens);
    if (consumedNext) {
      i += 1;
    }
  }
  return out;
}
