import type { Command } from "./command.js";
import { shortChar, type Flag } from "./flag.js";
import { isZeroValue } from "./values.js";

export const NAME_SEPARATOR = " ";
export const INDENT = "\t";

/**
 * Pulls a back-quoted value name out of a flag's description:
 * "a `file` to read" gives `{ name: "file", usage: "a file to read" }`.
 * Without back quotes the name comes from the flag's kind, and is empty for
 * booleans.
 */
export function unquoteUsage(flag: Flag): { name: string; usage: string } {
  const usage = flag.description;
  const open = usage.indexOf("`");
  if (open >= 0) {
    const close = usage.indexOf("`", open + 1);
    if (close >= 0) {
      const name = usage.slice(open + 1, close);
      return { name, usage: usage.slice(0, open) + name + usage.slice(close + 1) };
    }
  }

  switch (flag.box.kind) {
    case "bool":
      return { name: "", usage };
    case "duration":
      return { name: "duration", usage };
    case "float":
      return { name: "float", usage };
    case "int":
    case "int64":
      return { name: "int", usage };
    case "string":
      return { name: "string", usage };
    case "uint":
    case "uint64":
      return { name: "uint", usage };
    case "func":
      return { name: "value", usage };
  }
}

/** One line of flag help: `-c, --count int<TAB>how many [default: 5]`. */
export function flagUsage(flag: Flag): string {
  const { name, usage } = unquoteUsage(flag);
  let out = flag.short ? `-${shortChar(flag.name)}, --${flag.name}` : `--${flag.name}`;
  if (name.length > 0) {
    out += ` ${name}`;
  }
  out += `${INDENT}${usage}`;
  if (!isZeroValue(flag.box, flag.defValue)) {
    out += ` [default: ${flag.defValue}]`;
  }
  return out;
}

export function commandPath(command: Command): string {
  const names: string[] = [];
  for (let current: Command | undefined = command; current; current = current.parent) {
    if (current.name.length > 0) {
      names.unshift(current.name);
    }
  }
  return names.join(NAME_SEPARATOR);
}

export function usageHeader(command: Command): string {
  const path = commandPath(command);
  const line = command.format.includes("%s") ? command.format.replace("%s", path) : `${path} ${command.format}`;
  return `usage: ${line.trim()}`;
}

export function flagLines(command: Command): string[] {
  const lines: string[] = [];
  command.visitAll((flag) => {
    lines.push(`${INDENT}${flagUsage(flag)}`);
  });
  return lines;
}

export function defaultUsage(command: Command): string {
  const sections = [usageHeader(command)];
  const flags = flagLines(command);
  if (flags.length > 0) {
    sections.push(["flags:", ...flags].join("\n"));
  }
  const children = command.children();
  if (children.length > 0) {
    const lines = children.map((child) => {
      const names = [child.name, ...child.aliases].join(", ");
      return child.description ? `${INDENT}${names}${INDENT}${child.description}` : `${INDENT}${names}`;
    });
    sections.push(["commands:", ...lines].join("\n"));
  }
  if (command.url.length > 0) {
    sections.push(command.url);
  }
  return `${sections.join("\n\n")}\n`;
}

export type HelpNode = {
  text: string;
  children?: HelpNode[];
};

/** Renders nodes one tab deeper per level; multi-line text keeps its indent. */
export function renderHelpTree(nodes: HelpNode[], depth = 0): string {
  const lines: string[] = [];
  for (const node of nodes) {
    const indent = INDENT.repeat(depth);
    for (const line of node.text.split("\n")) {
      lines.push(`${indent}${line}`);
    }
    if (node.children && node.children.length > 0) {
      lines.push(renderHelpTree(node.children, depth + 1));
    }
  }
  return lines.join("\n");
}

export function helpTree(command: Command): HelpNode {
  const flags: HelpNode[] = [];
  command.visitAll((flag) => {
    flags.push({ text: flagUsage(flag) });
  });
  const title = command.description ? `${commandPath(command)}: ${command.description}` : commandPath(command);
  return {
    text: title,
    children: [...flags, ...command.children().map((child) => helpTree(child))]
  };
}
