import { Command, type CommandOptions } from "./command.js";
import { errorDetail } from "./errors.js";
import { readFile } from "./io.js";
import { isErrorPolicy, type ErrorPolicy } from "./policy.js";
import { setValue, zeroValue, type ValueKind } from "./values.js";

export type FlagType = Exclude<ValueKind, "func">;

const FLAG_TYPES = new Set<string>(["bool", "int", "int64", "uint", "uint64", "string", "float", "duration"]);

export type FlagDefinition = {
  name: string;
  type: FlagType;
  default?: string | number | boolean;
  description?: string;
  short?: boolean;
};

/** A command tree as written in a JSON definition file. */
export type CommandDefinition = {
  name: string;
  description?: string;
  aliases?: string[];
  format?: string;
  /** Root only; subcommands inherit it. */
  helpName?: string;
  /** Root only; subcommands inherit it. */
  errorPolicy?: ErrorPolicy;
  flags?: FlagDefinition[];
  commands?: CommandDefinition[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFlagType(value: string): value is FlagType {
  return FLAG_TYPES.has(value);
}

function optionalString(where: string, key: string, value: unknown): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new Error(`${where}: ${key} must be a string.`);
  }
  return value;
}

function optionalArray(where: string, key: string, value: unknown): unknown[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new Error(`${where}: ${key} must be an array.`);
  }
  return value;
}

function validateFlag(where: string, raw: unknown): FlagDefinition {
  if (!isRecord(raw)) {
    throw new Error(`${where}: each flag must be an object.`);
  }
  const name = optionalString(where, "flag name", raw.name);
  if (name === undefined || name.length === 0) {
    throw new Error(`${where}: flag name must be a non-empty string.`);
  }
  const at = `${where} flag ${name}`;
  const type = optionalString(at, "type", raw.type) ?? "string";
  if (!isFlagType(type)) {
    throw new Error(`${at}: type must be one of ${[...FLAG_TYPES].join(", ")}.`);
  }
  const flag: FlagDefinition = { name, type };
  const fallback = raw.default;
  if (fallback !== undefined) {
    if (typeof fallback !== "string" && typeof fallback !== "number" && typeof fallback !== "boolean") {
      throw new Error(`${at}: default must be a string, number or boolean.`);
    }
    flag.default = fallback;
  }
  const description = optionalString(at, "description", raw.description);
  if (description !== undefined) {
    flag.description = description;
  }
  if (raw.short !== undefined) {
    if (typeof raw.short !== "boolean") {
      throw new Error(`${at}: short must be a boolean.`);
    }
    flag.short = raw.short;
  }
  return flag;
}

export function validateDefinition(raw: unknown, where = "definition"): CommandDefinition {
  if (!isRecord(raw)) {
    throw new Error(`${where} must be a JSON object.`);
  }
  const name = optionalString(where, "name", raw.name);
  if (name === undefined) {
    throw new Error(`${where}: name must be a string.`);
  }
  const at = name.length > 0 ? `${where} ${name}` : where;
  const definition: CommandDefinition = { name };

  const description = optionalString(at, "description", raw.description);
  if (description !== undefined) definition.description = description;
  const format = optionalString(at, "format", raw.format);
  if (format !== undefined) definition.format = format;
  const helpName = optionalString(at, "helpName", raw.helpName);
  if (helpName !== undefined) definition.helpName = helpName;

  const errorPolicy = optionalString(at, "errorPolicy", raw.errorPolicy);
  if (errorPolicy !== undefined) {
    if (!isErrorPolicy(errorPolicy)) {
      throw new Error(`${at}: errorPolicy must be one of continue, exit, panic, log.`);
    }
    definition.errorPolicy = errorPolicy;
  }

  const aliases = optionalArray(at, "aliases", raw.aliases);
  if (aliases.length > 0) {
    definition.aliases = aliases.map((alias) => {
      if (typeof alias !== "string" || alias.length === 0) {
        throw new Error(`${at}: aliases must be non-empty strings.`);
      }
      return alias;
    });
  }

  const flags = optionalArray(at, "flags", raw.flags);
  if (flags.length > 0) {
    definition.flags = flags.map((flag) => validateFlag(at, flag));
  }

  const commands = optionalArray(at, "commands", raw.commands);
  if (commands.length > 0) {
    definition.commands = commands.map((command) => validateDefinition(command, `${at} >`));
  }
  return definition;
}

export function loadDefinition(filePath: string): CommandDefinition {
  const raw = readFile(filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Definition file "${filePath}" is not valid JSON: ${errorDetail(error)}`);
  }
  return validateDefinition(parsed);
}

function defineFlags(command: Command, flags: FlagDefinition[]): void {
  for (const flag of flags) {
    const box = zeroValue(flag.type);
    if (flag.default !== undefined) {
      const text = String(flag.default);
      try {
        setValue(box, text);
      } catch (error) {
        throw new Error(`${command.name} flag ${flag.name}: default "${text}" is invalid: ${errorDetail(error)}`);
      }
    }
    command.var(box, flag.name, flag.description ?? "", flag.short ?? false);
  }
}

function defineChildren(command: Command, definitions: CommandDefinition[]): void {
  for (const definition of definitions) {
    const child = command.newChild(definition.name, {
      ...(definition.description !== undefined ? { description: definition.description } : {}),
      ...(definition.format !== undefined ? { format: definition.format } : {})
    });
    if (definition.aliases) {
      child.addAlias(...definition.aliases);
    }
    defineFlags(child, definition.flags ?? []);
    defineChildren(child, definition.commands ?? []);
  }
}

/**
 * Builds the command tree a definition describes. Declaration mistakes
 * surface as the `ConfigurationError` the library throws for them.
 */
export function buildCommand(definition: CommandDefinition, options: CommandOptions = {}): Command {
  const root = new Command(definition.name, {
    ...options,
    ...(definition.errorPolicy !== undefined ? { errorPolicy: definition.errorPolicy } : {}),
    ...(definition.helpName !== undefined ? { helpName: definition.helpName } : {}),
    ...(definition.description !== undefined ? { description: definition.description } : {}),
    ...(definition.format !== undefined ? { format: definition.format } : {})
  });
  if (definition.aliases) {
    root.addAlias(...definition.aliases);
  }
  defineFlags(root, definition.flags ?? []);
  defineChildren(root, definition.commands ?? []);
  return root;
}
