export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type ConfigurationCode =
  | "E_DUPLICATE_FLAG"
  | "E_INVALID_FLAG_NAME"
  | "E_SHORT_COLLISION"
  | "E_DUPLICATE_COMMAND"
  | "E_ALIAS_TAKEN"
  | "E_INVALID_DEFAULT";

export type ParseCode =
  | "E_UNKNOWN_FLAG"
  | "E_MISSING_VALUE"
  | "E_UNEXPECTED_VALUE"
  | "E_VALUE_PARSE"
  | "E_VALUE_RANGE";

export type UsageCode = "E_NO_MAIN" | "E_NO_HELP";

export type FlagErrorCode = ConfigurationCode | ParseCode | UsageCode;

export class FlagError extends Error {
  code: FlagErrorCode;
  exitCode: number;

  constructor(message: string, code: FlagErrorCode, exitCode = EXIT_USAGE) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

/**
 * A mistake in how flags or commands were declared. Thrown at declaration
 * time whatever the command's error policy.
 */
export class ConfigurationError extends FlagError {
  declare code: ConfigurationCode;

  constructor(message: string, code: ConfigurationCode) {
    super(message, code, EXIT_FAILURE);
  }
}

/**
 * A failure caused by the arguments themselves. Routed through the
 * command's error policy.
 */
export class ParseFailure extends FlagError {
  declare code: ParseCode;
  flag: string;
  literal?: string;

  constructor(message: string, code: ParseCode, flag: string, literal?: string) {
    super(message, code, EXIT_USAGE);
    this.flag = flag;
    if (literal !== undefined) {
      this.literal = literal;
    }
  }
}

export class UsageError extends FlagError {
  declare code: UsageCode;

  constructor(message: string, code: UsageCode) {
    super(message, code, EXIT_FAILURE);
  }
}

export class ValueSyntaxError extends Error {
  constructor(message = "parse error") {
    super(message);
    this.name = "ValueSyntaxError";
  }
}

export class ValueRangeError extends Error {
  constructor(message = "value out of range") {
    super(message);
    this.name = "ValueRangeError";
  }
}

export function unknownFlag(name: string): ParseFailure {
  return new ParseFailure(`unknown flag: ${name}`, "E_UNKNOWN_FLAG", name);
}

export function missingValue(name: string): ParseFailure {
  return new ParseFailure(`missing value for flag: ${name}`, "E_MISSING_VALUE", name);
}

export function unexpectedValue(name: string, literal?: string): ParseFailure {
  return new ParseFailure(`unexpected value for boolean flag: ${name}`, "E_UNEXPECTED_VALUE", name, literal);
}

export function notLastInCluster(name: string): ParseFailure {
  return new ParseFailure(
    `flag ${name} must be the last in its cluster to take a value`,
    "E_UNEXPECTED_VALUE",
    name
  );
}

export function invalidValue(name: string, literal: string, cause: unknown): ParseFailure {
  const code = cause instanceof ValueRangeError ? "E_VALUE_RANGE" : "E_VALUE_PARSE";
  const detail = cause instanceof ValueRangeError ? "value out of range" : errorDetail(cause);
  return new ParseFailure(`invalid value "${literal}" for flag ${name}: ${detail}`, code, name, literal);
}

export function errorDetail(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
