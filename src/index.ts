export { Command, DEFAULT_FORMAT, HELP_DESCRIPTION } from "./command.js";
export type { CommandOptions, MainFn, OutputStream } from "./command.js";
export { ErrorPolicy, applyPolicy, isErrorPolicy } from "./policy.js";
export type { ExitFn, PolicyOutcome } from "./policy.js";
export {
  ConfigurationError,
  EXIT_FAILURE,
  EXIT_USAGE,
  FlagError,
  ParseFailure,
  UsageError,
  ValueRangeError,
  ValueSyntaxError
} from "./errors.js";
export type { ConfigurationCode, FlagErrorCode, ParseCode, UsageCode } from "./errors.js";
export { compareFlags, flagEquals } from "./flag.js";
export type { Flag } from "./flag.js";
export { DEFAULT_HELP_NAME, FlagRegistry } from "./registry.js";
export { expandArgs, expandToken, isShortRegion } from "./expand.js";
export type { Expansion, ExpansionTable } from "./expand.js";
export {
  boolValue,
  durationValue,
  floatValue,
  funcValue,
  getValue,
  int64Value,
  intValue,
  isBooleanValue,
  renderValue,
  setValue,
  stringValue,
  uint64Value,
  uintValue,
  zeroValue
} from "./values.js";
export type { NativeValue, ValueBox, ValueKind } from "./values.js";
export { formatDuration, parseDuration } from "./duration.js";
export { commandPath, defaultUsage, flagUsage, helpTree, renderHelpTree } from "./usage.js";
export type { HelpNode } from "./usage.js";
export { buildCommand, loadDefinition, validateDefinition } from "./definition.js";
export type { CommandDefinition, FlagDefinition, FlagType } from "./definition.js";
export { createLogger } from "./output.js";
export type { Logger } from "./output.js";
export { envUrl } from "./config.js";
