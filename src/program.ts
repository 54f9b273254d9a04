import yargs from "yargs";
import type { Argv } from "yargs";
import type { Command } from "./command.js";
import { getConfigPath, loadConfig, loadEnvOverrides, type ConfigFile } from "./config.js";
import { buildCommand, loadDefinition, type CommandDefinition } from "./definition.js";
import { FlagError, errorDetail } from "./errors.js";
import { createLogger, errorEnvelope, formatPlain, resolveOutputMode, successEnvelope, writeOutput, type Logger } from "./output.js";
import { ErrorPolicy } from "./policy.js";
import type { CliGlobals, LogLevel } from "./types.js";
import { commandPath, helpTree, renderHelpTree } from "./usage.js";
import { renderValue } from "./values.js";

export class CliError extends Error {
  exitCode: number;
  code: string;

  constructor(message: string, exitCode = 1, code = "E_INTERNAL") {
    super(message);
    this.exitCode = exitCode;
    this.code = code;
  }
}

export type ParseReport = {
  command: string;
  flags: Record<string, string>;
  set: string[];
  positionals: string[];
  help: boolean;
};

type ErrorContext = { mode: "plain" | "json"; output?: string; requestId?: string };

function isNodeIoError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && typeof error.code === "string";
}

function resolveLogLevel(args: CliGlobals, configured?: LogLevel): LogLevel {
  if (args.debug) return "debug";
  if (args.verbose) return "verbose";
  if (args.quiet) return "quiet";
  return configured ?? "info";
}

function loadSettings(): ConfigFile {
  let file: ConfigFile;
  try {
    file = loadConfig();
  } catch (error) {
    if (isNodeIoError(error)) {
      throw new CliError(`Failed to read config file at ${getConfigPath()}: ${errorDetail(error)}`, 1, "E_IO");
    }
    throw new CliError(`Invalid config file at ${getConfigPath()}: ${errorDetail(error)}`, 2, "E_VALIDATION");
  }
  try {
    return { ...file, ...loadEnvOverrides() };
  } catch (error) {
    throw new CliError(errorDetail(error), 2, "E_VALIDATION");
  }
}

function openDefinition(filePath: string, args: CliGlobals, logger: Logger): Command {
  const settings = loadSettings();
  let definition: CommandDefinition;
  try {
    definition = loadDefinition(filePath);
  } catch (error) {
    if (isNodeIoError(error)) {
      throw new CliError(`Failed to read definition file "${filePath}": ${errorDetail(error)}`, 1, "E_IO");
    }
    throw new CliError(errorDetail(error), 2, "E_VALIDATION");
  }
  logger.verbose(`loaded definition ${filePath}`);

  try {
    return buildCommand(definition, {
      errorPolicy: settings.errorPolicy ?? ErrorPolicy.ContinueOnError,
      ...(settings.helpName !== undefined ? { helpName: settings.helpName } : {}),
      logLevel: resolveLogLevel(args, settings.logLevel)
    });
  } catch (error) {
    if (error instanceof FlagError) {
      throw new CliError(error.message, 2, error.code);
    }
    throw new CliError(errorDetail(error), 2, "E_VALIDATION");
  }
}

function findCommand(root: Command, path: readonly string[]): Command {
  let current = root;
  for (const name of path) {
    const next = current.findChild(name);
    if (!next) {
      throw new CliError(`Unknown command "${name}" under "${commandPath(current)}".`, 2, "E_USAGE");
    }
    current = next;
  }
  return current;
}

function tokensAfterTerminator(args: object): string[] {
  const rest: unknown = "--" in args ? args["--"] : undefined;
  return Array.isArray(rest) ? rest.map((token) => String(token)) : [];
}

/** Positional tokens followed by everything after `--`, as given. */
function commandTokens(args: { args?: string[] | undefined }): string[] {
  return [...(args.args ?? []), ...tokensAfterTerminator(args)];
}

export function reportOf(root: Command): ParseReport {
  const target = root.selected();
  const flags: Record<string, string> = {};
  const set: string[] = [];
  target.visitAll((flag) => {
    flags[flag.name] = renderValue(flag.box);
  });
  target.visitSet((flag) => {
    set.push(flag.name);
  });
  return {
    command: commandPath(target),
    flags,
    set,
    positionals: [...target.args()],
    help: target.lookup(target.helpName) ? target.helpNeeded() : false
  };
}

function writeOutputOrThrow(content: string, output?: string): void {
  try {
    writeOutput(content, output);
  } catch (error) {
    throw new CliError(`Failed to write output: ${errorDetail(error)}`, 1, "E_IO");
  }
}

function outputResult<T>(args: CliGlobals, schema: string, summary: string, data: T, plain?: string): void {
  const mode = resolveOutputMode(args.json, args.plain);
  if (mode === "json") {
    const payload = successEnvelope(schema, summary, data, args.requestId);
    writeOutputOrThrow(`${JSON.stringify(payload)}\n`, args.output);
    return;
  }
  writeOutputOrThrow(formatPlain(plain ?? data), args.output);
}

function readNonFlagValue(argv: readonly string[], index: number): string | undefined {
  const candidate = argv[index + 1];
  if (!candidate || candidate.startsWith("-")) {
    return undefined;
  }
  return candidate;
}

/** Output flags read straight from argv, for errors raised before yargs has parsed them. */
export function resolveErrorContext(argv: readonly string[]): ErrorContext {
  let json = false;
  let output: string | undefined;
  let requestId: string | undefined;
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg === "--") break;
    if (arg === "--json") {
      json = true;
    } else if (arg === "--output" || arg === "-o") {
      output = readNonFlagValue(argv, i) ?? output;
    } else if (arg.startsWith("--output=")) {
      output = arg.slice("--output=".length) || output;
    } else if (arg === "--request-id") {
      requestId = readNonFlagValue(argv, i) ?? requestId;
    } else if (arg.startsWith("--request-id=")) {
      requestId = arg.slice("--request-id=".length) || requestId;
    }
  }
  const context: ErrorContext = json ? { mode: "json" } : { mode: "plain" };
  if (json && output) {
    context.output = output;
  }
  if (requestId) {
    context.requestId = requestId;
  }
  return context;
}

function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }
  if (error instanceof FlagError) {
    return new CliError(error.message, error.exitCode, error.code);
  }
  return new CliError(error instanceof Error ? error.message : "Unexpected error", 1, "E_INTERNAL");
}

function emitError(error: CliError, context: ErrorContext): void {
  if (context.mode === "json") {
    const payload = errorEnvelope("argtree.error.v1", { message: error.message, code: error.code }, context.requestId);
    try {
      writeOutput(`${JSON.stringify(payload)}\n`, context.output);
    } catch (_outputError) {
      process.stdout.write(`${JSON.stringify(payload)}\n`);
    }
    return;
  }
  process.stderr.write(`${error.message}\n`);
}

function definitionArg<T>(y: Argv<T>) {
  return y.positional("definition", {
    type: "string",
    demandOption: true,
    describe: "Path to a JSON command definition"
  });
}

function buildCli(argv: readonly string[]) {
  return yargs([...argv])
    .scriptName("argtree")
    .usage("argtree [global flags] <command> [args]")
    .example("argtree parse ./tool.json -- -vc 3 build", "")
    .example("argtree --json expand ./tool.json -- -vc3", "")
    .example("argtree usage ./tool.json build", "")
    .parserConfiguration({ "populate--": true })
    .option("json", { type: "boolean", default: false, describe: "Output machine-readable JSON" })
    .option("plain", { type: "boolean", default: false, describe: "Output stable plain text" })
    .option("output", { type: "string", alias: "o", describe: "Write output to file (use - for stdout)" })
    .option("quiet", { type: "boolean", default: false, alias: "q" })
    .option("verbose", { type: "boolean", default: false, alias: "v" })
    .option("debug", { type: "boolean", default: false })
    .option("request-id", { type: "string", describe: "Attach a request id to JSON output" })
    .middleware((args) => {
      if (args.json && args.plain) {
        throw new CliError("--json and --plain cannot be used together", 2, "E_USAGE");
      }
    })
    .command(
      "parse <definition> [args..]",
      "Parse arguments against a command definition (put them after --)",
      (y) => definitionArg(y).positional("args", { type: "string", array: true }),
      (args) => {
        const logger = createLogger(resolveLogLevel(args));
        const root = openDefinition(args.definition, args, logger);
        const failure = root.parse(commandTokens(args));
        if (failure) {
          throw new CliError(failure.message, failure.exitCode, failure.code);
        }
        const report = reportOf(root);
        outputResult(args, "argtree.parse.v1", `Parsed ${report.command}`, report);
      }
    )
    .command(
      "expand <definition> [args..]",
      "Rewrite short flags and clusters into long flags",
      (y) => definitionArg(y).positional("args", { type: "string", array: true }),
      (args) => {
        const logger = createLogger(resolveLogLevel(args));
        const root = openDefinition(args.definition, args, logger);
        const tokens = root.expand(commandTokens(args));
        outputResult(args, "argtree.expand.v1", `Expanded ${tokens.length} tokens`, { tokens }, tokens.join("\n"));
      }
    )
    .command(
      "usage <definition> [path..]",
      "Print the usage text of a command",
      (y) => definitionArg(y).positional("path", { type: "string", array: true, describe: "Subcommand names" }),
      (args) => {
        const logger = createLogger(resolveLogLevel(args));
        const root = openDefinition(args.definition, args, logger);
        const target = findCommand(root, args.path ?? []);
        const usage = target.usageText();
        outputResult(args, "argtree.usage.v1", `Usage for ${commandPath(target)}`, { command: commandPath(target), usage }, usage);
      }
    )
    .command(
      "tree <definition>",
      "Print the help tree of every command",
      (y) => definitionArg(y),
      (args) => {
        const logger = createLogger(resolveLogLevel(args));
        const root = openDefinition(args.definition, args, logger);
        const tree = renderHelpTree([helpTree(root)]);
        outputResult(args, "argtree.tree.v1", `Help tree for ${commandPath(root)}`, { tree }, tree);
      }
    )
    .command(
      "config <command>",
      "Inspect CLI configuration",
      (y) =>
        y
          .command(
            "path",
            "Print the config file location",
            (yy) => yy,
            (args) => {
              const file = getConfigPath();
              outputResult(args, "argtree.config.path.v1", "Config path resolved", { path: file }, file);
            }
          )
          .demandCommand(1)
    )
    .strict()
    .demandCommand(1)
    .exitProcess(false)
    .fail((msg, err) => {
      if (err instanceof CliError) {
        throw err;
      }
      if (err && err.name !== "YError") {
        throw err;
      }
      throw new CliError(msg || err?.message || "Invalid usage", 2, "E_USAGE");
    })
    .help()
    .version();
}

/** Runs the CLI over `argv` (without the node and script entries); resolves to the exit status. */
export async function main(argv: readonly string[]): Promise<number> {
  try {
    await buildCli(argv).parseAsync();
    return 0;
  } catch (error) {
    const resolved = toCliError(error);
    emitError(resolved, resolveErrorContext(argv));
    return resolved.exitCode;
  }
}
