import { envUrl } from "./config.js";
import { Dispatcher, TokenStream, type Decision } from "./dispatch.js";
import { expandArgs } from "./expand.js";
import {
  ConfigurationError,
  EXIT_FAILURE,
  ParseFailure,
  UsageError,
  invalidValue,
  unknownFlag,
  type FlagError
} from "./errors.js";
import type { Flag } from "./flag.js";
import { isReceiving } from "./io.js";
import { createLogger, type Logger } from "./output.js";
import { ErrorPolicy, applyPolicy } from "./policy.js";
import { DEFAULT_HELP_NAME, FlagRegistry } from "./registry.js";
import type { LogLevel } from "./types.js";
import { commandPath, defaultUsage, flagLines } from "./usage.js";
import {
  boolValue,
  durationValue,
  floatValue,
  funcValue,
  int64Value,
  intValue,
  setValue,
  stringValue,
  uint64Value,
  uintValue,
  type BoolBox,
  type DurationBox,
  type FloatBox,
  type FuncBox,
  type Int64Box,
  type IntBox,
  type StringBox,
  type Uint64Box,
  type UintBox,
  type ValueBox
} from "./values.js";

export const DEFAULT_FORMAT = "%s [options] [args...]";
export const HELP_DESCRIPTION = "print this message";

export type OutputStream = {
  write(chunk: string): unknown;
};

export type MainFn = (self: Command) => void | Promise<void>;

export type CommandOptions = {
  errorPolicy?: ErrorPolicy;
  helpName?: string;
  output?: OutputStream;
  logLevel?: LogLevel;
  format?: string;
  url?: string;
  description?: string;
};

/**
 * A node in a command tree: its own flags, the positional arguments left
 * after the last parse, and any subcommands.
 *
 * Flag names are unique within a command; defining one twice throws a
 * `ConfigurationError`. Every command except one named like the help flag
 * starts with a short-eligible boolean help flag.
 */
export class Command {
  readonly name: string;
  description: string;
  format: string;
  url: string;
  /** Replaces the default usage text. */
  usage: (() => string) | undefined;
  main: MainFn | undefined;
  readonly logger: Logger;

  private readonly parentCommand: Command | undefined;
  private readonly registry: FlagRegistry;
  private readonly childCommands: Command[] = [];
  private readonly aliasNames: string[] = [];
  private readonly policy: ErrorPolicy;
  private readonly logLevel: LogLevel;
  private output: OutputStream;
  private positionals: string[] = [];
  private wasParsed = false;
  private selection: Command | undefined;

  constructor(name: string, options: CommandOptions = {}, parent?: Command) {
    this.name = name;
    this.parentCommand = parent;
    this.policy = options.errorPolicy ?? ErrorPolicy.ContinueOnError;
    this.registry = new FlagRegistry(name, options.helpName ?? DEFAULT_HELP_NAME);
    this.output = options.output ?? process.stderr;
    this.logLevel = options.logLevel ?? "info";
    this.logger = createLogger(this.logLevel, (line) => {
      this.output.write(line);
    });
    this.format = options.format ?? DEFAULT_FORMAT;
    this.url = options.url ?? envUrl(name);
    this.description = options.description ?? "";
    if (name !== this.registry.helpName) {
      this.bool(this.registry.helpName, false, HELP_DESCRIPTION, true);
    }
  }

  get parent(): Command | undefined {
    return this.parentCommand;
  }

  get aliases(): readonly string[] {
    return [...this.aliasNames];
  }

  get errorPolicy(): ErrorPolicy {
    return this.policy;
  }

  get helpName(): string {
    return this.registry.helpName;
  }

  /** Whether `parse` has run, whatever its outcome. */
  get parsed(): boolean {
    return this.wasParsed;
  }

  /** How many flags the last parse set. */
  get nFlag(): number {
    return this.registry.setCount;
  }

  /** How many positional arguments the last parse left. */
  get nArg(): number {
    return this.positionals.length;
  }

  /**
   * Creates a subcommand inheriting this command's error policy, help flag
   * name, output, log level and URL.
   */
  newChild(name: string, options: Pick<CommandOptions, "description" | "format"> = {}): Command {
    if (this.childNames().includes(name)) {
      throw new ConfigurationError(`${commandPath(this)}: command "${name}" is already defined`, "E_DUPLICATE_COMMAND");
    }
    const child = new Command(
      name,
      {
        ...options,
        errorPolicy: this.policy,
        helpName: this.registry.helpName,
        output: this.output,
        logLevel: this.logLevel,
        url: this.url
      },
      this
    );
    this.childCommands.push(child);
    return child;
  }

  children(): Command[] {
    return [...this.childCommands];
  }

  /** Names and aliases of every subcommand. */
  childNames(): string[] {
    return this.childCommands.flatMap((child) => [child.name, ...child.aliasNames]);
  }

  findChild(token: string): Command | undefined {
    return this.childCommands.find((child) => child.name === token || child.aliasNames.includes(token));
  }

  /** Adds alternative names, which must not clash with any sibling's. */
  addAlias(...names: string[]): void {
    const taken = new Set(this.parentCommand?.childNames() ?? []);
    const blocked = names.filter((name, index) => taken.has(name) || names.indexOf(name) !== index);
    if (blocked.length > 0) {
      throw new ConfigurationError(`the following names are taken: ${blocked.join(", ")}`, "E_ALIAS_TAKEN");
    }
    this.aliasNames.push(...names);
  }

  setOutput(output: OutputStream = process.stderr): void {
    this.output = output;
  }

  bool(name: string, value = false, description = "", short = false): Flag<BoolBox> {
    return this.var(boolValue(value), name, description, short);
  }

  int(name: string, value = 0, description = "", short = false): Flag<IntBox> {
    return this.var(intValue(value), name, description, short);
  }

  int64(name: string, value: bigint = 0n, description = "", short = false): Flag<Int64Box> {
    return this.var(int64Value(value), name, description, short);
  }

  uint(name: string, value = 0, description = "", short = false): Flag<UintBox> {
    return this.var(uintValue(value), name, description, short);
  }

  uint64(name: string, value: bigint = 0n, description = "", short = false): Flag<Uint64Box> {
    return this.var(uint64Value(value), name, description, short);
  }

  string(name: string, value = "", description = "", short = false): Flag<StringBox> {
    return this.var(stringValue(value), name, description, short);
  }

  float(name: string, value = 0, description = "", short = false): Flag<FloatBox> {
    return this.var(floatValue(value), name, description, short);
  }

  /** `milliseconds` is the default; the flag reads text such as `1m30s`. */
  duration(name: string, milliseconds = 0, description = "", short = false): Flag<DurationBox> {
    let box: DurationBox;
    try {
      box = durationValue(milliseconds);
    } catch (error) {
      throw this.registry.invalidDefault(name, String(milliseconds), error);
    }
    return this.var(box, name, description, short);
  }

  /** Calls `fn` with the text each time the flag is seen; a throw is a value error. */
  func(name: string, description: string, fn: (text: string) => void, short = false): Flag<FuncBox> {
    return this.var(funcValue(fn), name, description, short);
  }

  var<B extends ValueBox>(box: B, name: string, description: string, short = false): Flag<B> {
    return this.registry.register(name, description, box, short);
  }

  /** Replaces the help flag with a boolean flag under `name`. */
  setHelpFlag(name: string, short: boolean): Flag<BoolBox> {
    this.registry.remove(this.registry.helpName);
    this.registry.helpName = name;
    return this.bool(name, false, HELP_DESCRIPTION, short);
  }

  lookup(name: string): Flag | undefined {
    return this.registry.lookup(name);
  }

  /** Sets a flag from text as if it had been given on the command line. */
  set(name: string, text: string): void {
    const flag = this.registry.lookup(name);
    if (!flag) {
      throw unknownFlag(name);
    }
    try {
      setValue(flag.box, text);
    } catch (error) {
      throw invalidValue(name, text, error);
    }
    this.registry.markSet(name);
  }

  visitAll(fn: (flag: Flag) => void): void {
    this.registry.visitAll(fn);
  }

  visitSet(fn: (flag: Flag) => void): void {
    this.registry.visitSet(fn);
  }

  visited(flag: Flag): boolean {
    return this.registry.isSet(flag.name);
  }

  /** Forgets which flags were set. Values stay as they are. */
  resetActual(): void {
    this.registry.resetActual();
  }

  /** The i'th positional argument, or `""` when there is none. */
  arg(i: number): string {
    return this.positionals[i] ?? "";
  }

  args(): readonly string[] {
    return [...this.positionals];
  }

  *iterArgs(): Generator<string, void, undefined> {
    yield* [...this.positionals];
  }

  invoked(): boolean {
    return this.nArg + this.nFlag > 0;
  }

  /** The deepest command chosen by the last parse. */
  selected(): Command {
    return this.selection ?? this;
  }

  /** `args` rewritten with this command's short names spelled out. */
  expand(args: readonly string[]): string[] {
    return expandArgs(
      { shorts: this.registry.shorts(), longs: this.registry.names(), booleans: this.registry.booleans() },
      ...args
    );
  }

  /**
   * Parses `args`, or the process arguments when none are given. When the
   * first positional names a subcommand, the rest goes to that subcommand's
   * own parse. Returns the failure under ContinueOnError, `null` otherwise.
   */
  parse(args?: readonly string[]): ParseFailure | null {
    try {
      return this.run(args ?? process.argv.slice(2));
    } finally {
      this.wasParsed = true;
    }
  }

  /** Applies the error policy; absent errors pass through as `null`. */
  handle<E extends FlagError>(error: E | null | undefined): E | null {
    if (!error) {
      return null;
    }
    const outcome = applyPolicy(this.policy, error, this.logger);
    return outcome.action === "return" ? outcome.error : null;
  }

  /** Parses, then runs the selected command's `main`. */
  async execute(args?: readonly string[]): Promise<void> {
    const failure = this.parse(args);
    if (failure) {
      throw failure;
    }
    const target = this.selected();
    if (!target.main) {
      throw new UsageError(`${commandPath(target)}: attempted to execute a command with no main function`, "E_NO_MAIN");
    }
    await target.main(target);
  }

  usageText(): string {
    return this.usage ? this.usage() : defaultUsage(this);
  }

  /** Usage lines for every flag. */
  defaults(): string {
    return flagLines(this).join("\n");
  }

  receiving(): boolean {
    return isReceiving();
  }

  /** Parsed, and the help flag was given. */
  helpNeeded(): boolean {
    const name = this.requireHelpFlag();
    return this.parsed && this.registry.isSet(name);
  }

  /** As `helpNeeded`, or nothing at all was supplied, stdin included. */
  helpWorthy(): boolean {
    const used = this.registry.isSet(this.requireHelpFlag());
    return this.parsed && (used || (this.nFlag === 0 && this.nArg === 0 && !this.receiving()));
  }

  /** Prints `message` and the help text, then exits, when `condition` holds. */
  helpIf(condition: boolean, message?: string): void {
    if (!condition) {
      return;
    }
    if (message) {
      process.stdout.write(message.endsWith("\n") ? message : `${message}\n`);
    }
    this.printHelp();
  }

  /** Warns with `message` when `condition` does not hold. */
  warnIf(condition: boolean, message?: string): void {
    if (!condition && message) {
      this.warn(message);
    }
  }

  /** Writes the usage text and exits with status 1. */
  printHelp(): never {
    return this.exit(this.usageText(), EXIT_FAILURE);
  }

  exit(message: string, code: number): never {
    this.warn(message);
    return process.exit(code);
  }

  warn(error: Error | string | null | undefined): void {
    if (!error) {
      return;
    }
    const message = typeof error === "string" ? error : error.message;
    if (message.length > 0) {
      this.logger.error(message);
    }
  }

  private requireHelpFlag(): string {
    const name = this.registry.helpName;
    if (!this.registry.lookup(name)) {
      throw new UsageError(`help flag "${name}" is undefined for this command`, "E_NO_HELP");
    }
    return name;
  }

  private run(tokens: readonly string[]): ParseFailure | null {
    this.positionals = [];
    this.selection = undefined;
    const stream = new TokenStream(tokens);
    const dispatcher = new Dispatcher(this.registry, stream, this.logger);

    for (;;) {
      let decision: Decision;
      try {
        decision = dispatcher.step();
      } catch (error) {
        if (!(error instanceof ParseFailure)) {
          throw error;
        }
        const failure = this.handle(error);
        if (failure) {
          return failure;
        }
        continue;
      }

      switch (decision.kind) {
        case "end":
          return null;
        case "flag":
          break;
        case "terminator":
          this.positionals.push(...stream.drain());
          return null;
        case "positional": {
          const child = this.positionals.length === 0 ? this.findChild(decision.token) : undefined;
          if (!child) {
            this.positionals.push(decision.token);
            break;
          }
          this.logger.debug(`selected command ${commandPath(child)}`);
          const failure = child.parse(stream.drain());
          this.selection = child.selected();
          return failure;
        }
      }
    }
  }
}
