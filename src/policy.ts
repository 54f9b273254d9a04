import { EXIT_USAGE, type FlagError } from "./errors.js";
import type { Logger } from "./output.js";

/** How a command responds when parsing fails. */
export enum ErrorPolicy {
  /** Report the error and hand it back to the caller. */
  ContinueOnError = "continue",
  /** Report the error and exit with status 2. */
  ExitOnError = "exit",
  /** Throw the error. */
  PanicOnError = "panic",
  /** Report the error and keep parsing. */
  LogOnError = "log",
}

const POLICIES = new Set<string>(Object.values(ErrorPolicy));

export function isErrorPolicy(value: string): value is ErrorPolicy {
  return POLICIES.has(value);
}

export type PolicyOutcome<E> =
  | { action: "return"; error: E }
  | { action: "resume" };

export type ExitFn = (code: number) => never;

/**
 * Applies `policy` to `error`. Exit never returns and Panic throws; the
 * other two tell the caller whether to stop and return the error or to
 * keep going.
 */
export function applyPolicy<E extends FlagError>(
  policy: ErrorPolicy,
  error: E,
  logger: Logger,
  exit: ExitFn = (code) => process.exit(code),
): PolicyOutcome<E> {
  switch (policy) {
    case ErrorPolicy.ContinueOnError:
      logger.error(error.message);
      return { action: "return", error };
    case ErrorPolicy.ExitOnError:
      logger.error(error.message);
      return exit(EXIT_USAGE);
    case ErrorPolicy.PanicOnError:
      throw error;
    case ErrorPolicy.LogOnError:
      logger.error(error.message);
      return { action: "resume" };
  }
}
