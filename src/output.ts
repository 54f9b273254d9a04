import fs from "fs";
import path from "path";
import type { EnvelopeError, EnvelopeMeta, JsonEnvelope, LogLevel, OutputMode } from "./types.js";

export type Logger = {
  info: (msg: string) => void;
  verbose: (msg: string) => void;
  debug: (msg: string) => void;
  error: (msg: string) => void;
};

export type LineSink = (line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  quiet: 0,
  info: 1,
  verbose: 2,
  debug: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

export function resolveOutputMode(json: boolean, plain: boolean): OutputMode {
  if (json && plain) {
    throw new Error("--json and --plain cannot be used together");
  }
  return json ? "json" : "plain";
}

/**
 * Level-filtered line logger. `error` always writes, even when quiet.
 */
export function createLogger(level: LogLevel, sink: LineSink = (line) => process.stderr.write(line)): Logger {
  const shouldLog = (target: LogLevel) => LEVEL_RANK[level] >= LEVEL_RANK[target] && level !== "quiet";
  const emit = (msg: string) => sink(msg.endsWith("\n") ? msg : `${msg}\n`);

  return {
    info: (msg) => {
      if (shouldLog("info")) emit(msg);
    },
    verbose: (msg) => {
      if (shouldLog("verbose")) emit(msg);
    },
    debug: (msg) => {
      if (shouldLog("debug")) emit(msg);
    },
    error: (msg) => {
      emit(msg);
    },
  };
}

const MANIFEST = new URL("../package.json", import.meta.url);

let manifestVersion: string | undefined;

function readManifestVersion(): string {
  let manifest: unknown;
  try {
    manifest = JSON.parse(fs.readFileSync(MANIFEST, "utf8"));
  } catch (_error) {
    return "0.0.0";
  }
  if (typeof manifest === "object" && manifest !== null && "version" in manifest) {
    const { version } = manifest;
    if (typeof version === "string" && version.trim().length > 0) {
      return version.trim();
    }
  }
  return "0.0.0";
}

function envelopeMeta(requestId?: string): EnvelopeMeta {
  manifestVersion ??= readManifestVersion();
  return {
    tool: "argtree",
    version: manifestVersion,
    timestamp: new Date().toISOString(),
    ...(requestId !== undefined ? { request_id: requestId } : {}),
  };
}

export function successEnvelope<T>(schema: string, summary: string, data: T, requestId?: string): JsonEnvelope<T> {
  return { schema, meta: envelopeMeta(requestId), summary, status: "success", data, errors: [] };
}

/** The summary repeats the error message; `data` is always null. */
export function errorEnvelope(schema: string, error: EnvelopeError, requestId?: string): JsonEnvelope<null> {
  return { schema, meta: envelopeMeta(requestId), summary: error.message, status: "error", data: null, errors: [error] };
}

/** Writes to stdout, or to `target` (creating its directory) unless it is `-`. */
export function writeOutput(content: string, target?: string): void {
  if (target === undefined || target === "" || target === "-") {
    process.stdout.write(content);
    return;
  }
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content.endsWith("\n") ? content : `${content}\n`, "utf8");
}

export function formatPlain(data: unknown): string {
  const text = typeof data === "string" ? data : JSON.stringify(data, null, 2);
  return text.endsWith("\n") ? text : `${text}\n`;
}
