import fs from "fs";
import os from "os";
import path from "path";
import { isLogLevel } from "./output.js";
import { isErrorPolicy, type ErrorPolicy } from "./policy.js";
import type { LogLevel } from "./types.js";

export type ConfigFile = {
  errorPolicy?: ErrorPolicy;
  helpName?: string;
  logLevel?: LogLevel;
};

export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  if (xdg && xdg.trim().length > 0) {
    return path.join(xdg, "argtree");
  }
  return path.join(os.homedir(), ".config", "argtree");
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.json");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function validateConfig(raw: unknown): ConfigFile {
  if (!isRecord(raw)) {
    throw new Error("Config file must be a JSON object.");
  }
  const config: ConfigFile = {};
  const { errorPolicy, helpName, logLevel } = raw;
  if (errorPolicy !== undefined) {
    if (typeof errorPolicy !== "string" || !isErrorPolicy(errorPolicy)) {
      throw new Error("Config errorPolicy must be one of continue, exit, panic, log.");
    }
    config.errorPolicy = errorPolicy;
  }
  if (helpName !== undefined) {
    if (typeof helpName !== "string" || helpName.trim().length === 0) {
      throw new Error("Config helpName must be a non-empty string.");
    }
    config.helpName = helpName.trim();
  }
  if (logLevel !== undefined) {
    if (typeof logLevel !== "string" || !isLogLevel(logLevel)) {
      throw new Error("Config logLevel must be one of quiet, info, verbose, debug.");
    }
    config.logLevel = logLevel;
  }
  return config;
}

export function loadConfig(): ConfigFile {
  const file = getConfigPath();
  if (!fs.existsSync(file)) return {};
  const raw = fs.readFileSync(file, "utf8");
  return validateConfig(JSON.parse(raw));
}

export function loadEnvOverrides(env: NodeJS.ProcessEnv = process.env): ConfigFile {
  const overrides: ConfigFile = {};
  const helpName = env.ARGTREE_HELP_NAME?.trim();
  const logLevel = env.ARGTREE_LOG_LEVEL?.trim();
  if (helpName && helpName.length > 0) {
    overrides.helpName = helpName;
  }
  if (logLevel && logLevel.length > 0) {
    if (!isLogLevel(logLevel)) {
      throw new Error("ARGTREE_LOG_LEVEL must be one of quiet, info, verbose, debug.");
    }
    overrides.logLevel = logLevel;
  }
  return overrides;
}

/**
 * `<REPO_HOST>/<DEVELOPER>/<name>`, or `""` when `REPO_HOST` is unset or is
 * not a URL.
 */
export function envUrl(name: string, env: NodeJS.ProcessEnv = process.env): string {
  const repoHost = env.REPO_HOST?.trim() ?? "";
  const developer = env.DEVELOPER?.trim() ?? "";
  if (repoHost.length === 0) {
    return "";
  }
  let url: URL;
  try {
    url = new URL(repoHost);
  } catch (_error) {
    return "";
  }
  const segments = [url.pathname, developer, name]
    .flatMap((segment) => segment.split("/"))
    .filter((segment) => segment.length > 0);
  url.pathname = `/${segments.join("/")}`;
  return url.toString();
}
