import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ZodError } from "zod";
import type { RelayConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

/** Raised for unreadable JSON and schema violations, one `path: message` line per issue. */
export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
    options?: { cause?: unknown },
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join("\n")}` : message, options);
  }
}

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new ConfigError(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

function describeIssues(err: ZodError): string[] {
  return err.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/** Substitute env references, then parse and validate a config file's text. */
export function parseConfigText(content: string): RelayConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(substituteEnv(content));
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`Config is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, [], {
      cause: err,
    });
  }

  try {
    return parseConfig(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError("Config does not match the schema", describeIssues(err), { cause: err });
    }
    throw err;
  }
}

/** Load the config file, or defaults when it does not exist. */
export function loadConfig(path?: string): RelayConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return parseConfig({});
    }
    throw err;
  }

  return parseConfigText(content);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
