import { readFileSync } from "node:fs";
import { ZodError } from "zod";
import type { PacerConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

/** Raised for a config file that exists but cannot be used; always names the file. */
export class ConfigError extends Error {
  constructor(
    readonly configPath: string,
    readonly problems: string[],
  ) {
    super(`Invalid config ${configPath}: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

function missingEnv(raw: string): string[] {
  const missing = new Set<string>();
  for (const [, varName] of raw.matchAll(ENV_PATTERN)) {
    if (varName !== undefined && process.env[varName] === undefined) missing.add(varName);
  }
  return [...missing];
}

/**
 * Replaces `${env:NAME}` references. Every unset variable is reported at
 * once, against `source` (the config path when there is one).
 */
export function substituteEnv(raw: string, source = "<inline>"): string {
  const missing = missingEnv(raw);
  if (missing.length > 0) {
    throw new ConfigError(
      source,
      missing.map((name) => `missing environment variable ${name} (referenced as \${env:${name}})`),
    );
  }
  return raw.replace(ENV_PATTERN, (_match, varName: string) => process.env[varName] ?? "");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function describeIssues(err: ZodError): string[] {
  return err.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/** Substitutes, parses and validates file content read from `configPath`. */
export function parseConfigFile(content: string, configPath: string): PacerConfig {
  const substituted = substituteEnv(content, configPath);

  let raw: unknown;
  try {
    raw = JSON.parse(substituted);
  } catch (err) {
    throw new ConfigError(configPath, [err instanceof Error ? err.message : String(err)]);
  }

  try {
    return parseConfig(raw);
  } catch (err) {
    if (err instanceof ZodError) throw new ConfigError(configPath, describeIssues(err));
    throw err;
  }
}

export function loadConfig(path?: string): PacerConfig {
  const configPath = getConfigPath(path);

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return parseConfig({});
    }
    throw err;
  }

  return parseConfigFile(content, configPath);
}
