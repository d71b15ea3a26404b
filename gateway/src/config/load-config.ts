import * as fs from "node:fs";
import { ZodError } from "zod";
import { parseConfig, type Config } from "@marketlens/shared";

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export type LoadConfigOptions = {
  /** JSON config file; falls back to MARKETLENS_CONFIG. */
  path?: string;
  env?: NodeJS.ProcessEnv;
};

function section(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value) ? { ...value } : {};
}

function readConfigFile(path: string): object {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}`, { cause: err });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, { cause: err });
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

/** GATEWAY_TOKENS is a comma-separated list of token:principalId pairs. */
export function parseTokenList(value: string): Record<string, { id: string }> {
  const tokens: Record<string, { id: string }> = {};
  for (const pair of value.split(",")) {
    const trimmed = pair.trim();
    if (trimmed.length === 0) continue;
    const sep = trimmed.indexOf(":");
    if (sep <= 0 || sep === trimmed.length - 1) {
      throw new ConfigError("GATEWAY_TOKENS entries must look like token:principalId");
    }
    tokens[trimmed.slice(0, sep)] = { id: trimmed.slice(sep + 1) };
  }
  return tokens;
}

function applyEnv(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const merged = { ...raw };

  if (env.PORT !== undefined || env.HOST !== undefined) {
    const server = section(merged.server);
    if (env.PORT !== undefined) server.port = Number(env.PORT);
    if (env.HOST !== undefined) server.host = env.HOST;
    merged.server = server;
  }

  if (env.LOG_LEVEL !== undefined) {
    merged.logging = { ...section(merged.logging), level: env.LOG_LEVEL };
  }

  if (env.GATEWAY_TOKENS !== undefined) {
    const auth = section(merged.auth);
    auth.tokens = { ...section(auth.tokens), ...parseTokenList(env.GATEWAY_TOKENS) };
    merged.auth = auth;
  }

  return merged;
}

function describeIssues(err: ZodError): string {
  return err.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const path = options.path ?? env.MARKETLENS_CONFIG;
  const raw = path ? section(readConfigFile(path)) : {};

  try {
    return parseConfig(applyEnv(raw, env));
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(`Invalid configuration: ${describeIssues(err)}`, { cause: err });
    }
    throw err;
  }
}
