import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { ConfigError, ValidationError } from "../../domain/common/errors";
import { formatIssues } from "../../domain/llm/schemas";
import { openRouterHeaders } from "../llm/providers/openrouter";
import { BUILTIN_PROVIDERS } from "../llm/registry";
import type { Env } from "../llm/types";
import { AppConfigSchema, type AppConfig } from "./schema";

export type LoadConfigArgs = {
  configPath?: string;
  overrides?: Partial<AppConfig>;
  env?: Env;
};

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: UnknownRecord, next: UnknownRecord): UnknownRecord {
  const out: UnknownRecord = { ...base };
  for (const [key, value] of Object.entries(next)) {
    const prior = out[key];
    if (isRecord(prior) && isRecord(value)) {
      out[key] = deepMerge(prior, value);
    } else if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

function envReader(env: Env) {
  const string = (name: string): string | undefined => {
    const v = env[name];
    return v && v.trim().length > 0 ? v : undefined;
  };
  const int = (name: string): number | undefined => {
    const raw = string(name);
    if (!raw) return undefined;
    const n = Number(raw);
    return Number.isFinite(n) ? Math.trunc(n) : undefined;
  };
  const bool = (name: string): boolean | undefined => {
    const raw = string(name);
    if (!raw) return undefined;
    if (raw === "true" || raw === "1") return true;
    if (raw === "false" || raw === "0") return false;
    return undefined;
  };
  return { string, int, bool };
}

// API keys stay out of config; the credential resolver reads them per call.
function configFromEnv(env: Env): UnknownRecord {
  const read = envReader(env);

  const providers: UnknownRecord = {};
  for (const provider of BUILTIN_PROVIDERS) {
    const baseUrl = provider.baseUrlEnv
      ? read.string(provider.baseUrlEnv)
      : undefined;
    if (baseUrl) providers[provider.name] = { baseUrl };
  }

  const referer = read.string("OPENROUTER_HTTP_REFERER");
  const title = read.string("OPENROUTER_X_TITLE");
  if (referer || title) {
    providers.openrouter = deepMerge(
      isRecord(providers.openrouter) ? providers.openrouter : {},
      { headers: openRouterHeaders({ httpReferer: referer, title }) },
    );
  }

  return {
    logLevel: read.string("LOG_LEVEL"),
    defaults: {
      timeoutMs: read.int("LLM_RELAY_TIMEOUT_MS"),
      dropParams: read.bool("LLM_RELAY_DROP_PARAMS"),
    },
    providers,
  };
}

async function readConfigFile(configPath: string): Promise<UnknownRecord> {
  const abs = path.isAbsolute(configPath)
    ? configPath
    : path.join(process.cwd(), configPath);
  let raw: string;
  try {
    raw = await readFile(abs, "utf8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${abs}`, error);
  }

  const ext = path.extname(abs).toLowerCase();
  try {
    const parsed: unknown =
      ext === ".yaml" || ext === ".yml" ? YAML.parse(raw) : JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${abs}`, error);
  }
}

export async function loadConfig(
  args: LoadConfigArgs = {},
): Promise<AppConfig> {
  const fileConfig = args.configPath
    ? await readConfigFile(args.configPath)
    : {};
  const envConfig = configFromEnv(args.env ?? process.env);
  const merged = deepMerge(
    deepMerge(fileConfig, envConfig),
    args.overrides ?? {},
  );

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid configuration:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }
  return parsed.data;
}
