import { BadRequestError, ConfigError } from "../../domain/common/errors";
import type { ProviderOverride } from "../config/schema";
import { deepseekProvider } from "./providers/deepseek";
import { nvidiaProvider } from "./providers/nvidia";
import { openaiProvider } from "./providers/openai";
import { defineOpenAICompatibleProvider } from "./providers/openai-compatible";
import { openrouterProvider } from "./providers/openrouter";
import type { ProviderDefinition } from "./providers/types";

export const BUILTIN_PROVIDERS: readonly ProviderDefinition[] = [
  nvidiaProvider,
  openaiProvider,
  openrouterProvider,
  deepseekProvider,
];

/**
 * Read-only map from provider name to its definition. Built once, then
 * shared by every call.
 */
export class ProviderRegistry {
  private readonly providers: ReadonlyMap<string, ProviderDefinition>;

  constructor(definitions: readonly ProviderDefinition[]) {
    const map = new Map<string, ProviderDefinition>();
    for (const definition of definitions) {
      if (map.has(definition.name)) {
        throw new ConfigError(`Provider "${definition.name}" is registered twice`);
      }
      map.set(definition.name, Object.freeze({ ...definition }));
    }
    this.providers = map;
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  lookup(name: string): ProviderDefinition {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new BadRequestError({
        provider: name,
        message: `Unknown provider: ${name}. Known providers: ${this.names().join(", ")}`,
      });
    }
    return provider;
  }

  names(): string[] {
    return [...this.providers.keys()];
  }
}

export function defaultApiKeyEnv(name: string): string {
  return `${name.toUpperCase().replace(/[^A-Z0-9]/g, "_")}_API_KEY`;
}

function applyOverride(
  base: ProviderDefinition,
  override: ProviderOverride,
): ProviderDefinition {
  return {
    ...base,
    displayName: override.displayName ?? base.displayName,
    baseUrl: override.baseUrl ?? base.baseUrl,
    apiKeyEnv: override.apiKeyEnv ?? base.apiKeyEnv,
    timeoutMs: override.timeoutMs ?? base.timeoutMs,
    headers: { ...base.headers, ...override.headers },
  };
}

/**
 * Built-in providers with config overrides applied. A configured name
 * that is not built in declares a new OpenAI-compatible provider and must
 * carry a `baseUrl`.
 */
export function createProviderRegistry(
  overrides: Record<string, ProviderOverride> = {},
  builtins: readonly ProviderDefinition[] = BUILTIN_PROVIDERS,
): ProviderRegistry {
  const definitions = builtins.map((builtin) => {
    const override = overrides[builtin.name];
    return override ? applyOverride(builtin, override) : builtin;
  });

  for (const [name, override] of Object.entries(overrides)) {
    if (builtins.some((b) => b.name === name)) continue;
    if (!override.baseUrl) {
      throw new ConfigError(
        `Provider "${name}" is not built in and needs a baseUrl`,
      );
    }
    definitions.push(
      defineOpenAICompatibleProvider({
        name,
        displayName: override.displayName ?? name,
        baseUrl: override.baseUrl,
        apiKeyEnv: override.apiKeyEnv ?? [defaultApiKeyEnv(name)],
        headers: override.headers,
        timeoutMs: override.timeoutMs,
      }),
    );
  }

  return new ProviderRegistry(definitions);
}
