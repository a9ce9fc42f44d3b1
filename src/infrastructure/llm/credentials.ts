import { AuthenticationError } from "../../domain/common/errors";
import type { ProviderDefinition } from "./providers/types";
import type { Credential, Env } from "./types";

export type ResolveCredentialArgs = {
  explicitKey?: string;
  provider: Pick<ProviderDefinition, "name" | "displayName" | "apiKeyEnv">;
  env: Env;
};

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

// Priority: explicit key, then each of the provider's env vars in order.
export function resolveCredential(args: ResolveCredentialArgs): Credential {
  if (present(args.explicitKey)) {
    return { value: args.explicitKey, source: "explicit" };
  }
  for (const envVar of args.provider.apiKeyEnv) {
    const value = args.env[envVar];
    if (present(value)) {
      return { value, source: "environment", envVar };
    }
  }
  const hint =
    args.provider.apiKeyEnv.length > 0
      ? ` or set ${args.provider.apiKeyEnv.join(" / ")}`
      : "";
  throw new AuthenticationError({
    provider: args.provider.name,
    message: `Missing API key for ${args.provider.displayName}. Pass apiKey${hint}.`,
  });
}
