import type {
  EndpointPaths,
  ProviderCapabilities,
  ProviderDefinition,
} from "../types";
import { createOpenAICompatibleNormalizer } from "./normalize";
import {
  CHAT_PARAMS,
  EMBEDDING_PARAMS,
  createOpenAICompatibleTransformer,
} from "./transform";

export const OPENAI_COMPATIBLE_ENDPOINTS: EndpointPaths = {
  chat: "/chat/completions",
  embeddings: "/embeddings",
  models: "/models",
};

export const FULL_CAPABILITIES: ProviderCapabilities = {
  chatParams: CHAT_PARAMS,
  embeddingParams: EMBEDDING_PARAMS,
};

export type OpenAICompatibleProviderArgs = {
  name: string;
  displayName: string;
  baseUrl: string;
  apiKeyEnv: readonly string[];
  baseUrlEnv?: string;
  endpoints?: EndpointPaths;
  headers?: Record<string, string>;
  timeoutMs?: number;
  capabilities?: ProviderCapabilities;
};

export function defineOpenAICompatibleProvider(
  args: OpenAICompatibleProviderArgs,
): ProviderDefinition {
  const capabilities = args.capabilities ?? FULL_CAPABILITIES;
  return {
    name: args.name,
    displayName: args.displayName,
    baseUrl: args.baseUrl,
    apiKeyEnv: args.apiKeyEnv,
    baseUrlEnv: args.baseUrlEnv,
    endpoints: args.endpoints ?? OPENAI_COMPATIBLE_ENDPOINTS,
    headers: args.headers ?? {},
    timeoutMs: args.timeoutMs,
    capabilities,
    transformer: createOpenAICompatibleTransformer(capabilities),
    normalizer: createOpenAICompatibleNormalizer(),
  };
}

export {
  createOpenAICompatibleTransformer,
  type OpenAIChatBody,
  type OpenAIEmbeddingBody,
} from "./transform";
export {
  createOpenAICompatibleNormalizer,
  errorForStatus,
  errorFromResponse,
} from "./normalize";
