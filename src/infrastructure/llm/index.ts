export { createLlmRouter, type LlmRouterDeps } from "./factory";
export { resolveCredential, type ResolveCredentialArgs } from "./credentials";
export { parseModelId, type ProviderLookup } from "./model-id";
export {
  BUILTIN_PROVIDERS,
  ProviderRegistry,
  createProviderRegistry,
} from "./registry";
export { DEFAULT_TIMEOUT_MS, LlmRouter, type LlmRouterConfig } from "./router";
export {
  defineOpenAICompatibleProvider,
  type OpenAICompatibleProviderArgs,
} from "./providers/openai-compatible";
export type {
  EndpointPaths,
  NormalizeContext,
  ProviderCapabilities,
  ProviderDefinition,
  RawResponse,
  RequestTransformer,
  ResponseNormalizer,
  TransformOptions,
} from "./providers/types";
export type {
  CallOptions,
  ChatChoice,
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatMessage,
  ChatRole,
  Credential,
  CredentialSource,
  EmbeddingRequest,
  EmbeddingResponse,
  EmbeddingVector,
  LlmUsage,
  ModelInfo,
  ProviderModelId,
  ProviderName,
  ResponseFormat,
} from "./types";
