import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatParamName,
  EmbeddingParamName,
  EmbeddingRequest,
  EmbeddingResponse,
  ModelInfo,
  ProviderName,
} from "../types";

export type EndpointPaths = {
  chat?: string;
  embeddings?: string;
  models?: string;
};

export type ProviderCapabilities = {
  chatParams: readonly ChatParamName[];
  embeddingParams: readonly EmbeddingParamName[];
};

export type TransformOptions = {
  displayName: string;
  dropParams: boolean;
  onDropped?: (params: string[]) => void;
};

/** Builds the vendor JSON body. Pure: no I/O, same input gives the same body. */
export interface RequestTransformer<
  TChatBody = unknown,
  TEmbeddingBody = unknown,
> {
  chat(
    request: ChatCompletionRequest,
    vendorModel: string,
    options: TransformOptions,
  ): TChatBody;
  embedding(
    request: EmbeddingRequest,
    vendorModel: string,
    options: TransformOptions,
  ): TEmbeddingBody;
}

export type RawResponse = {
  status: number;
  text: string;
};

export type NormalizeContext = {
  provider: ProviderName;
  displayName: string;
  vendorModel?: string;
  /** Unix seconds at which the response arrived. */
  receivedAt: number;
};

/**
 * Maps a raw vendor response into canonical form. Non-2xx statuses and
 * in-band error envelopes throw the matching `ProviderError` subclass.
 */
export interface ResponseNormalizer {
  chat(raw: RawResponse, ctx: NormalizeContext): ChatCompletionResponse;
  embedding(raw: RawResponse, ctx: NormalizeContext): EmbeddingResponse;
  models(raw: RawResponse, ctx: NormalizeContext): ModelInfo[];
}

export type ProviderDefinition = {
  name: ProviderName;
  displayName: string;
  baseUrl: string;
  /** Environment variables consulted, in order, when no key is passed. */
  apiKeyEnv: readonly string[];
  /** Environment variable that overrides `baseUrl`. */
  baseUrlEnv?: string;
  endpoints: EndpointPaths;
  headers: Readonly<Record<string, string>>;
  timeoutMs?: number;
  capabilities: ProviderCapabilities;
  transformer: RequestTransformer;
  normalizer: ResponseNormalizer;
};
