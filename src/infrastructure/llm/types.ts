export type ProviderName = string;

export type ChatRole = "system" | "user" | "assistant" | "tool";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ResponseFormat = "text" | "json_object";

export type ChatCompletionParams = {
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  presencePenalty?: number;
  frequencyPenalty?: number;
  stop?: string | string[];
  seed?: number;
  n?: number;
  user?: string;
  responseFormat?: ResponseFormat;
};

export type ChatCompletionRequest = ChatCompletionParams & {
  /** Provider-prefixed model id, e.g. `nvidia/databricks/dbrx-instruct`. */
  model: string;
  messages: ChatMessage[];
};

export type EmbeddingParams = {
  inputType?: string;
  truncate?: "NONE" | "START" | "END";
  encodingFormat?: "float" | "base64";
  dimensions?: number;
  user?: string;
};

export type EmbeddingRequest = EmbeddingParams & {
  model: string;
  input: string | string[];
};

export type ChatParamName = keyof ChatCompletionParams;
export type EmbeddingParamName = keyof EmbeddingParams;

/** Per-call settings. None of these reach the vendor body. */
export type CallOptions = {
  apiKey?: string;
  apiBase?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  dropParams?: boolean;
};

export type LlmUsage = {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
};

export type ChatChoice = {
  index: number;
  message: { role: string; content: string | null };
  finishReason: string | null;
};

export type ChatCompletionResponse = {
  kind: "chat";
  provider: ProviderName;
  id: string;
  created: number;
  model: string;
  choices: ChatChoice[];
  usage?: LlmUsage;
};

export type EmbeddingVector = {
  embedding: number[];
  index: number;
};

export type EmbeddingResponse = {
  kind: "embedding";
  provider: ProviderName;
  model: string;
  data: EmbeddingVector[];
  usage: LlmUsage;
};

export type ModelInfo = {
  id: string;
  object: string;
  created?: number;
  ownedBy?: string;
};

export type ProviderModelId = {
  provider: ProviderName;
  vendorModel: string;
};

export type CredentialSource = "explicit" | "environment";

export type Credential = {
  value: string;
  source: CredentialSource;
  envVar?: string;
};

export type Env = Readonly<Record<string, string | undefined>>;
