import { BadRequestError } from "../../../../domain/common/errors";
import {
  ChatCompletionRequestSchema,
  EmbeddingRequestSchema,
  formatIssues,
} from "../../../../domain/llm/schemas";
import type {
  ChatCompletionRequest,
  ChatMessage,
  ChatParamName,
  EmbeddingParamName,
  EmbeddingRequest,
  ResponseFormat,
} from "../../types";
import type {
  ProviderCapabilities,
  RequestTransformer,
  TransformOptions,
} from "../types";

export type OpenAIChatBody = {
  messages: ChatMessage[];
  model: string;
  temperature?: number;
  top_p?: number;
  max_tokens?: number;
  presence_penalty?: number;
  frequency_penalty?: number;
  stop?: string | string[];
  seed?: number;
  n?: number;
  user?: string;
  response_format?: { type: ResponseFormat };
};

export type OpenAIEmbeddingBody = {
  input: string | string[];
  model: string;
  input_type?: string;
  truncate?: "NONE" | "START" | "END";
  encoding_format?: "float" | "base64";
  dimensions?: number;
  user?: string;
};

export const CHAT_PARAMS: readonly ChatParamName[] = [
  "temperature",
  "topP",
  "maxTokens",
  "presencePenalty",
  "frequencyPenalty",
  "stop",
  "seed",
  "n",
  "user",
  "responseFormat",
];

export const EMBEDDING_PARAMS: readonly EmbeddingParamName[] = [
  "inputType",
  "truncate",
  "encodingFormat",
  "dimensions",
  "user",
];

/**
 * Returns the names in `present` the provider does not accept. When
 * `dropParams` is off, any such name is a `BadRequestError`.
 */
function checkSupported<TName extends string>(
  present: TName[],
  supported: readonly TName[],
  kind: "chat" | "embedding",
  options: TransformOptions,
): Set<TName> {
  const unsupported = present.filter((name) => !supported.includes(name));
  if (unsupported.length === 0) return new Set();
  if (!options.dropParams) {
    throw new BadRequestError({
      message: `${options.displayName} does not support ${kind} parameters: ${unsupported.join(", ")}. Set dropParams to omit them.`,
    });
  }
  options.onDropped?.(unsupported);
  return new Set(unsupported);
}

export function createOpenAICompatibleTransformer(
  capabilities: ProviderCapabilities,
): RequestTransformer<OpenAIChatBody, OpenAIEmbeddingBody> {
  return {
    chat(request, vendorModel, options) {
      const parsed = ChatCompletionRequestSchema.safeParse(request);
      if (!parsed.success) {
        throw new BadRequestError({
          message: `Invalid chat completion request:\n${formatIssues(parsed.error.issues)}`,
          cause: parsed.error,
        });
      }
      const req: ChatCompletionRequest = parsed.data;
      const present = CHAT_PARAMS.filter((name) => req[name] !== undefined);
      const dropped = checkSupported(
        present,
        capabilities.chatParams,
        "chat",
        options,
      );
      const keep = <K extends ChatParamName>(name: K) =>
        dropped.has(name) ? undefined : req[name];

      const responseFormat = keep("responseFormat");
      return {
        messages: req.messages.map((m) => ({ role: m.role, content: m.content })),
        model: vendorModel,
        temperature: keep("temperature"),
        top_p: keep("topP"),
        max_tokens: keep("maxTokens"),
        presence_penalty: keep("presencePenalty"),
        frequency_penalty: keep("frequencyPenalty"),
        stop: keep("stop"),
        seed: keep("seed"),
        n: keep("n"),
        user: keep("user"),
        response_format: responseFormat ? { type: responseFormat } : undefined,
      };
    },

    embedding(request, vendorModel, options) {
      const parsed = EmbeddingRequestSchema.safeParse(request);
      if (!parsed.success) {
        throw new BadRequestError({
          message: `Invalid embedding request:\n${formatIssues(parsed.error.issues)}`,
          cause: parsed.error,
        });
      }
      const req: EmbeddingRequest = parsed.data;
      const present = EMBEDDING_PARAMS.filter((name) => req[name] !== undefined);
      const dropped = checkSupported(
        present,
        capabilities.embeddingParams,
        "embedding",
        options,
      );
      const keep = <K extends EmbeddingParamName>(name: K) =>
        dropped.has(name) ? undefined : req[name];

      return {
        input: req.input,
        model: vendorModel,
        input_type: keep("inputType"),
        truncate: keep("truncate"),
        encoding_format: keep("encodingFormat"),
        dimensions: keep("dimensions"),
        user: keep("user"),
      };
    },
  };
}
