import type { z } from "zod";
import {
  AuthenticationError,
  BadRequestError,
  RateLimitError,
  ServerError,
  TimeoutError,
  UnknownApiError,
  type ProviderError,
  type ProviderErrorParams,
} from "../../../../domain/common/errors";
import { formatIssues } from "../../../../domain/llm/schemas";
import type {
  ChatCompletionResponse,
  EmbeddingResponse,
  LlmUsage,
  ModelInfo,
} from "../../types";
import type { NormalizeContext, RawResponse, ResponseNormalizer } from "../types";
import {
  ChatCompletionWireSchema,
  EmbeddingWireSchema,
  ErrorWireSchema,
  ModelListWireSchema,
  type ErrorWire,
} from "./schemas";

const MAX_RAW_MESSAGE = 500;

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function vendorMessage(body: ErrorWire | undefined, text: string): string {
  const error = body?.error;
  if (typeof error === "string" && error.length > 0) return error;
  if (error && typeof error === "object" && error.message) return error.message;
  if (body?.detail) return body.detail;
  if (body?.message) return body.message;
  if (body?.title) return body.title;
  const trimmed = text.trim();
  if (trimmed.length === 0) return "empty response body";
  return trimmed.length > MAX_RAW_MESSAGE
    ? `${trimmed.slice(0, MAX_RAW_MESSAGE)}...`
    : trimmed;
}

function readErrorBody(text: string): ErrorWire | undefined {
  const json = parseJson(text);
  if (!json.ok) return undefined;
  const parsed = ErrorWireSchema.safeParse(json.value);
  return parsed.success ? parsed.data : undefined;
}

/** Picks the error class for an HTTP status. */
export function errorForStatus(
  status: number,
  params: ProviderErrorParams,
): ProviderError {
  if (status === 401 || status === 403) return new AuthenticationError(params);
  if (status === 408) return new TimeoutError(params);
  if (status === 429) return new RateLimitError(params);
  if (status >= 500) return new ServerError(params);
  if (status >= 400) return new BadRequestError(params);
  return new UnknownApiError(params);
}

/** Builds the canonical error for a non-2xx vendor response. */
export function errorFromResponse(
  raw: RawResponse,
  ctx: NormalizeContext,
): ProviderError {
  const body = readErrorBody(raw.text);
  const detail = vendorMessage(body, raw.text);
  return errorForStatus(raw.status, {
    provider: ctx.provider,
    statusCode: raw.status,
    message: `${ctx.displayName} request failed (${raw.status}): ${detail}`,
    cause: body ?? raw.text,
  });
}

/**
 * Some vendors answer 200 with an `{ "error": ... }` envelope. A numeric
 * code in the HTTP error range is classified like a status.
 */
function inBandError(
  value: unknown,
  raw: RawResponse,
  ctx: NormalizeContext,
): ProviderError | undefined {
  const parsed = ErrorWireSchema.safeParse(value);
  if (!parsed.success || !parsed.data.error) return undefined;
  const error = parsed.data.error;
  const code =
    typeof error === "object" && typeof error.code === "number"
      ? error.code
      : undefined;
  const params: ProviderErrorParams = {
    provider: ctx.provider,
    statusCode: code ?? raw.status,
    message: `${ctx.displayName} returned an error: ${vendorMessage(parsed.data, raw.text)}`,
    cause: value,
  };
  if (code !== undefined && code >= 400 && code < 600) {
    return errorForStatus(code, params);
  }
  return new UnknownApiError(params);
}

function decodeSuccess<TSchema extends z.ZodTypeAny>(
  raw: RawResponse,
  ctx: NormalizeContext,
  schema: TSchema,
  what: string,
): z.infer<TSchema> {
  if (raw.status < 200 || raw.status >= 300) {
    throw errorFromResponse(raw, ctx);
  }
  const json = parseJson(raw.text);
  if (!json.ok) {
    throw new BadRequestError({
      provider: ctx.provider,
      statusCode: raw.status,
      message: `${ctx.displayName} returned a malformed ${what} response: body is not JSON`,
      cause: raw.text,
    });
  }
  const bandError = inBandError(json.value, raw, ctx);
  if (bandError) throw bandError;

  const parsed = schema.safeParse(json.value);
  if (!parsed.success) {
    throw new BadRequestError({
      provider: ctx.provider,
      statusCode: raw.status,
      message: `${ctx.displayName} returned a malformed ${what} response:\n${formatIssues(parsed.error.issues)}`,
      cause: json.value,
    });
  }
  return parsed.data;
}

type UsageWire =
  | {
      prompt_tokens?: number | null;
      completion_tokens?: number | null;
      total_tokens?: number | null;
    }
  | null
  | undefined;

function toUsage(usage: UsageWire): LlmUsage | undefined {
  if (!usage) return undefined;
  return {
    promptTokens: usage.prompt_tokens ?? undefined,
    completionTokens: usage.completion_tokens ?? undefined,
    totalTokens: usage.total_tokens ?? undefined,
  };
}

/**
 * Float32 little-endian, as returned for `encoding_format: "base64"`.
 * Returns `undefined` when the byte count is not a multiple of 4.
 */
export function decodeBase64Embedding(value: string): number[] | undefined {
  const bytes = Buffer.from(value, "base64");
  if (bytes.length % 4 !== 0) return undefined;
  const out: number[] = [];
  for (let offset = 0; offset < bytes.length; offset += 4) {
    out.push(bytes.readFloatLE(offset));
  }
  return out;
}

function embeddingVector(
  embedding: string | number[],
  position: number,
  raw: RawResponse,
  ctx: NormalizeContext,
): number[] {
  if (typeof embedding !== "string") return [...embedding];
  const decoded = decodeBase64Embedding(embedding);
  if (!decoded) {
    throw new BadRequestError({
      provider: ctx.provider,
      statusCode: raw.status,
      message: `${ctx.displayName} returned a malformed embedding response:\ndata.${position}.embedding: base64 payload is not a whole number of float32 values`,
      cause: embedding,
    });
  }
  return decoded;
}

export function createOpenAICompatibleNormalizer(): ResponseNormalizer {
  return {
    chat(raw, ctx): ChatCompletionResponse {
      const wire = decodeSuccess(raw, ctx, ChatCompletionWireSchema, "chat completion");
      return {
        kind: "chat",
        provider: ctx.provider,
        id: wire.id ?? "",
        created: wire.created ?? ctx.receivedAt,
        model: wire.model ?? ctx.vendorModel ?? "",
        choices: wire.choices.map((choice, position) => ({
          index: choice.index ?? position,
          message: {
            role: choice.message.role ?? "assistant",
            content: choice.message.content ?? null,
          },
          finishReason: choice.finish_reason ?? null,
        })),
        usage: toUsage(wire.usage),
      };
    },

    embedding(raw, ctx): EmbeddingResponse {
      const wire = decodeSuccess(raw, ctx, EmbeddingWireSchema, "embedding");
      return {
        kind: "embedding",
        provider: ctx.provider,
        model: wire.model ?? ctx.vendorModel ?? "",
        data: wire.data.map((entry, position) => ({
          embedding: embeddingVector(entry.embedding, position, raw, ctx),
          index: entry.index ?? position,
        })),
        usage: toUsage(wire.usage) ?? {},
      };
    },

    models(raw, ctx): ModelInfo[] {
      const wire = decodeSuccess(raw, ctx, ModelListWireSchema, "model list");
      return wire.data.map((model) => ({
        id: model.id,
        object: model.object ?? "model",
        created: model.created ?? undefined,
        ownedBy: model.owned_by ?? undefined,
      }));
    },
  };
}
