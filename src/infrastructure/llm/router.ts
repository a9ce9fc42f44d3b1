import { BadRequestError, ProviderError } from "../../domain/common/errors";
import {
  invokeTransport,
  type FetchLike,
  type HttpMethod,
} from "../http/transport";
import { silentLogger, type Logger } from "../logging/logger";
import { resolveCredential } from "./credentials";
import { parseModelId } from "./model-id";
import type {
  EndpointPaths,
  NormalizeContext,
  ProviderDefinition,
  RawResponse,
  TransformOptions,
} from "./providers/types";
import type { ProviderRegistry } from "./registry";
import type {
  CallOptions,
  ChatCompletionRequest,
  ChatCompletionResponse,
  Credential,
  EmbeddingRequest,
  EmbeddingResponse,
  Env,
  ModelInfo,
} from "./types";
import { joinUrl, maskApiKey } from "./util/url";

export const DEFAULT_TIMEOUT_MS = 600_000;

export type LlmRouterConfig = {
  registry: ProviderRegistry;
  logger?: Logger;
  env?: Env;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  dropParams?: boolean;
  now?: () => number;
};

type Target = {
  provider: ProviderDefinition;
  vendorModel?: string;
  path: string;
  credential: Credential;
};

type ModelTarget = Target & { vendorModel: string };

const ENDPOINT_LABELS: Record<keyof EndpointPaths, string> = {
  chat: "chat completions",
  embeddings: "embeddings",
  models: "model listing",
};

/**
 * Dispatches provider-prefixed model calls.
 *
 * Every call runs the same pipeline: rewrite the model id, resolve the
 * credential, build the vendor body, send it, normalize the answer. The
 * first two steps throw before any request is made. Nothing here retries.
 */
export class LlmRouter {
  private readonly registry: ProviderRegistry;
  private readonly logger: Logger;
  private readonly env: Env;
  private readonly fetchImpl?: FetchLike;
  private readonly timeoutMs: number;
  private readonly dropParams: boolean;
  private readonly now: () => number;

  constructor(config: LlmRouterConfig) {
    this.registry = config.registry;
    this.logger = config.logger ?? silentLogger;
    this.env = config.env ?? process.env;
    this.fetchImpl = config.fetchImpl;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.dropParams = config.dropParams ?? false;
    this.now = config.now ?? Date.now;
  }

  async completion(
    request: ChatCompletionRequest,
    options: CallOptions = {},
  ): Promise<ChatCompletionResponse> {
    const target = this.resolveModelTarget(request.model, "chat", options);
    const body = target.provider.transformer.chat(
      request,
      target.vendorModel,
      this.transformOptions(target.provider, options),
    );
    const raw = await this.send(target, "POST", body, options);
    return this.normalize(target, () =>
      target.provider.normalizer.chat(raw, this.context(target)),
    );
  }

  async embedding(
    request: EmbeddingRequest,
    options: CallOptions = {},
  ): Promise<EmbeddingResponse> {
    const target = this.resolveModelTarget(request.model, "embeddings", options);
    const body = target.provider.transformer.embedding(
      request,
      target.vendorModel,
      this.transformOptions(target.provider, options),
    );
    const raw = await this.send(target, "POST", body, options);
    return this.normalize(target, () =>
      target.provider.normalizer.embedding(raw, this.context(target)),
    );
  }

  async listModels(
    providerName: string,
    options: CallOptions = {},
  ): Promise<ModelInfo[]> {
    const provider = this.registry.lookup(providerName);
    const target = this.resolveTarget(provider, "models", options);
    const raw = await this.send(target, "GET", undefined, options);
    return this.normalize(target, () =>
      target.provider.normalizer.models(raw, this.context(target)),
    );
  }

  private resolveModelTarget(
    model: string,
    endpoint: keyof EndpointPaths,
    options: CallOptions,
  ): ModelTarget {
    const id = parseModelId(model, this.registry);
    const provider = this.registry.lookup(id.provider);
    return {
      ...this.resolveTarget(provider, endpoint, options),
      vendorModel: id.vendorModel,
    };
  }

  private resolveTarget(
    provider: ProviderDefinition,
    endpoint: keyof EndpointPaths,
    options: CallOptions,
  ): Target {
    const path = provider.endpoints[endpoint];
    if (path === undefined) {
      throw new BadRequestError({
        provider: provider.name,
        message: `${provider.displayName} does not support ${ENDPOINT_LABELS[endpoint]}`,
      });
    }
    const credential = resolveCredential({
      explicitKey: options.apiKey,
      provider,
      env: this.env,
    });
    return { provider, path, credential };
  }

  private transformOptions(
    provider: ProviderDefinition,
    options: CallOptions,
  ): TransformOptions {
    return {
      displayName: provider.displayName,
      dropParams: options.dropParams ?? this.dropParams,
      onDropped: (params) =>
        this.logger.debug(
          `${provider.name}: dropping unsupported parameters ${params.join(", ")}`,
        ),
    };
  }

  private async send(
    target: Target,
    method: HttpMethod,
    body: unknown,
    options: CallOptions,
  ): Promise<RawResponse> {
    const { provider, credential } = target;
    const url = joinUrl(options.apiBase ?? provider.baseUrl, target.path);
    const timeoutMs = options.timeoutMs ?? provider.timeoutMs ?? this.timeoutMs;
    this.logger.debug(
      `${method} ${url} provider=${provider.name}` +
        (target.vendorModel ? ` model=${target.vendorModel}` : "") +
        ` key=${maskApiKey(credential.value)} (${credential.envVar ?? credential.source})`,
    );

    try {
      const res = await invokeTransport({
        url,
        method,
        headers: { ...provider.headers },
        bearerToken: credential.value,
        body: body === undefined ? undefined : JSON.stringify(body),
        timeoutMs,
        provider: provider.name,
        signal: options.signal,
        fetchImpl: this.fetchImpl,
      });
      this.logger.debug(`${provider.name}: ${res.status} from ${url}`);
      return { status: res.status, text: res.text };
    } catch (error) {
      this.logFailure(provider, error);
      throw error;
    }
  }

  private normalize<T>(target: Target, run: () => T): T {
    try {
      return run();
    } catch (error) {
      this.logFailure(target.provider, error);
      throw error;
    }
  }

  private context(target: Target): NormalizeContext {
    return {
      provider: target.provider.name,
      displayName: target.provider.displayName,
      vendorModel: target.vendorModel,
      receivedAt: Math.floor(this.now() / 1000),
    };
  }

  private logFailure(provider: ProviderDefinition, error: unknown): void {
    if (error instanceof ProviderError) {
      const status = error.statusCode !== undefined ? ` status=${error.statusCode}` : "";
      this.logger.warn(
        `${provider.name}: ${error.category}${status}: ${error.message}`,
      );
      return;
    }
    this.logger.warn(`${provider.name}: ${String(error)}`);
  }
}
