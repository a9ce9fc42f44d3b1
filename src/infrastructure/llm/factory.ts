import type { AppConfig } from "../config/schema";
import type { FetchLike } from "../http/transport";
import { createLogger, type Logger } from "../logging/logger";
import { createProviderRegistry } from "./registry";
import { LlmRouter } from "./router";
import type { Env } from "./types";

export type LlmRouterDeps = {
  logger?: Logger;
  env?: Env;
  fetchImpl?: FetchLike;
};

export function createLlmRouter(
  config: AppConfig,
  deps: LlmRouterDeps = {},
): LlmRouter {
  return new LlmRouter({
    registry: createProviderRegistry(config.providers),
    logger: deps.logger ?? createLogger(config),
    env: deps.env,
    fetchImpl: deps.fetchImpl,
    timeoutMs: config.defaults.timeoutMs,
    dropParams: config.defaults.dropParams,
  });
}
