export * from "./infrastructure/llm";
export * from "./domain/common/errors";
export { loadConfig, type LoadConfigArgs } from "./infrastructure/config/load";
export type { AppConfig, ProviderOverride } from "./infrastructure/config/schema";
export { createLogger, type Logger } from "./infrastructure/logging/logger";
export { invokeTransport, type FetchLike } from "./infrastructure/http/transport";
