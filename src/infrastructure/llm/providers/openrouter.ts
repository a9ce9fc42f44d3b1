import { defineOpenAICompatibleProvider } from "./openai-compatible";

export type OpenRouterAppInfo = {
  httpReferer?: string;
  title?: string;
};

export function openRouterHeaders(app: OpenRouterAppInfo): Record<string, string> {
  return {
    ...(app.httpReferer ? { "HTTP-Referer": app.httpReferer } : {}),
    ...(app.title ? { "X-Title": app.title } : {}),
  };
}

/**
 * OpenRouter proxies many vendors; model ids are `<vendor>/<model>` on the
 * wire, so a caller writes `openrouter/openai/gpt-4o-mini`.
 */
export const openrouterProvider = defineOpenAICompatibleProvider({
  name: "openrouter",
  displayName: "OpenRouter",
  baseUrl: "https://openrouter.ai/api/v1",
  apiKeyEnv: ["OPENROUTER_API_KEY"],
  baseUrlEnv: "OPENROUTER_API_BASE",
});
