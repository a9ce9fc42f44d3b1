import { defineOpenAICompatibleProvider } from "./openai-compatible";

// DeepSeek has no embeddings endpoint.
export const deepseekProvider = defineOpenAICompatibleProvider({
  name: "deepseek",
  displayName: "DeepSeek",
  baseUrl: "https://api.deepseek.com",
  apiKeyEnv: ["DEEPSEEK_API_KEY"],
  baseUrlEnv: "DEEPSEEK_API_BASE",
  endpoints: {
    chat: "/chat/completions",
    models: "/models",
  },
  capabilities: {
    chatParams: [
      "temperature",
      "topP",
      "maxTokens",
      "presencePenalty",
      "frequencyPenalty",
      "stop",
      "seed",
      "responseFormat",
    ],
    embeddingParams: [],
  },
});
