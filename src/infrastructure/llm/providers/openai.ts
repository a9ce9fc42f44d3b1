import { defineOpenAICompatibleProvider } from "./openai-compatible";

export const openaiProvider = defineOpenAICompatibleProvider({
  name: "openai",
  displayName: "OpenAI",
  baseUrl: "https://api.openai.com/v1",
  apiKeyEnv: ["OPENAI_API_KEY"],
  baseUrlEnv: "OPENAI_API_BASE",
  capabilities: {
    chatParams: [
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
    ],
    embeddingParams: ["encodingFormat", "dimensions", "user"],
  },
});
