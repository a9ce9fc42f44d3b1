import { defineOpenAICompatibleProvider } from "./openai-compatible";

/**
 * NVIDIA NIM hosted inference.
 *
 * Endpoints (OpenAI-compatible):
 * - POST https://integrate.api.nvidia.com/v1/chat/completions
 * - POST https://integrate.api.nvidia.com/v1/embeddings
 * - GET  https://integrate.api.nvidia.com/v1/models
 *
 * Model ids keep their vendor namespace on the wire, e.g.
 * `databricks/dbrx-instruct` or `nvidia/nv-embedqa-e5-v5`. Retrieval
 * embedding models take `input_type` ("query" | "passage") and `truncate`.
 */
export const nvidiaProvider = defineOpenAICompatibleProvider({
  name: "nvidia",
  displayName: "NVIDIA NIM",
  baseUrl: "https://integrate.api.nvidia.com/v1",
  apiKeyEnv: ["NVIDIA_API_KEY", "NVIDIA_NIM_API_KEY"],
  baseUrlEnv: "NVIDIA_API_BASE",
  capabilities: {
    chatParams: [
      "temperature",
      "topP",
      "maxTokens",
      "presencePenalty",
      "frequencyPenalty",
      "stop",
      "seed",
    ],
    embeddingParams: ["inputType", "truncate", "encodingFormat", "user"],
  },
});
