import { z } from "zod";

export const ChatMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant", "tool"]),
  content: z.string(),
});

const finite = z.number().finite();

export const ChatCompletionParamsSchema = z.object({
  temperature: finite.min(0).optional(),
  topP: finite.min(0).max(1).optional(),
  maxTokens: z.number().int().positive().optional(),
  presencePenalty: finite.optional(),
  frequencyPenalty: finite.optional(),
  stop: z.union([z.string(), z.array(z.string())]).optional(),
  seed: z.number().int().optional(),
  n: z.number().int().positive().optional(),
  user: z.string().optional(),
  responseFormat: z.enum(["text", "json_object"]).optional(),
});

export const ChatCompletionRequestSchema = ChatCompletionParamsSchema.extend({
  model: z.string().min(1),
  messages: z.array(ChatMessageSchema).min(1, "messages must not be empty"),
});

export const EmbeddingParamsSchema = z.object({
  inputType: z.string().min(1).optional(),
  truncate: z.enum(["NONE", "START", "END"]).optional(),
  encodingFormat: z.enum(["float", "base64"]).optional(),
  dimensions: z.number().int().positive().optional(),
  user: z.string().optional(),
});

export const EmbeddingRequestSchema = EmbeddingParamsSchema.extend({
  model: z.string().min(1),
  input: z.union([
    z.string().min(1, "input must not be empty"),
    z
      .array(z.string().min(1, "input entries must not be empty"))
      .min(1, "input must not be empty"),
  ]),
});

export function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("\n");
}
