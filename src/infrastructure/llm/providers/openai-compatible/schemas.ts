import { z } from "zod";

const UsageWireSchema = z
  .object({
    prompt_tokens: z.number().nullish(),
    completion_tokens: z.number().nullish(),
    total_tokens: z.number().nullish(),
  })
  .nullish();

export const ChatCompletionWireSchema = z.object({
  id: z.string().nullish(),
  created: z.number().nullish(),
  model: z.string().nullish(),
  choices: z.array(
    z.object({
      index: z.number().int().nullish(),
      message: z.object({
        role: z.string().nullish(),
        content: z.string().nullish(),
      }),
      finish_reason: z.string().nullish(),
    }),
  ),
  usage: UsageWireSchema,
});

export const EmbeddingWireSchema = z.object({
  model: z.string().nullish(),
  data: z.array(
    z.object({
      embedding: z.union([z.array(z.number()), z.string()]),
      index: z.number().int().nullish(),
    }),
  ),
  usage: UsageWireSchema,
});

export const ModelListWireSchema = z.object({
  object: z.string().nullish(),
  data: z.array(
    z.object({
      id: z.string().min(1),
      object: z.string().nullish(),
      created: z.number().nullish(),
      owned_by: z.string().nullish(),
    }),
  ),
});

/**
 * Error bodies seen from OpenAI-compatible vendors: the OpenAI envelope,
 * a bare `error` string, and problem-details style `{ title, detail }`.
 */
export const ErrorWireSchema = z.object({
  error: z
    .union([
      z.string(),
      z.object({
        message: z.string().nullish(),
        type: z.string().nullish(),
        code: z.union([z.string(), z.number()]).nullish(),
      }),
    ])
    .nullish(),
  detail: z.string().nullish(),
  message: z.string().nullish(),
  title: z.string().nullish(),
});

export type ErrorWire = z.infer<typeof ErrorWireSchema>;
