import { z } from "zod";

export const LogLevelSchema = z
  .enum(["silent", "error", "warn", "info", "debug"])
  .default("info");

export const ProviderNameSchema = z
  .string()
  .regex(
    /^[a-z0-9][a-z0-9_-]*$/,
    "provider names are lowercase letters, digits, '-' or '_'",
  );

export const ProviderOverrideSchema = z.object({
  displayName: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  /** Env var name(s) holding the API key, checked in order. */
  apiKeyEnv: z
    .union([z.string().min(1), z.array(z.string().min(1)).min(1)])
    .transform((value) => (typeof value === "string" ? [value] : value))
    .optional(),
  timeoutMs: z.number().int().positive().optional(),
  headers: z.record(z.string()).default({}),
});

export type ProviderOverride = z.infer<typeof ProviderOverrideSchema>;

export const DefaultsSchema = z.object({
  timeoutMs: z.number().int().positive().default(600_000),
  /** Omit parameters a provider does not accept instead of failing. */
  dropParams: z.boolean().default(false),
});

export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema,
  defaults: DefaultsSchema.default({}),
  providers: z.record(ProviderNameSchema, ProviderOverrideSchema).default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
