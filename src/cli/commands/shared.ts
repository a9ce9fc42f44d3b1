import { z } from "zod";
import type { Command } from "commander";
import { ProviderError, toAppError } from "../../domain/common/errors";
import { loadConfig } from "../../infrastructure/config/load";
import { createLlmRouter } from "../../infrastructure/llm/factory";
import type { LlmRouter } from "../../infrastructure/llm/router";
import { createLogger } from "../../infrastructure/logging/logger";
import { ExitCode, exitCodeForCategory } from "../exit-codes";

export const CommonArgsSchema = z.object({
  apiKey: z.string().min(1).optional(),
  apiBase: z.string().url().optional(),
  timeoutMs: z.coerce.number().int().positive().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  debug: z.boolean().optional(),
});

export type CommonArgs = z.infer<typeof CommonArgsSchema>;

export function withCommonOptions(command: Command): Command {
  return command
    .option("--api-key <key>", "API key (default: provider env var)")
    .option("--api-base <url>", "Override the provider base URL")
    .option("--timeout-ms <n>", "Request timeout in milliseconds")
    .option("--config <path>", "Path to YAML/JSON config file")
    .option("--verbose", "Verbose logs")
    .option("--debug", "Debug logs (includes stack traces)");
}

export function parseArgs<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  opts: unknown,
): z.infer<TSchema> {
  const parsed = schema.safeParse(opts);
  if (!parsed.success) {
    console.error(parsed.error.issues.map((i) => i.message).join("\n"));
    process.exit(ExitCode.usage);
  }
  return parsed.data;
}

export async function createRouterFromArgs(args: CommonArgs): Promise<LlmRouter> {
  const logLevel = args.debug ? "debug" : args.verbose ? "info" : "error";
  const config = await loadConfig({
    configPath: args.config,
    overrides: { logLevel },
  });
  return createLlmRouter(config, { logger: createLogger(config) });
}

export function callOptions(args: CommonArgs) {
  return {
    apiKey: args.apiKey,
    apiBase: args.apiBase,
    timeoutMs: args.timeoutMs,
  };
}

export function exitWithError(error: unknown, debug?: boolean): never {
  const appError = toAppError(error);
  if (debug) {
    console.error(appError.stack ?? appError.message);
  } else {
    console.error(appError.message);
  }
  process.exit(
    appError instanceof ProviderError
      ? exitCodeForCategory(appError.category)
      : ExitCode.failure,
  );
}
