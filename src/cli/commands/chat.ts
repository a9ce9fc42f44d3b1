import { z } from "zod";
import type { Command } from "commander";
import type { ChatMessage } from "../../infrastructure/llm/types";
import { ExitCode } from "../exit-codes";
import {
  CommonArgsSchema,
  callOptions,
  createRouterFromArgs,
  exitWithError,
  parseArgs,
  withCommonOptions,
} from "./shared";

const optionalNumber = z.coerce.number().finite().optional();

const ChatArgsSchema = CommonArgsSchema.extend({
  model: z.string().min(1),
  message: z.string().min(1),
  system: z.string().min(1).optional(),
  temperature: optionalNumber,
  topP: optionalNumber,
  maxTokens: z.coerce.number().int().positive().optional(),
  presencePenalty: optionalNumber,
  frequencyPenalty: optionalNumber,
  dropParams: z.boolean().optional(),
  json: z.boolean().optional(),
});

export function registerChatCommand(program: Command): void {
  const command = program
    .command("chat")
    .description("Send a chat completion to <provider>/<model>")
    .requiredOption("-M, --model <id>", "Provider-prefixed model id")
    .requiredOption("-m, --message <text>", "User message")
    .option("-s, --system <text>", "System prompt")
    .option("--temperature <n>", "Sampling temperature")
    .option("--top-p <n>", "Nucleus sampling")
    .option("--max-tokens <n>", "Maximum tokens to generate")
    .option("--presence-penalty <n>", "Presence penalty")
    .option("--frequency-penalty <n>", "Frequency penalty")
    .option("--drop-params", "Omit parameters the provider does not accept")
    .option("--json", "Print the full normalized response as JSON");

  withCommonOptions(command).action(async (opts) => {
    const args = parseArgs(ChatArgsSchema, opts);
    try {
      const router = await createRouterFromArgs(args);
      const messages: ChatMessage[] = [
        ...(args.system ? [{ role: "system" as const, content: args.system }] : []),
        { role: "user", content: args.message },
      ];
      const response = await router.completion(
        {
          model: args.model,
          messages,
          temperature: args.temperature,
          topP: args.topP,
          maxTokens: args.maxTokens,
          presencePenalty: args.presencePenalty,
          frequencyPenalty: args.frequencyPenalty,
        },
        { ...callOptions(args), dropParams: args.dropParams },
      );
      if (args.json) {
        console.log(JSON.stringify(response, null, 2));
      } else {
        console.log(response.choices[0]?.message.content ?? "");
      }
      process.exit(ExitCode.success);
    } catch (error) {
      exitWithError(error, args.debug);
    }
  });
}
