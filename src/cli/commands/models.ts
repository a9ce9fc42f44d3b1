import { z } from "zod";
import type { Command } from "commander";
import { ExitCode } from "../exit-codes";
import {
  CommonArgsSchema,
  callOptions,
  createRouterFromArgs,
  exitWithError,
  parseArgs,
  withCommonOptions,
} from "./shared";

const ModelsArgsSchema = CommonArgsSchema.extend({
  provider: z.string().min(1),
});

export function registerModelsCommand(program: Command): void {
  const command = program
    .command("models")
    .description("List the models a provider serves")
    .requiredOption("-p, --provider <name>", "Provider name, e.g. nvidia");

  withCommonOptions(command).action(async (opts) => {
    const args = parseArgs(ModelsArgsSchema, opts);
    try {
      const router = await createRouterFromArgs(args);
      const models = await router.listModels(args.provider, callOptions(args));
      for (const model of models) console.log(model.id);
      process.exit(ExitCode.success);
    } catch (error) {
      exitWithError(error, args.debug);
    }
  });
}
