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

const EmbedArgsSchema = CommonArgsSchema.extend({
  model: z.string().min(1),
  input: z.array(z.string().min(1)).min(1),
  inputType: z.string().min(1).optional(),
  truncate: z.enum(["NONE", "START", "END"]).optional(),
});

export function registerEmbedCommand(program: Command): void {
  const command = program
    .command("embed")
    .description("Create embeddings with <provider>/<model>")
    .requiredOption("-M, --model <id>", "Provider-prefixed model id")
    .requiredOption("-i, --input <text...>", "Text(s) to embed")
    .option("--input-type <type>", "Vendor input type, e.g. query or passage")
    .option("--truncate <mode>", "NONE, START or END");

  withCommonOptions(command).action(async (opts) => {
    const args = parseArgs(EmbedArgsSchema, opts);
    try {
      const router = await createRouterFromArgs(args);
      const input = args.input.length === 1 ? (args.input[0] ?? "") : args.input;
      const response = await router.embedding(
        {
          model: args.model,
          input,
          inputType: args.inputType,
          truncate: args.truncate,
        },
        callOptions(args),
      );
      console.log(JSON.stringify(response, null, 2));
      process.exit(ExitCode.success);
    } catch (error) {
      exitWithError(error, args.debug);
    }
  });
}
