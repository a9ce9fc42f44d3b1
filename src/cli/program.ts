import { Command } from "commander";
import { registerChatCommand } from "./commands/chat";
import { registerEmbedCommand } from "./commands/embed";
import { registerModelsCommand } from "./commands/models";

export function buildProgram(): Command {
  const program = new Command();

  const version = process.env.npm_package_version ?? "0.1.0";
  program
    .name("llm-relay")
    .description("Call OpenAI-compatible LLM providers through provider/model ids")
    .version(version);

  registerChatCommand(program);
  registerEmbedCommand(program);
  registerModelsCommand(program);
  return program;
}
