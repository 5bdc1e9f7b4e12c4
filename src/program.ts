import { Command } from "commander";
import { askCommand } from "./commands/ask.js";
import { CommandContext, type RuntimeOptions } from "./commands/context.js";
import { conversationCommand } from "./commands/conversation.js";
import { fileCommand } from "./commands/file.js";
import { responseCommand } from "./commands/response.js";
import { storeCommand } from "./commands/store.js";

/**
 * Build the `vstore` command tree. Services are created lazily, so
 * `--help` and parse errors need no configuration.
 */
export function createProgram(options: RuntimeOptions = {}): Command {
  const program = new Command();

  program
    .name("vstore")
    .description(
      "Manage hosted vector stores, their files and conversations, and ask grounded questions"
    )
    .version("0.1.0")
    .option("-v, --verbose", "Show debug output and error stacks");

  const ctx = new CommandContext(program, options);

  program.addCommand(storeCommand(ctx));
  program.addCommand(fileCommand(ctx));
  program.addCommand(conversationCommand(ctx));
  program.addCommand(askCommand(ctx));
  program.addCommand(responseCommand(ctx));

  return program;
}
