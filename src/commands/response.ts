import { Command } from "commander";
import type { CommandContext } from "./context.js";
import { printAnswer } from "./ask.js";

export function responseCommand(ctx: CommandContext): Command {
  const response = new Command("response").description(
    "Inspect or cancel model responses"
  );

  response
    .command("get")
    .description("Show a stored response with its sources")
    .argument("<response_id>", "Response id")
    .action((responseId: string) =>
      ctx.run(async ({ responses }) => {
        printAnswer(await responses.get(responseId));
      })
    );

  response
    .command("cancel")
    .description("Cancel a background response")
    .argument("<response_id>", "Response id")
    .action((responseId: string) =>
      ctx.run(async ({ responses }) => {
        const answer = await responses.cancel(responseId);
        console.log(`${answer.responseId}: ${answer.status}`);
      })
    );

  return response;
}
