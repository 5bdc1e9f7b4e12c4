import { Command } from "commander";
import { RemoteAPIError } from "../errors.js";
import type { Attributes } from "../utils/attributes.js";
import { formatConversation, formatConversationItem } from "../utils/format.js";
import {
  parseAttributeOption,
  parseOrder,
  parsePositiveInt,
  type CommandContext,
} from "./context.js";

interface MetadataOptions {
  meta: Attributes;
}

interface ItemsOptions {
  limit?: number;
  order?: "asc" | "desc";
  json?: boolean;
}

export function conversationCommand(ctx: CommandContext): Command {
  const conversation = new Command("conversation").description(
    "Manage conversations"
  );

  conversation
    .command("create")
    .description("Create a conversation and print its id")
    .option(
      "--meta <key=value>",
      "Metadata entry (repeatable)",
      parseAttributeOption,
      {}
    )
    .action((options: MetadataOptions) =>
      ctx.run(async ({ conversations }) => {
        console.log(await conversations.create(options.meta));
      })
    );

  conversation
    .command("get")
    .description("Show a conversation")
    .argument("<conversation_id>", "Conversation id")
    .action((conversationId: string) =>
      ctx.run(async ({ conversations }) => {
        console.log(formatConversation(await conversations.get(conversationId)));
      })
    );

  conversation
    .command("update")
    .description("Replace the metadata of a conversation")
    .argument("<conversation_id>", "Conversation id")
    .option(
      "--meta <key=value>",
      "Metadata entry (repeatable)",
      parseAttributeOption,
      {}
    )
    .action((conversationId: string, options: MetadataOptions) =>
      ctx.run(async ({ conversations }) => {
        const updated = await conversations.update(conversationId, options.meta);
        console.log(formatConversation(updated));
      })
    );

  conversation
    .command("delete")
    .description("Delete a conversation")
    .argument("<conversation_id>", "Conversation id")
    .action((conversationId: string) =>
      ctx.run(async ({ conversations }) => {
        if (!(await conversations.delete(conversationId))) {
          throw new RemoteAPIError(
            `Deletion of conversation ${conversationId} was not confirmed`
          );
        }
        console.log(`🗑️  Deleted conversation ${conversationId}`);
      })
    );

  conversation
    .command("items")
    .description("List the items of a conversation")
    .argument("<conversation_id>", "Conversation id")
    .option("--limit <number>", "Maximum number of items", parsePositiveInt)
    .option("--order <order>", "Sort order: asc or desc", parseOrder)
    .option("--json", "Print raw JSON")
    .action((conversationId: string, options: ItemsOptions) =>
      ctx.run(async ({ conversations }) => {
        const items = await conversations.listItems(conversationId, {
          limit: options.limit,
          order: options.order,
        });

        if (options.json) {
          console.log(JSON.stringify(items, null, 2));
        } else if (items.length === 0) {
          console.log("📭 No items in this conversation.");
        } else {
          console.log(items.map(formatConversationItem).join("\n"));
        }
      })
    );

  return conversation;
}
